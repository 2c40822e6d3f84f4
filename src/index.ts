/**
 * agent-switchboard
 *
 * Registry, dispatcher and loop-safe story pipeline for advisory agents.
 *
 * ```typescript
 * import { createSwitchboard } from 'agent-switchboard';
 *
 * const switchboard = createSwitchboard();
 * const response = await switchboard.processRequest({
 *   description: 'How should we test the payment adapter?',
 *   type: 'testing',
 *   context: { domain: 'testing', properties: { topic: 'contract-testing' } },
 *   securityContext: {
 *     token: 'test-token',
 *     userId: 'dev-1',
 *     permissions: ['AGENT_READ', 'AGENT_EXECUTE', 'TESTING_GUIDE'],
 *   },
 * });
 * ```
 */

export * from './types/index.js';
export * from './types/config.js';
export * from './types/request.js';

export * from './core/agents/index.js';
export { AgentManager, type AgentManagerOptions } from './core/agent-manager.js';
export { AuditTrail, type AuditTrailOptions } from './core/audit-trail.js';
export {
  createSwitchboard,
  type Switchboard,
  type SwitchboardOptions,
} from './core/bootstrap.js';
export {
  ConfigError,
  ConsultationTimeoutError,
  IssueParseError,
  RegistryIntegrityError,
  errorMessage,
} from './core/errors.js';
export {
  HealthMonitor,
  type AgentHealth,
  type HealthMonitorOptions,
} from './core/health-monitor.js';
export {
  SecurityGate,
  missingPermissions,
  trustedTransport,
  type SecurityDecision,
  type TransportSecurity,
} from './core/security.js';

export * from './core/story/types.js';
export { StoryPipeline, type StoryPipelineOptions } from './core/story/pipeline.js';
export { DefaultIssueValidator } from './core/story/issue-validator.js';
export { MarkdownIssueParser } from './core/story/issue-parser.js';
export { HeuristicRequirementsAnalyzer } from './core/story/requirements-analyzer.js';
export { EarsGherkinTransformer } from './core/story/requirements-transformer.js';
export { MarkdownOutputGenerator } from './core/story/output-generator.js';
export { ThresholdLoopDetector } from './core/story/loop-detector.js';
export { buildProcessingContext } from './core/story/processing-context.js';

export {
  FileIssueStore,
  InMemoryIssueStore,
  type IssueStore,
} from './integrations/issue-store.js';
