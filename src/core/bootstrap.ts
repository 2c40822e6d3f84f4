import type { AgentResponse } from '../types/index.js';
import { DEFAULT_CONFIG, type SwitchboardConfig } from '../types/config.js';
import type { AgentRequestInput } from '../types/request.js';
import type { IssueStore } from '../integrations/issue-store.js';
import { AgentManager } from './agent-manager.js';
import { CANONICAL_DOMAINS, createDomainAgents } from './agents/domain-agents.js';
import { loadGuidance, type GuidanceProvider } from './agents/guidance.js';
import { AgentRegistry } from './agents/registry.js';
import { createStoryAgent } from './agents/story-agent.js';
import type { Agent } from './agents/types.js';
import { AuditTrail } from './audit-trail.js';
import { HealthMonitor } from './health-monitor.js';
import type { TransportSecurity } from './security.js';
import { StoryPipeline } from './story/pipeline.js';

export interface SwitchboardOptions {
  /** Defaults to data/guidance.json */
  guidance?: GuidanceProvider;
  issueStore?: IssueStore;
  transport?: TransportSecurity;
  /** Registered after the built-in agents; an id clash replaces the built-in */
  agents?: Agent[];
  /** Start the periodic health sweep */
  monitorHealth?: boolean;
  onProgress?: (message: string) => void;
}

export interface Switchboard {
  config: SwitchboardConfig;
  registry: AgentRegistry;
  manager: AgentManager;
  audit: AuditTrail;
  healthMonitor: HealthMonitor;
  pipeline: StoryPipeline;
  processRequest(input: AgentRequestInput): Promise<AgentResponse>;
  shutdown(): void;
}

/**
 * Wire the registry, dispatcher, built-in agents and health monitor.
 *
 * @throws RegistryIntegrityError if a canonical domain is left without an
 *   available agent
 */
export function createSwitchboard(
  config: SwitchboardConfig = DEFAULT_CONFIG,
  options: SwitchboardOptions = {}
): Switchboard {
  const onProgress = options.onProgress;
  const registry = new AgentRegistry();
  const audit = new AuditTrail(config.audit);
  const manager = new AgentManager({
    registry,
    config: config.dispatcher,
    audit,
    transport: options.transport,
    onProgress,
  });

  const pipeline = new StoryPipeline({ config: config.story, onProgress });
  const guidance = options.guidance ?? loadGuidance();

  for (const agent of createDomainAgents(guidance)) {
    manager.registerAgent(agent);
  }
  manager.registerAgent(createStoryAgent({ pipeline, issueStore: options.issueStore }));
  for (const agent of options.agents ?? []) {
    manager.registerAgent(agent);
  }

  registry.verifyDomainCoverage(CANONICAL_DOMAINS);
  onProgress?.(`Registered ${registry.getAll().length} agents`);

  const healthMonitor = new HealthMonitor({
    registry,
    agents: () => manager.listAgents(),
    config: config.healthCheck,
    onProgress,
  });
  if (options.monitorHealth) {
    healthMonitor.start();
  }

  return {
    config,
    registry,
    manager,
    audit,
    healthMonitor,
    pipeline,
    processRequest: (input) => manager.processRequest(input),
    shutdown: () => healthMonitor.stop(),
  };
}
