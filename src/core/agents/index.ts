/**
 * Agent Framework
 *
 * Descriptors, the registry, the agent contract and the built-in agents.
 */

// Types
export type {
  Agent,
  AgentDefinition,
  AgentDescriptor,
  AgentDescriptorInput,
  AgentId,
  AgentOutcome,
} from './types.js';

// Registry
export { AgentRegistry } from './registry.js';
export {
  CAPABILITY_MATCH_WEIGHT,
  DOMAIN_MATCH_WEIGHT,
  normalizeTag,
  requestTags,
  scoreAgent,
} from './scoring.js';

// Contract
export { defineAgent, fail, succeed } from './contract.js';
export {
  clampConfidence,
  failureResponse,
  fromOutcome,
  normalizeResponse,
  successResponse,
} from './response.js';
export { readBoolean, readNumber, readRecord, readString, readStringList } from './context.js';

// Agent Implementations
export {
  CANONICAL_DOMAINS,
  createDomainAgents,
  type CanonicalDomain,
} from './domain-agents.js';
export { createStoryAgent, STORY_AGENT_ID, type StoryAgentOptions } from './story-agent.js';
export {
  findGuidanceFile,
  loadGuidance,
  StaticGuidanceProvider,
  type DomainGuidance,
  type GuidanceProvider,
} from './guidance.js';
