/**
 * Agent Contract Types
 *
 * An agent is a pair of plain functions (validate, execute) plus static
 * capability metadata. `defineAgent` in contract.ts composes the pair into
 * a consultable Agent; there is no base class to extend.
 */

import type {
  AgentContext,
  AgentRequest,
  AgentResponse,
  Permission,
} from '../../types/index.js';

export type AgentId = string;

/**
 * Static capability metadata for one registered agent
 */
export interface AgentDescriptor {
  readonly id: AgentId;
  /** Primary classification tag (normalized) */
  readonly domain: string;
  /** Normalized capability tags */
  readonly capabilities: ReadonlySet<string>;
  /** Mutated only by health checks */
  readonly available: boolean;
  /** Registration sequence number; earlier wins ties */
  readonly registeredAt: number;
}

export interface AgentDescriptorInput {
  id: AgentId;
  domain: string;
  capabilities?: Iterable<string>;
  available?: boolean;
}

/**
 * What an agent's execute step produces. Normalized into an AgentResponse
 * by the contract wrapper.
 */
export type AgentOutcome =
  | {
      status: 'SUCCESS';
      output: string;
      confidence: number;
      recommendations?: string[];
      context?: Record<string, unknown>;
    }
  | {
      status: 'FAILURE';
      category: 'validation' | 'handler_error' | 'loop_detected';
      errorMessage: string;
      output?: string;
      context?: Record<string, unknown>;
    };

/**
 * Everything needed to build an agent. TContext is the typed view the
 * agent extracts from the weakly-typed property map.
 */
export interface AgentDefinition<TContext> {
  id: AgentId;
  name: string;
  domain: string;
  capabilities: string[];
  /** Request types routed to this agent by exact match */
  types?: string[];
  /** Permissions required on top of the dispatcher's own */
  requiredPermissions?: Permission[];

  /** Returns an error message, or null when the request is acceptable */
  validate(request: AgentRequest): string | null;

  /** Must not throw on malformed properties; coerce to empty values instead */
  extractContext(context: AgentContext): TContext;

  /**
   * Produce the agent's outcome. The signal is aborted when the
   * dispatcher's budget runs out; honouring it is up to the agent.
   */
  execute(
    request: AgentRequest,
    context: TContext,
    signal: AbortSignal
  ): AgentOutcome | Promise<AgentOutcome>;

  /** Health probe; agents without one are always healthy */
  probe?(): boolean | Promise<boolean>;
}

/**
 * A consultable agent, as produced by defineAgent
 */
export interface Agent {
  readonly id: AgentId;
  readonly name: string;
  readonly domain: string;
  readonly capabilities: readonly string[];
  readonly types: readonly string[];
  readonly requiredPermissions: readonly Permission[];

  consult(request: AgentRequest, signal?: AbortSignal): Promise<AgentResponse>;
  probe(): Promise<boolean>;
}
