import { performance } from 'node:perf_hooks';
import type {
  AgentRequest,
  AgentResponse,
  AuditAction,
  ErrorCategory,
} from '../types/index.js';
import type { DispatcherConfig } from '../types/config.js';
import { parseAgentRequest, type AgentRequestInput } from '../types/request.js';
import { AgentRegistry } from './agents/registry.js';
import { failureResponse, normalizeResponse } from './agents/response.js';
import { normalizeTag } from './agents/scoring.js';
import type { Agent, AgentId } from './agents/types.js';
import { AuditTrail } from './audit-trail.js';
import { ConsultationTimeoutError, errorMessage } from './errors.js';
import { SecurityGate, type TransportSecurity } from './security.js';

export interface AgentManagerOptions {
  registry: AgentRegistry;
  config: DispatcherConfig;
  audit?: AuditTrail;
  transport?: TransportSecurity;
  onProgress?: (message: string) => void;
}

/**
 * The dispatcher. Validates, authorizes, resolves, invokes and times each
 * consultation, and returns a contract-conforming AgentResponse.
 * processRequest never rejects: every failure is returned as data.
 *
 * Resolution: an exact match on the request type wins when that agent is
 * available; otherwise the registry's best-scoring agent is used.
 */
export class AgentManager {
  private registry: AgentRegistry;
  private config: DispatcherConfig;
  private audit: AuditTrail;
  private gate: SecurityGate;
  private agents: Map<AgentId, Agent> = new Map();
  private typeRoutes: Map<string, AgentId> = new Map();
  private options: AgentManagerOptions;

  constructor(options: AgentManagerOptions) {
    this.options = options;
    this.registry = options.registry;
    this.config = options.config;
    this.audit = options.audit ?? new AuditTrail({ maxEntries: 1000 });
    this.gate = new SecurityGate(options.config.requiredPermissions, options.transport);
  }

  /**
   * Register an agent: its descriptor goes to the registry and each of its
   * declared types is routed to it. Re-registering an id replaces it.
   */
  registerAgent(agent: Agent): void {
    this.agents.set(agent.id, agent);
    this.registry.register({
      id: agent.id,
      domain: agent.domain,
      capabilities: agent.capabilities,
    });
    for (const type of agent.types) {
      this.typeRoutes.set(normalizeTag(type), agent.id);
    }
  }

  getAgent(id: AgentId): Agent | undefined {
    return this.agents.get(id);
  }

  listAgents(): Agent[] {
    return [...this.agents.values()];
  }

  getRegistry(): AgentRegistry {
    return this.registry;
  }

  getAuditTrail(): AuditTrail {
    return this.audit;
  }

  /**
   * Process one consultation
   */
  async processRequest(input: AgentRequestInput): Promise<AgentResponse> {
    const start = performance.now();

    try {
      return await this.dispatch(input, start);
    } catch (error) {
      this.log(`Dispatcher fault: ${errorMessage(error)}`);
      return failureResponse({
        category: 'handler_error',
        errorMessage: `Internal error: ${errorMessage(error)}`,
        processingTimeMs: performance.now() - start,
      });
    }
  }

  /**
   * Resolve the agent that would serve a request, without invoking it
   */
  resolveAgent(request: AgentRequest): Agent | null {
    const routedId = this.typeRoutes.get(normalizeTag(request.type));
    if (routedId) {
      const descriptor = this.registry.get(routedId);
      const agent = this.agents.get(routedId);
      if (descriptor?.available && agent) {
        return agent;
      }
    }

    const best = this.registry.findBestAgent(request);
    return best ? this.agents.get(best.id) ?? null : null;
  }

  private async dispatch(input: AgentRequestInput, start: number): Promise<AgentResponse> {
    const elapsed = () => performance.now() - start;

    // 1. Structural validation
    const parsed = parseAgentRequest(input);
    if (!parsed.ok) {
      this.record('unknown', 'unknown', 'VALIDATION_FAILED', 'validation', null);
      return failureResponse({
        category: 'validation',
        errorMessage: parsed.error,
        processingTimeMs: elapsed(),
      });
    }

    const request = parsed.request;
    const userId = request.securityContext.userId || 'unknown';

    // 2. Security gate
    const decision = this.gate.check(request);
    if (!decision.allowed) {
      this.record(
        request.type,
        userId,
        decision.kind === 'authentication' ? 'AUTHENTICATION_FAILED' : 'AUTHORIZATION_FAILED',
        'authorization',
        null
      );
      return failureResponse({
        category: 'authorization',
        errorMessage: decision.message,
        context: { missingPermissions: decision.missing },
        processingTimeMs: elapsed(),
      });
    }

    // 3. Resolution
    const discoveryStart = performance.now();
    const agent = this.resolveAgent(request);
    const discoveryMs = performance.now() - discoveryStart;
    if (discoveryMs > this.config.discoveryBudgetMs) {
      this.log(
        `Discovery took ${Math.round(discoveryMs)}ms (budget ${this.config.discoveryBudgetMs}ms)`
      );
    }

    if (!agent) {
      this.record(request.type, userId, 'NO_AGENT_AVAILABLE', 'no_agent_available', null);
      return failureResponse({
        category: 'no_agent_available',
        errorMessage: `No agent available for type '${request.type}' (domain '${request.context.domain}')`,
        processingTimeMs: elapsed(),
      });
    }

    // 4. Agent-specific permissions
    const agentDecision = this.gate.checkPermissions(
      request.securityContext,
      agent.requiredPermissions,
      agent.name
    );
    if (!agentDecision.allowed) {
      this.record(request.type, userId, 'AUTHORIZATION_FAILED', 'authorization', agent.id);
      return failureResponse({
        category: 'authorization',
        errorMessage: agentDecision.message,
        context: { agentId: agent.id, missingPermissions: agentDecision.missing },
        processingTimeMs: elapsed(),
      });
    }

    // 5. Invoke under the consultation budget
    this.log(`Consulting ${agent.id} for '${request.type}'`);
    const response = await this.consultWithBudget(agent, request, elapsed);

    this.record(
      request.type,
      userId,
      response.success ? 'REQUEST_PROCESSED' : 'REQUEST_FAILED',
      response.errorCategory,
      agent.id
    );
    return response;
  }

  private async consultWithBudget(
    agent: Agent,
    request: AgentRequest,
    elapsed: () => number
  ): Promise<AgentResponse> {
    const budgetMs = this.config.consultationBudgetMs;
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | null = null;

    try {
      const response = await Promise.race([
        agent.consult(request, controller.signal),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(() => {
            controller.abort();
            reject(new ConsultationTimeoutError(agent.id, budgetMs));
          }, budgetMs);
        }),
      ]);

      return normalizeResponse(
        { ...response, context: { ...response.context, agentId: agent.id } },
        elapsed()
      );
    } catch (error) {
      const category: ErrorCategory =
        error instanceof ConsultationTimeoutError ? 'timeout' : 'handler_error';
      const message =
        error instanceof ConsultationTimeoutError
          ? `Consultation timed out: ${error.message}`
          : `Internal error: ${errorMessage(error)}`;
      this.log(message);
      return failureResponse({
        category,
        errorMessage: message,
        context: { agentId: agent.id },
        processingTimeMs: elapsed(),
      });
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private record(
    agentType: string,
    userId: string,
    action: AuditAction,
    category: ErrorCategory | null,
    agentId: AgentId | null
  ): void {
    this.audit.record({
      agentType,
      userId,
      action,
      success: action === 'REQUEST_PROCESSED',
      category,
      agentId,
    });
  }

  private log(message: string): void {
    this.options.onProgress?.(message);
  }
}
