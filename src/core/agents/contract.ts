/**
 * Agent Contract
 *
 * Composes an agent's validate and execute functions into a consultable
 * Agent:
 *
 * ```typescript
 * const agent = defineAgent({
 *   id: 'testing-agent',
 *   name: 'Testing Advisor',
 *   domain: 'testing',
 *   capabilities: ['unit-testing', 'contract-testing'],
 *   validate: () => null,
 *   extractContext: (context) => ({ framework: readString(context.properties, 'framework') }),
 *   execute: (request, ctx) => succeed(`Use ${ctx.framework}`, 0.8),
 * });
 * const response = await agent.consult(request);
 * ```
 */

import { performance } from 'node:perf_hooks';
import type { AgentRequest, AgentResponse } from '../../types/index.js';
import { errorMessage } from '../errors.js';
import { failureResponse, fromOutcome } from './response.js';
import type { Agent, AgentDefinition, AgentOutcome } from './types.js';

/**
 * Build a SUCCESS outcome
 */
export function succeed(
  output: string,
  confidence: number,
  recommendations: string[] = [],
  context: Record<string, unknown> = {}
): AgentOutcome {
  return { status: 'SUCCESS', output, confidence, recommendations, context };
}

/**
 * Build a FAILURE outcome
 */
export function fail(
  category: 'validation' | 'handler_error' | 'loop_detected',
  message: string,
  extra: { output?: string; context?: Record<string, unknown> } = {}
): AgentOutcome {
  return { status: 'FAILURE', category, errorMessage: message, ...extra };
}

/**
 * Wrap a definition into an Agent. validate always runs first; when it
 * rejects, execute is never called, but the time spent validating is
 * still reported.
 */
export function defineAgent<TContext>(definition: AgentDefinition<TContext>): Agent {
  const consult = async (
    request: AgentRequest,
    signal: AbortSignal = new AbortController().signal
  ): Promise<AgentResponse> => {
    const start = performance.now();
    const elapsed = () => performance.now() - start;

    let validationError: string | null;
    try {
      validationError = definition.validate(request);
    } catch (error) {
      validationError = `Validation error: ${errorMessage(error)}`;
    }

    if (validationError !== null) {
      return failureResponse({
        category: 'validation',
        errorMessage: validationError,
        processingTimeMs: elapsed(),
      });
    }

    try {
      const context = definition.extractContext(request.context);
      const outcome = await definition.execute(request, context, signal);
      return fromOutcome(outcome, elapsed());
    } catch (error) {
      return failureResponse({
        category: 'handler_error',
        errorMessage: `Internal error: ${errorMessage(error)}`,
        processingTimeMs: elapsed(),
      });
    }
  };

  const probe = async (): Promise<boolean> => {
    if (!definition.probe) {
      return true;
    }
    return definition.probe();
  };

  return Object.freeze({
    id: definition.id,
    name: definition.name,
    domain: definition.domain,
    capabilities: Object.freeze([...definition.capabilities]),
    types: Object.freeze([...(definition.types ?? [])]),
    requiredPermissions: Object.freeze([...(definition.requiredPermissions ?? [])]),
    consult,
    probe,
  });
}
