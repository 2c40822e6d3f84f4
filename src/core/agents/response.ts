/**
 * Response Contract
 *
 * Every AgentResponse leaving the dispatcher is built here, so the
 * contract holds whatever an individual agent returns:
 * - status and success agree
 * - output is a string and recommendations a list, never null
 * - confidence is clamped to [0, 1]
 * - processingTimeMs is a non-negative integer
 * - a FAILURE carries an errorMessage and an errorCategory
 */

import type { AgentResponse, ErrorCategory } from '../../types/index.js';
import type { AgentOutcome } from './types.js';

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export function toProcessingTime(elapsedMs: number): number {
  if (!Number.isFinite(elapsedMs) || elapsedMs < 0) {
    return 0;
  }
  return Math.round(elapsedMs);
}

export function successResponse(options: {
  output: string;
  confidence: number;
  recommendations?: string[];
  context?: Record<string, unknown>;
  processingTimeMs: number;
}): AgentResponse {
  return {
    status: 'SUCCESS',
    success: true,
    output: options.output,
    confidence: clampConfidence(options.confidence),
    recommendations: [...(options.recommendations ?? [])],
    context: { ...(options.context ?? {}) },
    errorMessage: null,
    errorCategory: null,
    processingTimeMs: toProcessingTime(options.processingTimeMs),
  };
}

export function failureResponse(options: {
  category: ErrorCategory;
  errorMessage: string;
  output?: string;
  context?: Record<string, unknown>;
  processingTimeMs: number;
}): AgentResponse {
  const errorMessage = options.errorMessage.trim() || `Request failed (${options.category})`;
  return {
    status: 'FAILURE',
    success: false,
    output: options.output ?? errorMessage,
    confidence: 0,
    recommendations: [],
    context: { ...(options.context ?? {}), errorCategory: options.category },
    errorMessage,
    errorCategory: options.category,
    processingTimeMs: toProcessingTime(options.processingTimeMs),
  };
}

/**
 * Turn an agent's outcome into a contract-conforming response
 */
export function fromOutcome(outcome: AgentOutcome, processingTimeMs: number): AgentResponse {
  if (outcome.status === 'SUCCESS') {
    return successResponse({
      output: typeof outcome.output === 'string' ? outcome.output : '',
      confidence: outcome.confidence,
      recommendations: Array.isArray(outcome.recommendations)
        ? outcome.recommendations.filter((r) => typeof r === 'string')
        : [],
      context: outcome.context,
      processingTimeMs,
    });
  }

  return failureResponse({
    category: outcome.category,
    errorMessage: outcome.errorMessage,
    output: outcome.output,
    context: outcome.context,
    processingTimeMs,
  });
}

/**
 * Re-apply the contract to a response produced elsewhere, stamping the
 * dispatcher's own elapsed time.
 */
export function normalizeResponse(
  response: AgentResponse,
  processingTimeMs: number
): AgentResponse {
  const context = response.context ?? {};

  if (response.status === 'SUCCESS' && response.success) {
    return successResponse({
      output: typeof response.output === 'string' ? response.output : '',
      confidence: response.confidence,
      recommendations: Array.isArray(response.recommendations)
        ? response.recommendations
        : [],
      context,
      processingTimeMs,
    });
  }

  return failureResponse({
    category: response.errorCategory ?? 'handler_error',
    errorMessage:
      response.errorMessage ??
      (response.status === 'SUCCESS'
        ? 'Agent reported SUCCESS status with success=false'
        : 'Agent failed without an error message'),
    output: typeof response.output === 'string' ? response.output : undefined,
    context,
    processingTimeMs,
  });
}
