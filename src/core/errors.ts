/**
 * Internal error types. None of these cross the dispatcher or pipeline
 * boundary: they are converted to AgentResponse / ProcessingResult data
 * there. RegistryIntegrityError and ConfigError are fatal at startup.
 */

export class RegistryIntegrityError extends Error {
  constructor(
    message: string,
    readonly uncoveredDomains: string[] = []
  ) {
    super(message);
    this.name = 'RegistryIntegrityError';
  }
}

export class ConsultationTimeoutError extends Error {
  constructor(
    readonly agentId: string,
    readonly budgetMs: number
  ) {
    super(`Agent '${agentId}' did not respond within ${budgetMs}ms`);
    this.name = 'ConsultationTimeoutError';
  }
}

export class IssueParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IssueParseError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
