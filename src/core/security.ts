import type { AgentRequest, Permission, SecurityContext } from '../types/index.js';

/**
 * Abstract transport-security contract. Checked when a request sets
 * requireSecureTransport; no network operation is involved.
 */
export interface TransportSecurity {
  isSecure(request: AgentRequest): boolean;
}

/** Reports every channel as secure (in-process callers) */
export const trustedTransport: TransportSecurity = {
  isSecure: () => true,
};

export type SecurityDecision =
  | { allowed: true }
  | {
      allowed: false;
      kind: 'authentication' | 'authorization' | 'transport';
      message: string;
      missing: Permission[];
    };

/**
 * Permissions in `required` that the context does not grant
 */
export function missingPermissions(
  context: SecurityContext,
  required: readonly Permission[]
): Permission[] {
  return required.filter((permission) => !context.permissions.has(permission));
}

/**
 * Deny-by-default gate run before any agent is invoked
 */
export class SecurityGate {
  constructor(
    private requiredPermissions: readonly Permission[],
    private transport: TransportSecurity = trustedTransport
  ) {}

  /**
   * Credentials, operation permissions and transport
   */
  check(request: AgentRequest): SecurityDecision {
    const { securityContext } = request;

    if (!securityContext.token.trim() || !securityContext.userId.trim()) {
      return {
        allowed: false,
        kind: 'authentication',
        message: 'Authentication failed: missing credentials (token and userId are required)',
        missing: [],
      };
    }

    const permissionDecision = this.checkPermissions(
      securityContext,
      this.requiredPermissions
    );
    if (!permissionDecision.allowed) {
      return permissionDecision;
    }

    if (request.requireSecureTransport && !this.transport.isSecure(request)) {
      return {
        allowed: false,
        kind: 'transport',
        message: 'Authorization failed: secure transport required',
        missing: [],
      };
    }

    return { allowed: true };
  }

  /**
   * The context must grant every permission in `required`
   */
  checkPermissions(
    context: SecurityContext,
    required: readonly Permission[],
    target?: string
  ): SecurityDecision {
    const missing = missingPermissions(context, required);
    if (missing.length === 0) {
      return { allowed: true };
    }
    const scope = target ? ` for ${target}` : '';
    return {
      allowed: false,
      kind: 'authorization',
      message: `Authorization failed: insufficient permissions${scope} (missing: ${missing.join(', ')})`,
      missing,
    };
  }
}
