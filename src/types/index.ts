/**
 * Core types for the agent switchboard
 */

// ============================================================================
// Security Types
// ============================================================================

export const PERMISSIONS = [
  // Core agent operations
  'AGENT_READ',
  'AGENT_WRITE',
  'AGENT_EXECUTE',
  'AGENT_DELETE',
  'AGENT_ADMIN',
  // Service operations
  'SERVICE_READ',
  'SERVICE_WRITE',
  'SERVICE_INTEGRATION',
  // Configuration & secrets
  'CONFIG_MANAGE',
  'SECRETS_MANAGE',
  // Audit & compliance
  'AUDIT_READ',
  'AUDIT_MANAGE',
  // Specialized operations
  'SECURITY_VALIDATE',
  'PERFORMANCE_TEST',
  'DOMAIN_ACCESS',
  'DATASTORE_ACCESS',
  'QUALITY_ASSESS',
  'TESTING_GUIDE',
  'COLLABORATION_PROCESS',
  'SERVICE_MAP',
  'FALLBACK_SELECT',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

/**
 * Credentials and grants attached to every request. Frozen once built.
 */
export interface SecurityContext {
  readonly token: string;
  readonly userId: string;
  readonly roles: ReadonlySet<string>;
  readonly permissions: ReadonlySet<Permission>;
  readonly serviceId: string;
  readonly serviceType: string;
}

// ============================================================================
// Request Types
// ============================================================================

/** Values allowed in a context's property map */
export type ContextValue =
  | string
  | number
  | boolean
  | null
  | ContextValue[]
  | { [key: string]: ContextValue };

export type ContextProperties = Readonly<Record<string, ContextValue>>;

export interface AgentContext {
  readonly domain: string;
  readonly properties: ContextProperties;
}

export interface AgentRequest {
  readonly description: string;
  /** Tag used for exact-match dispatch */
  readonly type: string;
  readonly context: AgentContext;
  readonly securityContext: SecurityContext;
  readonly requireSecureTransport: boolean;
}

// ============================================================================
// Response Types
// ============================================================================

export type AgentStatus = 'SUCCESS' | 'FAILURE';

export type ErrorCategory =
  | 'validation'
  | 'authorization'
  | 'no_agent_available'
  | 'handler_error'
  | 'timeout'
  | 'loop_detected';

export interface AgentResponse {
  status: AgentStatus;
  /** Always agrees with status */
  success: boolean;
  output: string;
  /** Clamped to [0, 1] */
  confidence: number;
  recommendations: string[];
  context: Record<string, unknown>;
  errorMessage: string | null;
  errorCategory: ErrorCategory | null;
  processingTimeMs: number;
}

// ============================================================================
// Registry Types
// ============================================================================

export interface RegistryHealthStatus {
  totalAgents: number;
  availableAgents: number;
  unhealthyAgents: number;
}

// ============================================================================
// Audit Types
// ============================================================================

export type AuditAction =
  | 'REQUEST_PROCESSED'
  | 'REQUEST_FAILED'
  | 'VALIDATION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'AUTHORIZATION_FAILED'
  | 'NO_AGENT_AVAILABLE';

export interface AuditEntry {
  timestamp: string;
  /** Request type, or 'unknown' when the request failed validation */
  agentType: string;
  userId: string;
  action: AuditAction;
  success: boolean;
  category: ErrorCategory | null;
  /** Id of the agent that handled the request, if one was resolved */
  agentId: string | null;
}
