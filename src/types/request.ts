import { z } from 'zod';
import {
  PERMISSIONS,
  type AgentContext,
  type AgentRequest,
  type ContextValue,
  type Permission,
  type SecurityContext,
} from './index.js';

/**
 * Zod schemas for inbound consultation requests
 */

const KNOWN_PERMISSIONS: ReadonlySet<string> = new Set(PERMISSIONS);

export function isPermission(value: string): value is Permission {
  return KNOWN_PERMISSIONS.has(value);
}

export const ContextValueSchema: z.ZodType<ContextValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ContextValueSchema),
    z.record(z.string(), ContextValueSchema),
  ])
);

/** Accepts either an array or a Set of strings */
const StringCollectionSchema = z.union([
  z.array(z.string()),
  z.set(z.string()),
]);

const RoleSetSchema = StringCollectionSchema.transform(
  (values) => new Set(values)
);

/** Unknown permission names are dropped, not rejected */
const PermissionSetSchema = StringCollectionSchema.transform((values) => {
  const granted = new Set<Permission>();
  for (const value of values) {
    if (isPermission(value)) {
      granted.add(value);
    }
  }
  return granted;
});

export const SecurityContextSchema = z.object({
  token: z.string().default(''),
  userId: z.string().default(''),
  roles: RoleSetSchema.default([]),
  permissions: PermissionSetSchema.default([]),
  serviceId: z.string().default(''),
  serviceType: z.string().default(''),
});

export const AgentContextSchema = z.object(
  {
    domain: z.string().default(''),
    properties: z.record(z.string(), ContextValueSchema).default({}),
  },
  { required_error: 'context is required' }
);

export const AgentRequestSchema = z.object({
  description: z
    .string({ required_error: 'description is required' })
    .trim()
    .min(1, 'description is required'),
  type: z
    .string({ required_error: 'type is required' })
    .trim()
    .min(1, 'type is required'),
  context: AgentContextSchema,
  securityContext: SecurityContextSchema.default({}),
  requireSecureTransport: z.boolean().default(false),
});

export type AgentRequestInput = z.input<typeof AgentRequestSchema>;
export type SecurityContextInput = z.input<typeof SecurityContextSchema>;
export type AgentContextInput = z.input<typeof AgentContextSchema>;

export type RequestParseResult =
  | { ok: true; request: AgentRequest }
  | { ok: false; error: string };

/**
 * Validate a raw payload and build a frozen request from it
 */
export function parseAgentRequest(input: unknown): RequestParseResult {
  const result = AgentRequestSchema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues.map((issue) =>
      issue.path.length > 0 && !issue.message.startsWith(String(issue.path[0]))
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    );
    return { ok: false, error: `Invalid request: ${messages.join('; ')}` };
  }

  const { description, type, context, securityContext, requireSecureTransport } =
    result.data;

  return {
    ok: true,
    request: Object.freeze({
      description,
      type,
      context: freezeContext(context),
      securityContext: freezeSecurityContext(securityContext),
      requireSecureTransport,
    }),
  };
}

/**
 * Build a frozen security context from loose input
 */
export function createSecurityContext(
  input: SecurityContextInput = {}
): SecurityContext {
  return freezeSecurityContext(SecurityContextSchema.parse(input));
}

/**
 * Build a frozen agent context from loose input
 */
export function createAgentContext(input: AgentContextInput): AgentContext {
  return freezeContext(AgentContextSchema.parse(input));
}

function freezeSecurityContext(
  context: z.output<typeof SecurityContextSchema>
): SecurityContext {
  return Object.freeze({
    token: context.token,
    userId: context.userId,
    roles: new Set(context.roles),
    permissions: new Set(context.permissions),
    serviceId: context.serviceId,
    serviceType: context.serviceType,
  });
}

function freezeContext(context: z.output<typeof AgentContextSchema>): AgentContext {
  const properties: Record<string, ContextValue> = {};
  for (const [key, value] of Object.entries(context.properties)) {
    properties[key] = deepFreeze(value);
  }
  return Object.freeze({
    domain: context.domain,
    properties: Object.freeze(properties),
  });
}

function deepFreeze(value: ContextValue): ContextValue {
  if (Array.isArray(value)) {
    const items = value.map(deepFreeze);
    Object.freeze(items);
    return items;
  }
  if (value !== null && typeof value === 'object') {
    const copy: Record<string, ContextValue> = {};
    for (const [key, nested] of Object.entries(value)) {
      copy[key] = deepFreeze(nested);
    }
    return Object.freeze(copy);
  }
  return value;
}
