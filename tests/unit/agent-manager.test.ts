import { describe, it, expect, beforeEach } from 'vitest';
import { AgentManager } from '../../src/core/agent-manager.js';
import { AgentRegistry } from '../../src/core/agents/registry.js';
import { defineAgent, succeed } from '../../src/core/agents/contract.js';
import { createDomainAgents } from '../../src/core/agents/domain-agents.js';
import { loadGuidance } from '../../src/core/agents/guidance.js';
import { AuditTrail } from '../../src/core/audit-trail.js';
import type { Agent } from '../../src/core/agents/types.js';
import type { TransportSecurity } from '../../src/core/security.js';
import { parseAgentRequest, type AgentRequestInput } from '../../src/types/request.js';
import type { DispatcherConfig } from '../../src/types/config.js';

const config: DispatcherConfig = {
  discoveryBudgetMs: 1000,
  consultationBudgetMs: 2500,
  requiredPermissions: ['AGENT_READ', 'AGENT_EXECUTE'],
};

const credentials = {
  token: 'test-token',
  userId: 'user-1',
  permissions: ['AGENT_READ', 'AGENT_EXECUTE', 'DOMAIN_ACCESS'],
};

function request(overrides: Partial<AgentRequestInput> = {}): AgentRequestInput {
  return {
    description: 'How to implement caching?',
    type: 'implementation',
    context: { domain: 'implementation' },
    securityContext: credentials,
    ...overrides,
  };
}

function echoAgent(id: string, domain: string, types: string[] = []): Agent {
  return defineAgent({
    id,
    name: id,
    domain,
    capabilities: [],
    types,
    validate: () => null,
    extractContext: () => ({}),
    execute: () => succeed(`answered by ${id}`, 0.7),
  });
}

describe('AgentManager', () => {
  let registry: AgentRegistry;
  let audit: AuditTrail;
  let manager: AgentManager;

  beforeEach(() => {
    registry = new AgentRegistry();
    audit = new AuditTrail({ maxEntries: 100 });
    manager = new AgentManager({ registry, config, audit });
    for (const agent of createDomainAgents(loadGuidance())) {
      manager.registerAgent(agent);
    }
  });

  it('should answer an implementation question with full permissions', async () => {
    const response = await manager.processRequest(request());

    expect(response.status).toBe('SUCCESS');
    expect(response.success).toBe(true);
    expect(response.output).toBe('Implementation guidance: How to implement caching?');
    expect(response.confidence).toBe(0.8);
    expect(response.context.agentId).toBe('implementation-agent');
    expect(response.errorCategory).toBeNull();
    expect(Number.isInteger(response.processingTimeMs)).toBe(true);

    expect(audit.getEntries()).toHaveLength(1);
    expect(audit.getEntries()[0]).toMatchObject({
      agentType: 'implementation',
      userId: 'user-1',
      action: 'REQUEST_PROCESSED',
      success: true,
      category: null,
      agentId: 'implementation-agent',
    });
  });

  it('should refuse the same question without permissions', async () => {
    const response = await manager.processRequest(
      request({ securityContext: { token: 'test-token', userId: 'user-1', permissions: [] } })
    );

    expect(response.status).toBe('FAILURE');
    expect(response.errorCategory).toBe('authorization');
    expect(response.errorMessage).toBe(
      'Authorization failed: insufficient permissions (missing: AGENT_READ, AGENT_EXECUTE)'
    );
    expect(response.context.missingPermissions).toEqual(['AGENT_READ', 'AGENT_EXECUTE']);
    expect(audit.getEntries()[0]?.action).toBe('AUTHORIZATION_FAILED');
  });

  it('should report missing credentials as an authentication failure', async () => {
    const response = await manager.processRequest(
      request({ securityContext: { token: '', userId: 'user-1', permissions: credentials.permissions } })
    );

    expect(response.errorCategory).toBe('authorization');
    expect(response.errorMessage).toBe(
      'Authentication failed: missing credentials (token and userId are required)'
    );
    expect(audit.getEntries()[0]?.action).toBe('AUTHENTICATION_FAILED');
  });

  it('should reject a structurally invalid request', async () => {
    const response = await manager.processRequest(request({ description: '' }));

    expect(response.errorCategory).toBe('validation');
    expect(response.errorMessage).toBe('Invalid request: description is required');
    expect(audit.getEntries()[0]).toMatchObject({
      agentType: 'unknown',
      userId: 'unknown',
      action: 'VALIDATION_FAILED',
      success: false,
    });
  });

  it('should enforce agent-specific permissions', async () => {
    const response = await manager.processRequest(
      request({ type: 'testing', context: { domain: 'testing' } })
    );

    expect(response.errorCategory).toBe('authorization');
    expect(response.errorMessage).toBe(
      'Authorization failed: insufficient permissions for Testing Advisor (missing: TESTING_GUIDE)'
    );
    expect(response.context).toEqual({
      agentId: 'testing-agent',
      missingPermissions: ['TESTING_GUIDE'],
      errorCategory: 'authorization',
    });
    expect(audit.getEntries()[0]?.agentId).toBe('testing-agent');
  });

  it('should report when no agent matches', async () => {
    const response = await manager.processRequest(
      request({ type: 'quantum', context: { domain: 'physics' } })
    );

    expect(response.errorCategory).toBe('no_agent_available');
    expect(response.errorMessage).toBe("No agent available for type 'quantum' (domain 'physics')");
    expect(audit.getEntries()[0]?.action).toBe('NO_AGENT_AVAILABLE');
  });

  it('should prefer an exact type route over a better score', async () => {
    manager.registerAgent(echoAgent('auditor', 'documentation', ['audit']));
    manager.registerAgent(echoAgent('sec-reviewer', 'compliance'));

    const routed = await manager.processRequest(
      request({ type: 'audit', context: { domain: 'compliance' } })
    );
    expect(routed.output).toBe('answered by auditor');

    registry.setAvailability('auditor', false);
    const fallback = await manager.processRequest(
      request({ type: 'audit', context: { domain: 'compliance' } })
    );
    expect(fallback.output).toBe('answered by sec-reviewer');
  });

  it('should resolve the same agent for the same request', async () => {
    const input = request({
      type: 'advice',
      context: { domain: '', properties: { tags: ['caching', 'profiling'] } },
    });

    const first = await manager.processRequest(input);
    const second = await manager.processRequest(input);
    expect(first.context.agentId).toBe('performance-agent');
    expect(second.context.agentId).toBe('performance-agent');
  });

  it('should time out a slow agent', async () => {
    const slowManager = new AgentManager({
      registry: new AgentRegistry(),
      config: { ...config, consultationBudgetMs: 20 },
    });
    slowManager.registerAgent(
      defineAgent({
        id: 'slow',
        name: 'slow',
        domain: 'testing',
        capabilities: [],
        validate: () => null,
        extractContext: () => ({}),
        execute: () => new Promise<never>(() => undefined),
      })
    );

    const response = await slowManager.processRequest(
      request({ type: 'testing', context: { domain: 'testing' } })
    );

    expect(response.errorCategory).toBe('timeout');
    expect(response.errorMessage).toBe(
      "Consultation timed out: Agent 'slow' did not respond within 20ms"
    );
    expect(response.context.agentId).toBe('slow');
    expect(slowManager.getAuditTrail().getEntries()[0]).toMatchObject({
      action: 'REQUEST_FAILED',
      category: 'timeout',
    });
  });

  it('should contain an agent that throws from consult', async () => {
    const faulty: Agent = {
      ...echoAgent('faulty', 'chaos', ['chaos']),
      consult: async () => {
        throw new Error('kaboom');
      },
    };
    manager.registerAgent(faulty);

    const response = await manager.processRequest(
      request({ type: 'chaos', context: { domain: 'chaos' } })
    );

    expect(response.status).toBe('FAILURE');
    expect(response.errorCategory).toBe('handler_error');
    expect(response.errorMessage).toBe('Internal error: kaboom');
  });

  it('should answer within the latency envelope', async () => {
    const response = await manager.processRequest(request());

    expect(response.success).toBe(true);
    expect(response.processingTimeMs).toBeLessThan(3000);
  });

  it('should resolve an agent within the discovery budget', () => {
    const parsed = parseAgentRequest(
      request({ type: 'architecture-review', context: { domain: '', properties: { tags: ['caching'] } } })
    );
    if (!parsed.ok) {
      throw new Error(parsed.error);
    }

    const start = performance.now();
    const agent = manager.resolveAgent(parsed.request);
    const elapsed = performance.now() - start;

    expect(agent?.id).toBe('performance-agent');
    expect(elapsed).toBeLessThanOrEqual(1000);
  });

  it('should refuse a request that needs secure transport over an insecure channel', async () => {
    const insecure: TransportSecurity = { isSecure: () => false };
    const guarded = new AgentManager({ registry, config, audit, transport: insecure });
    for (const agent of createDomainAgents(loadGuidance())) {
      guarded.registerAgent(agent);
    }

    const refused = await guarded.processRequest(request({ requireSecureTransport: true }));
    expect(refused.success).toBe(false);
    expect(refused.errorCategory).toBe('authorization');
    expect(refused.errorMessage).toBe('Authorization failed: secure transport required');
    expect(audit.getEntries()[0]?.action).toBe('AUTHORIZATION_FAILED');

    const allowed = await guarded.processRequest(request());
    expect(allowed.success).toBe(true);
  });

  it('should ignore guidance topics inherited from Object.prototype', async () => {
    const inherited = await manager.processRequest(
      request({ context: { domain: 'implementation', properties: { topic: 'constructor' } } })
    );
    expect(inherited.confidence).toBe(0.8);
    expect(inherited.context.matchedTopics).toEqual([]);
    expect(inherited.recommendations).toEqual([
      'Keep functions small and single-purpose',
      'Refactor behind tests before changing behavior',
      'Prefer composition over inheritance for shared behavior',
    ]);
  });

  it('should round confidence after topic bonuses', async () => {
    const response = await manager.processRequest(
      request({ context: { domain: 'implementation', properties: { topic: 'refactoring' } } })
    );

    expect(response.confidence).toBe(0.85);
    expect(response.context.matchedTopics).toEqual(['refactoring']);
    expect(response.recommendations[0]).toBe('Change structure and behavior in separate commits');
  });

  it('should report progress through onProgress', async () => {
    const messages: string[] = [];
    const verbose = new AgentManager({
      registry: new AgentRegistry(),
      config,
      onProgress: (message) => messages.push(message),
    });
    verbose.registerAgent(echoAgent('echo', 'testing', ['testing']));

    await verbose.processRequest(request({ type: 'testing', context: { domain: 'testing' } }));
    expect(messages).toEqual(["Consulting echo for 'testing'"]);
  });
});
