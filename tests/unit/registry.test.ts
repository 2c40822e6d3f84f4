import { describe, it, expect, beforeEach } from 'vitest';
import { AgentRegistry } from '../../src/core/agents/registry.js';
import { scoreAgent, requestTags, toTagSet } from '../../src/core/agents/scoring.js';
import { RegistryIntegrityError } from '../../src/core/errors.js';
import { createAgentContext, createSecurityContext } from '../../src/types/request.js';
import type { AgentRequest } from '../../src/types/index.js';

function makeRequest(
  type: string,
  domain: string,
  properties: Record<string, string | string[]> = {}
): AgentRequest {
  return {
    description: 'How should this be structured?',
    type,
    context: createAgentContext({ domain, properties }),
    securityContext: createSecurityContext({}),
    requireSecureTransport: false,
  };
}

describe('scoring', () => {
  it('should weight a domain match above any capability overlap', () => {
    const capabilities = toTagSet(['a', 'b', 'c']);
    expect(scoreAgent(true, new Set(), new Set(['x']))).toBe(10);
    expect(scoreAgent(false, capabilities, new Set(['a', 'b', 'c']))).toBe(3);
    expect(scoreAgent(true, capabilities, new Set(['a']))).toBe(11);
  });

  it('should normalize tags and drop blanks', () => {
    expect([...toTagSet([' Security ', '', 'AUTH'])]).toEqual(['security', 'auth']);
  });

  it('should collect tags from type, domain and context lists', () => {
    const tags = requestTags(
      makeRequest('Review', 'Testing', { tags: ['Mocks', 'tdd'], capabilities: 'fuzzing' })
    );
    expect([...tags]).toEqual(['review', 'testing', 'mocks', 'tdd', 'fuzzing']);
  });
});

describe('AgentRegistry', () => {
  let registry: AgentRegistry;

  beforeEach(() => {
    registry = new AgentRegistry();
  });

  it('should register and normalize descriptors', () => {
    const descriptor = registry.register({
      id: ' sec ',
      domain: 'Security',
      capabilities: ['Threat-Modeling'],
    });
    expect(descriptor.id).toBe('sec');
    expect(descriptor.domain).toBe('security');
    expect([...descriptor.capabilities]).toEqual(['threat-modeling']);
    expect(descriptor.available).toBe(true);
    expect(registry.has('sec')).toBe(true);
  });

  it('should reject an empty id or domain', () => {
    expect(() => registry.register({ id: '  ', domain: 'x' })).toThrow(
      'Agent descriptor requires a non-empty id'
    );
    expect(() => registry.register({ id: 'a', domain: ' ' })).toThrow(
      "Agent 'a' requires a non-empty domain"
    );
  });

  it('should replace metadata on re-registration and keep order', () => {
    registry.register({ id: 'a', domain: 'testing' });
    registry.register({ id: 'b', domain: 'testing' });
    registry.setAvailability('a', false);
    registry.register({ id: 'a', domain: 'security', capabilities: ['auth'] });

    const all = registry.getAll();
    expect(all.map((d) => d.id)).toEqual(['a', 'b']);
    expect(all[0]?.domain).toBe('security');
    expect(all[0]?.available).toBe(false);
  });

  it('should list primary domain agents before capability matches', () => {
    registry.register({ id: 'helper', domain: 'implementation', capabilities: ['testing'] });
    registry.register({ id: 'tester', domain: 'testing' });
    registry.register({ id: 'other', domain: 'deployment' });

    expect(registry.getAgentsForDomain('Testing').map((d) => d.id)).toEqual([
      'tester',
      'helper',
    ]);
    expect(registry.getAgentsForDomain('')).toEqual([]);
  });

  it('should pick the highest scoring available agent', () => {
    registry.register({ id: 'generic', domain: 'implementation', capabilities: ['security', 'auth'] });
    registry.register({ id: 'sec', domain: 'security' });

    const best = registry.findBestAgent(makeRequest('review', 'security', { tags: ['auth'] }));
    expect(best?.id).toBe('sec');
  });

  it('should break ties by registration order', () => {
    registry.register({ id: 'second', domain: 'testing' });
    registry.register({ id: 'first', domain: 'testing' });

    expect(registry.findBestAgent(makeRequest('x', 'testing'))?.id).toBe('second');
  });

  it('should skip unavailable agents and return null without a match', () => {
    registry.register({ id: 'sec', domain: 'security' });
    registry.setAvailability('sec', false);

    expect(registry.findBestAgent(makeRequest('review', 'security'))).toBeNull();
    expect(registry.findBestAgent(makeRequest('unrelated', 'none'))).toBeNull();
  });

  it('should not mutate descriptors already handed out', () => {
    const before = registry.register({ id: 'sec', domain: 'security' });
    registry.setAvailability('sec', false);

    expect(before.available).toBe(true);
    expect(registry.get('sec')?.available).toBe(false);
    expect(registry.setAvailability('missing', false)).toBe(false);
  });

  it('should report health counts', () => {
    registry.register({ id: 'a', domain: 'testing' });
    registry.register({ id: 'b', domain: 'security' });
    registry.setAvailability('b', false);

    expect(registry.getHealthStatus()).toEqual({
      totalAgents: 2,
      availableAgents: 1,
      unhealthyAgents: 1,
    });
  });

  it('should name uncovered domains on a coverage check', () => {
    registry.register({ id: 'a', domain: 'testing' });
    registry.register({ id: 'b', domain: 'security' });
    registry.setAvailability('b', false);

    try {
      registry.verifyDomainCoverage(['testing', 'security', 'deployment']);
      expect.fail('coverage check should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(RegistryIntegrityError);
      if (error instanceof RegistryIntegrityError) {
        expect(error.message).toBe('No available agent for domain(s): security, deployment');
        expect(error.uncoveredDomains).toEqual(['security', 'deployment']);
      }
    }
  });
});
