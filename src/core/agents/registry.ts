/**
 * Agent Registry
 *
 * Store of agent descriptors. Supports domain lookup, scored best-match
 * selection and health snapshots.
 *
 * All operations are synchronous, so each one runs to completion on the
 * event loop before any other starts. Writes replace the stored
 * descriptor object rather than mutating it: a descriptor handed out by a
 * lookup never changes underneath its holder.
 *
 * Usage:
 * ```typescript
 * const registry = new AgentRegistry();
 * registry.register({ id: 'security-agent', domain: 'security', capabilities: ['threat-modeling'] });
 * registry.getAgentsForDomain('security');
 * registry.findBestAgent(request);
 * ```
 */

import type { AgentRequest, RegistryHealthStatus } from '../../types/index.js';
import { RegistryIntegrityError } from '../errors.js';
import { normalizeTag, requestTags, scoreAgent, toTagSet } from './scoring.js';
import type { AgentDescriptor, AgentDescriptorInput, AgentId } from './types.js';

export class AgentRegistry {
  private descriptors: Map<AgentId, AgentDescriptor> = new Map();
  private sequence: number = 0;

  /**
   * Register a descriptor. Re-registering an id replaces its metadata in
   * place and keeps its original registration order.
   *
   * @throws Error if the id or domain is empty
   */
  register(input: AgentDescriptorInput): AgentDescriptor {
    const id = input.id.trim();
    const domain = normalizeTag(input.domain);
    if (!id) {
      throw new Error('Agent descriptor requires a non-empty id');
    }
    if (!domain) {
      throw new Error(`Agent '${id}' requires a non-empty domain`);
    }

    const existing = this.descriptors.get(id);
    const descriptor: AgentDescriptor = Object.freeze({
      id,
      domain,
      capabilities: toTagSet(input.capabilities ?? []),
      available: input.available ?? existing?.available ?? true,
      registeredAt: existing?.registeredAt ?? ++this.sequence,
    });

    // Map.set on an existing key keeps its insertion position
    this.descriptors.set(id, descriptor);
    return descriptor;
  }

  get(id: AgentId): AgentDescriptor | undefined {
    return this.descriptors.get(id);
  }

  has(id: AgentId): boolean {
    return this.descriptors.has(id);
  }

  /**
   * All descriptors in registration order
   */
  getAll(): AgentDescriptor[] {
    return [...this.descriptors.values()].sort(byRegistration);
  }

  /**
   * Descriptors whose domain is `domain`, followed by those that list it
   * as a capability. Each tier is in registration order.
   */
  getAgentsForDomain(domain: string): AgentDescriptor[] {
    const tag = normalizeTag(domain);
    if (!tag) {
      return [];
    }

    const primary: AgentDescriptor[] = [];
    const secondary: AgentDescriptor[] = [];

    for (const descriptor of this.getAll()) {
      if (descriptor.domain === tag) {
        primary.push(descriptor);
      } else if (descriptor.capabilities.has(tag)) {
        secondary.push(descriptor);
      }
    }

    return [...primary, ...secondary];
  }

  /**
   * Highest-scoring available descriptor for the request, or null when
   * nothing is available or nothing scores above zero. Ties go to the
   * earliest registration, then the lexically smallest id.
   */
  findBestAgent(request: AgentRequest): AgentDescriptor | null {
    const tags = requestTags(request);
    const domain = normalizeTag(request.context.domain);

    let best: AgentDescriptor | null = null;
    let bestScore = 0;

    for (const descriptor of this.descriptors.values()) {
      if (!descriptor.available) {
        continue;
      }

      const score = scoreAgent(
        domain !== '' && descriptor.domain === domain,
        descriptor.capabilities,
        tags
      );

      if (score === 0) {
        continue;
      }

      if (
        best === null ||
        score > bestScore ||
        (score === bestScore && byRegistration(descriptor, best) < 0)
      ) {
        best = descriptor;
        bestScore = score;
      }
    }

    return best;
  }

  /**
   * Flip an agent's availability. Used only by health checks.
   *
   * @returns false if the id is unknown
   */
  setAvailability(id: AgentId, available: boolean): boolean {
    const existing = this.descriptors.get(id);
    if (!existing) {
      return false;
    }
    if (existing.available !== available) {
      this.descriptors.set(id, Object.freeze({ ...existing, available }));
    }
    return true;
  }

  getHealthStatus(): RegistryHealthStatus {
    let availableAgents = 0;
    for (const descriptor of this.descriptors.values()) {
      if (descriptor.available) {
        availableAgents++;
      }
    }
    const totalAgents = this.descriptors.size;
    return {
      totalAgents,
      availableAgents,
      unhealthyAgents: totalAgents - availableAgents,
    };
  }

  /**
   * Assert every domain has at least one available agent.
   *
   * @throws RegistryIntegrityError naming the uncovered domains
   */
  verifyDomainCoverage(domains: readonly string[]): void {
    const uncovered = domains.filter(
      (domain) => !this.getAgentsForDomain(domain).some((d) => d.available)
    );
    if (uncovered.length > 0) {
      throw new RegistryIntegrityError(
        `No available agent for domain(s): ${uncovered.join(', ')}`,
        uncovered
      );
    }
  }
}

function byRegistration(a: AgentDescriptor, b: AgentDescriptor): number {
  if (a.registeredAt !== b.registeredAt) {
    return a.registeredAt - b.registeredAt;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
