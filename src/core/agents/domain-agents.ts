/**
 * Domain Advisory Agents
 *
 * One agent per canonical domain. Each returns the domain's guidance from
 * the GuidanceProvider, with topic-specific advice first when the request
 * names a topic the domain knows about.
 */

import type { AgentRequest, Permission } from '../../types/index.js';
import { readString, readStringList } from './context.js';
import { defineAgent, fail, succeed } from './contract.js';
import type { GuidanceProvider } from './guidance.js';
import { normalizeTag } from './scoring.js';
import type { Agent } from './types.js';

export const CANONICAL_DOMAINS = [
  'architecture',
  'implementation',
  'testing',
  'deployment',
  'observability',
  'security',
  'performance',
  'documentation',
] as const;

export type CanonicalDomain = (typeof CANONICAL_DOMAINS)[number];

export const MAX_DESCRIPTION_LENGTH = 10000;
const TOPIC_CONFIDENCE_BONUS = 0.05;
const MAX_CONFIDENCE = 0.95;

interface DomainAgentProfile {
  domain: CanonicalDomain;
  name: string;
  capabilities: string[];
  requiredPermissions: Permission[];
}

const DOMAIN_AGENT_PROFILES: DomainAgentProfile[] = [
  {
    domain: 'architecture',
    name: 'Architecture Advisor',
    capabilities: ['system-design', 'pattern-selection', 'technology-stack', 'architectural-review', 'scalability-design'],
    requiredPermissions: ['DOMAIN_ACCESS'],
  },
  {
    domain: 'implementation',
    name: 'Implementation Advisor',
    capabilities: ['code-implementation', 'best-practices', 'refactoring', 'code-quality', 'design-patterns'],
    requiredPermissions: ['DOMAIN_ACCESS'],
  },
  {
    domain: 'testing',
    name: 'Testing Advisor',
    capabilities: ['test-strategy', 'unit-testing', 'integration-testing', 'test-automation', 'tdd-bdd'],
    requiredPermissions: ['TESTING_GUIDE'],
  },
  {
    domain: 'deployment',
    name: 'Deployment Advisor',
    capabilities: ['deployment-strategy', 'rollback-procedures', 'blue-green-deployment', 'canary-releases', 'infrastructure-automation'],
    requiredPermissions: ['DOMAIN_ACCESS'],
  },
  {
    domain: 'observability',
    name: 'Observability Advisor',
    capabilities: ['monitoring', 'logging', 'tracing', 'metrics', 'alerting'],
    requiredPermissions: ['DOMAIN_ACCESS'],
  },
  {
    domain: 'security',
    name: 'Security Advisor',
    capabilities: ['security-analysis', 'vulnerability-assessment', 'authentication', 'authorization', 'encryption'],
    requiredPermissions: ['SECURITY_VALIDATE'],
  },
  {
    domain: 'performance',
    name: 'Performance Advisor',
    capabilities: ['performance-testing', 'load-testing', 'profiling', 'caching', 'capacity-planning'],
    requiredPermissions: ['DOMAIN_ACCESS'],
  },
  {
    domain: 'documentation',
    name: 'Documentation Advisor',
    capabilities: ['api-documentation', 'code-documentation', 'user-guides', 'technical-writing', 'documentation-generation'],
    requiredPermissions: ['DOMAIN_ACCESS'],
  },
];

interface DomainContext {
  topics: string[];
  serviceName: string;
}

function validateDescription(request: AgentRequest): string | null {
  if (request.description.length > MAX_DESCRIPTION_LENGTH) {
    return `Description exceeds ${MAX_DESCRIPTION_LENGTH} characters`;
  }
  return null;
}

function roundConfidence(value: number): number {
  return Math.round(value * 100) / 100;
}

function createDomainAgent(profile: DomainAgentProfile, guidance: GuidanceProvider): Agent {
  return defineAgent<DomainContext>({
    id: `${profile.domain}-agent`,
    name: profile.name,
    domain: profile.domain,
    capabilities: profile.capabilities,
    types: [profile.domain],
    requiredPermissions: profile.requiredPermissions,

    validate: validateDescription,

    extractContext: (context) => {
      const topics = [
        readString(context.properties, 'topic'),
        ...readStringList(context.properties, 'topics'),
        ...readStringList(context.properties, 'tags'),
      ]
        .map(normalizeTag)
        .filter((topic) => topic.length > 0);

      return {
        topics: [...new Set(topics)],
        serviceName: readString(context.properties, 'serviceName'),
      };
    },

    execute: (request, ctx, signal) => {
      if (signal.aborted) {
        return fail('handler_error', 'Consultation aborted');
      }

      const domainGuidance = guidance.getGuidance(profile.domain);
      if (!domainGuidance) {
        return fail('handler_error', `No guidance available for domain '${profile.domain}'`);
      }

      const matchedTopics = ctx.topics.filter((topic) =>
        Object.hasOwn(domainGuidance.topics, topic)
      );
      const topicAdvice = matchedTopics.map((topic) => domainGuidance.topics[topic]);
      const service = ctx.serviceName ? ` (service: ${ctx.serviceName})` : '';

      return succeed(
        `${domainGuidance.summary}: ${request.description}${service}`,
        roundConfidence(
          Math.min(
            MAX_CONFIDENCE,
            domainGuidance.confidence + TOPIC_CONFIDENCE_BONUS * matchedTopics.length
          )
        ),
        [...topicAdvice, ...domainGuidance.recommendations],
        { domain: profile.domain, matchedTopics }
      );
    },

    probe: () => guidance.getGuidance(profile.domain) !== null,
  });
}

/**
 * Build the advisory agent for every canonical domain
 */
export function createDomainAgents(guidance: GuidanceProvider): Agent[] {
  return DOMAIN_AGENT_PROFILES.map((profile) => createDomainAgent(profile, guidance));
}
