import { z } from 'zod';
import { PERMISSIONS } from './index.js';

/**
 * Zod schema for .switchboard.yaml configuration validation
 */

export const DispatcherConfigSchema = z.object({
  /** Budget for agent discovery (type lookup + scoring) */
  discoveryBudgetMs: z.number().int().positive().default(1000),
  /** Budget for a full consultation, after which the agent is timed out */
  consultationBudgetMs: z.number().int().positive().default(2500),
  /** Permissions every consultation requires, whichever agent serves it */
  requiredPermissions: z
    .array(z.enum(PERMISSIONS))
    .default(['AGENT_READ', 'AGENT_EXECUTE']),
});

export const HealthCheckConfigSchema = z.object({
  intervalMs: z.number().int().positive().default(30000),
  timeoutMs: z.number().int().positive().default(1000),
  /** Consecutive failed probes before an agent is marked unavailable */
  unhealthyThreshold: z.number().int().positive().default(3),
  /** Consecutive successful probes before it is marked available again */
  healthyThreshold: z.number().int().positive().default(1),
});

export const StoryConfigSchema = z.object({
  /** Empty list accepts issues from any repository */
  allowedRepositories: z.array(z.string()).default([]),
  requiredTitleTags: z.array(z.string()).default(['[STORY]']),
  maxRewriteIterations: z.number().int().nonnegative().default(2),
  maxAcceptanceCriteria: z.number().int().positive().default(25),
  maxOpenQuestions: z.number().int().nonnegative().default(10),
  enableLoopDetection: z.boolean().default(true),
  stopOnUnsafeInference: z.boolean().default(true),
});

export const SwitchboardConfigSchema = z.object({
  dispatcher: DispatcherConfigSchema.default(() => ({
    discoveryBudgetMs: 1000,
    consultationBudgetMs: 2500,
    requiredPermissions: ['AGENT_READ' as const, 'AGENT_EXECUTE' as const],
  })),

  healthCheck: HealthCheckConfigSchema.default(() => ({
    intervalMs: 30000,
    timeoutMs: 1000,
    unhealthyThreshold: 3,
    healthyThreshold: 1,
  })),

  story: StoryConfigSchema.default(() => ({
    allowedRepositories: [],
    requiredTitleTags: ['[STORY]'],
    maxRewriteIterations: 2,
    maxAcceptanceCriteria: 25,
    maxOpenQuestions: 10,
    enableLoopDetection: true,
    stopOnUnsafeInference: true,
  })),

  audit: z
    .object({
      maxEntries: z.number().int().positive().default(1000),
    })
    .default(() => ({ maxEntries: 1000 })),
});

export type SwitchboardConfigInput = z.input<typeof SwitchboardConfigSchema>;
export type SwitchboardConfig = z.output<typeof SwitchboardConfigSchema>;
export type DispatcherConfig = SwitchboardConfig['dispatcher'];
export type HealthCheckConfig = SwitchboardConfig['healthCheck'];
export type StoryConfig = SwitchboardConfig['story'];

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: SwitchboardConfig = SwitchboardConfigSchema.parse({});
