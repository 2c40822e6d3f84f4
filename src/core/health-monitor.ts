import type { HealthCheckConfig } from '../types/config.js';
import type { AgentRegistry } from './agents/registry.js';
import type { Agent, AgentId } from './agents/types.js';
import { errorMessage } from './errors.js';

export interface AgentHealth {
  agentId: AgentId;
  available: boolean;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  lastCheck: Date | null;
  latencyMs: number | null;
  error?: string;
}

export interface HealthMonitorOptions {
  registry: AgentRegistry;
  /** Agents to probe; read on every sweep */
  agents: () => readonly Agent[];
  config: HealthCheckConfig;
  onStatusChange?: (health: AgentHealth) => void;
  onProgress?: (message: string) => void;
}

/**
 * Periodic health sweep over registered agents.
 *
 * Each probe is bounded by config.timeoutMs; a timeout, a thrown error
 * and a false result all count as a failure. An agent is marked
 * unavailable after unhealthyThreshold consecutive failures and available
 * again after healthyThreshold consecutive successes. The registry's
 * availability flag is the only thing this class changes.
 */
export class HealthMonitor {
  private checks: Map<AgentId, AgentHealth> = new Map();
  private interval: NodeJS.Timeout | null = null;
  private sweeping: Promise<AgentHealth[]> | null = null;
  private options: HealthMonitorOptions;

  constructor(options: HealthMonitorOptions) {
    this.options = options;
  }

  /**
   * Start sweeping every config.intervalMs. The timer does not keep the
   * process alive.
   */
  start(): void {
    if (this.interval) {
      return;
    }
    this.interval = setInterval(() => {
      this.sweep().catch((error) => {
        this.log(`Health sweep failed: ${errorMessage(error)}`);
      });
    }, this.options.config.intervalMs);
    this.interval.unref();
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  /**
   * Probe every agent once. A sweep already in progress is shared rather
   * than overlapped.
   */
  async sweep(): Promise<AgentHealth[]> {
    if (this.sweeping) {
      return this.sweeping;
    }

    this.sweeping = Promise.all(
      this.options.agents().map((agent) => this.check(agent))
    ).finally(() => {
      this.sweeping = null;
    });

    return this.sweeping;
  }

  getHealth(agentId: AgentId): AgentHealth | undefined {
    const health = this.checks.get(agentId);
    return health ? { ...health } : undefined;
  }

  getAllHealth(): AgentHealth[] {
    return [...this.checks.values()].map((health) => ({ ...health }));
  }

  private async check(agent: Agent): Promise<AgentHealth> {
    const { registry, config } = this.options;
    const previous = this.checks.get(agent.id);
    const wasAvailable = registry.get(agent.id)?.available ?? previous?.available ?? true;

    const health: AgentHealth = previous ?? {
      agentId: agent.id,
      available: wasAvailable,
      consecutiveFailures: 0,
      consecutiveSuccesses: 0,
      lastCheck: null,
      latencyMs: null,
    };
    health.available = wasAvailable;
    this.checks.set(agent.id, health);

    const start = Date.now();
    try {
      const healthy = await this.probeWithTimeout(agent, config.timeoutMs);
      if (!healthy) {
        throw new Error('Health probe returned false');
      }

      health.latencyMs = Date.now() - start;
      health.consecutiveSuccesses++;
      health.consecutiveFailures = 0;
      health.error = undefined;

      if (!wasAvailable && health.consecutiveSuccesses >= config.healthyThreshold) {
        health.available = true;
      }
    } catch (error) {
      health.latencyMs = null;
      health.consecutiveFailures++;
      health.consecutiveSuccesses = 0;
      health.error = errorMessage(error);

      if (wasAvailable && health.consecutiveFailures >= config.unhealthyThreshold) {
        health.available = false;
      }
    }
    health.lastCheck = new Date();

    if (health.available !== wasAvailable) {
      registry.setAvailability(agent.id, health.available);
      this.log(
        `Agent ${agent.id} marked ${health.available ? 'available' : 'unavailable'}` +
          (health.error ? ` (${health.error})` : '')
      );
      this.options.onStatusChange?.({ ...health });
    }

    return { ...health };
  }

  private async probeWithTimeout(agent: Agent, timeoutMs: number): Promise<boolean> {
    let timeoutId: NodeJS.Timeout | null = null;
    try {
      return await Promise.race([
        agent.probe(),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(
            () => reject(new Error(`Health probe timed out after ${timeoutMs}ms`)),
            timeoutMs
          );
        }),
      ]);
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private log(message: string): void {
    this.options.onProgress?.(message);
  }
}
