import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthMonitor, type AgentHealth } from '../../src/core/health-monitor.js';
import { AgentRegistry } from '../../src/core/agents/registry.js';
import { defineAgent, succeed } from '../../src/core/agents/contract.js';
import type { Agent } from '../../src/core/agents/types.js';
import type { HealthCheckConfig } from '../../src/types/config.js';

const config: HealthCheckConfig = {
  intervalMs: 1000,
  timeoutMs: 50,
  unhealthyThreshold: 2,
  healthyThreshold: 1,
};

function probedAgent(id: string, probe: () => boolean | Promise<boolean>): Agent {
  return defineAgent({
    id,
    name: id,
    domain: 'testing',
    capabilities: [],
    validate: () => null,
    extractContext: () => ({}),
    execute: () => succeed('ok', 1),
    probe,
  });
}

describe('HealthMonitor', () => {
  let registry: AgentRegistry;
  let healthy: boolean;
  let agent: Agent;
  let changes: AgentHealth[];
  let monitor: HealthMonitor;

  beforeEach(() => {
    registry = new AgentRegistry();
    healthy = true;
    agent = probedAgent('flaky', () => healthy);
    registry.register({ id: agent.id, domain: agent.domain });
    changes = [];
    monitor = new HealthMonitor({
      registry,
      agents: () => [agent],
      config,
      onStatusChange: (health) => changes.push(health),
    });
  });

  afterEach(() => {
    monitor.stop();
    vi.useRealTimers();
  });

  it('should record a successful probe', async () => {
    const [health] = await monitor.sweep();

    expect(health?.available).toBe(true);
    expect(health?.consecutiveSuccesses).toBe(1);
    expect(health?.error).toBeUndefined();
    expect(health?.lastCheck).toBeInstanceOf(Date);
    expect(changes).toEqual([]);
  });

  it('should mark an agent unavailable only after consecutive failures', async () => {
    healthy = false;

    await monitor.sweep();
    expect(registry.get('flaky')?.available).toBe(true);
    expect(monitor.getHealth('flaky')?.consecutiveFailures).toBe(1);

    await monitor.sweep();
    expect(registry.get('flaky')?.available).toBe(false);
    expect(monitor.getHealth('flaky')?.error).toBe('Health probe returned false');
    expect(changes).toHaveLength(1);
    expect(changes[0]?.available).toBe(false);
  });

  it('should restore an agent once it recovers', async () => {
    healthy = false;
    await monitor.sweep();
    await monitor.sweep();
    expect(registry.get('flaky')?.available).toBe(false);

    healthy = true;
    await monitor.sweep();
    expect(registry.get('flaky')?.available).toBe(true);
    expect(changes.map((c) => c.available)).toEqual([false, true]);
  });

  it('should count a probe that hangs as a failure', async () => {
    agent = probedAgent('flaky', () => new Promise<boolean>(() => undefined));

    const [health] = await monitor.sweep();
    expect(health?.consecutiveFailures).toBe(1);
    expect(health?.error).toBe('Health probe timed out after 50ms');
    expect(health?.latencyMs).toBeNull();
  });

  it('should count a throwing probe as a failure', async () => {
    agent = probedAgent('flaky', () => {
      throw new Error('probe crashed');
    });

    const [health] = await monitor.sweep();
    expect(health?.error).toBe('probe crashed');
  });

  it('should sweep on its interval once started', async () => {
    vi.useFakeTimers();
    const probe = vi.fn(() => true);
    agent = probedAgent('flaky', probe);

    monitor.start();
    expect(monitor.isRunning()).toBe(true);

    await vi.advanceTimersByTimeAsync(config.intervalMs * 3);
    expect(probe).toHaveBeenCalledTimes(3);

    monitor.stop();
    expect(monitor.isRunning()).toBe(false);
    await vi.advanceTimersByTimeAsync(config.intervalMs * 3);
    expect(probe).toHaveBeenCalledTimes(3);
  });

  it('should share a sweep already in progress', async () => {
    const probe = vi.fn(() => true);
    agent = probedAgent('flaky', probe);

    const [first, second] = await Promise.all([monitor.sweep(), monitor.sweep()]);
    expect(probe).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
    expect(monitor.getAllHealth()).toHaveLength(1);
  });
});
