/**
 * Session Manager Unit Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_CONFIG, Errors, fail } from '@drover/core';
import { DriverPool, MemoryDriverFactory, type MemoryDriverOptions } from '@drover/session-pool';
import {
  SessionManager,
  classifyOutcome,
  createSessionManager,
  type ManagerEvent,
  type SessionManagerConfig,
} from '../../index.js';

const TARGET = 'https://shop.example.test';

describe('SessionManager', () => {
  let manager: SessionManager | undefined;

  function setup(
    maxSize: number,
    options: MemoryDriverOptions = {},
    config: Partial<SessionManagerConfig> = {}
  ) {
    const factory = new MemoryDriverFactory(options);
    const pool = new DriverPool(factory.create, {
      maxSize,
      leaseTimeoutMs: 5000,
      healthCheckIntervalMs: 0,
    });
    manager = new SessionManager(pool, { defaultTimeoutMs: 5000, drainTimeoutMs: 2000, ...config });
    return { factory, pool, manager };
  }

  afterEach(async () => {
    await manager?.shutdown();
    manager = undefined;
  });

  describe('lifecycle', () => {
    it('should refuse submissions before start', async () => {
      const { manager } = setup(1);

      const outcome = await manager.submit({ target: TARGET });

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('NOT_READY');
        expect(outcome.error.details).toEqual({ state: 'starting' });
      }
    });

    it('should warm the pool on start', async () => {
      const { manager, pool } = setup(3, {}, { warmupCount: 2 });

      await manager.start();

      expect(manager.state).toBe('ready');
      expect(pool.getStatus()).toMatchObject({ idle: 2, total: 2 });
    });

    it('should report state changes in order', async () => {
      const { manager } = setup(1);
      const events: ManagerEvent[] = [];
      manager.on((event) => events.push(event));

      await manager.start();
      await manager.shutdown();

      expect(
        events.filter((event) => event.type === 'state_changed').map((event) => event.details.to)
      ).toEqual(['ready', 'draining', 'stopped']);
    });
  });

  describe('submit', () => {
    it('should run tasks concurrently up to the pool size', async () => {
      const { manager, factory } = setup(2);
      await manager.start();

      const startedAt = Date.now();
      const outcomes = await Promise.all(
        Array.from({ length: 5 }, (_, i) =>
          manager.submit({ id: `task_${i}`, target: TARGET, actions: [{ type: 'wait', durationMs: 100 }] })
        )
      );
      const elapsed = Date.now() - startedAt;

      expect(outcomes.every((outcome) => outcome.success)).toBe(true);
      expect(factory.stats.peakRunning).toBe(2);
      expect(factory.stats.overlaps).toBe(0);
      expect(factory.stats.launched).toBe(2);
      expect(elapsed).toBeGreaterThanOrEqual(290);
    });

    it('should reject invalid input with INVALID_TASK', async () => {
      const { manager } = setup(1);
      await manager.start();

      const outcome = await manager.submit({ target: 'not a url' });

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('INVALID_TASK');
        expect(outcome.error.httpStatus).toBe(400);
      }
      expect(manager.healthCheck().submissions.invalid).toBe(1);
    });

    it('should apply the configured defaults', async () => {
      const { manager, factory } = setup(1, { behavior: () => 'crash' }, { defaultMaxRetries: 0 });
      await manager.start();

      const outcome = await manager.submit({ target: TARGET });

      expect(outcome.success).toBe(false);
      expect(factory.stats.executions).toBe(1);
    });

    it('should keep drivers exclusive under load with crashes', async () => {
      const { manager, factory, pool } = setup(3, {
        behavior: (call) => (call % 5 === 0 ? 'crash' : 'ok'),
      });
      await manager.start();

      const outcomes = await Promise.all(
        Array.from({ length: 20 }, (_, i) =>
          manager.submit({ target: TARGET, actions: [{ type: 'wait', durationMs: (i % 3) * 10 }] })
        )
      );

      for (const outcome of outcomes) {
        expect(outcome.success || outcome.error.code === 'DRIVER_CRASHED').toBe(true);
      }
      expect(factory.stats.overlaps).toBe(0);
      expect(factory.stats.peakRunning).toBeLessThanOrEqual(3);
      expect(pool.getStatus().activeLeases).toBe(0);
      expect(manager.healthCheck().inFlight).toBe(0);
    });
  });

  describe('healthCheck', () => {
    it('should report counts and pool status', async () => {
      const { manager } = setup(2, { behavior: (call) => (call === 2 ? { failAt: 0 } : 'ok') });
      await manager.start();

      await manager.submit({ target: TARGET });
      await manager.submit({ target: TARGET });
      const report = manager.healthCheck();

      expect(report).toMatchObject({ state: 'ready', ready: true, inFlight: 0 });
      expect(report.submissions).toMatchObject({ success: 1, action_failed: 1 });
      expect(report.pool).toMatchObject({ maxSize: 2, total: 1, idle: 1 });
      expect(report.executor.totalCompleted).toBe(1);
    });
  });

  describe('shutdown', () => {
    it('should drain in-flight tasks before closing drivers', async () => {
      const { manager, factory } = setup(1);
      await manager.start();

      const running = manager.submit({ target: TARGET, actions: [{ type: 'wait', durationMs: 100 }] });
      const stopped = manager.shutdown();

      expect(manager.state).toBe('draining');
      const refused = await manager.submit({ target: TARGET });
      expect(refused.success).toBe(false);
      if (!refused.success) {
        expect(refused.error.code).toBe('NOT_READY');
      }

      await stopped;
      const outcome = await running;
      expect(outcome.success).toBe(true);
      expect(manager.state).toBe('stopped');
      expect(factory.stats.closed).toBe(1);

      const late = await manager.submit({ target: TARGET });
      expect(late.success).toBe(false);
      if (!late.success) {
        expect(late.error.code).toBe('NOT_READY');
      }
    });

    it('should stop waiting once the drain timeout elapses', async () => {
      const { manager } = setup(1, {}, { drainTimeoutMs: 50 });
      await manager.start();

      const running = manager.submit({
        target: TARGET,
        actions: [{ type: 'wait', durationMs: 300 }, { type: 'click', selector: '#more' }],
        maxRetries: 0,
      });
      await new Promise((resolve) => setTimeout(resolve, 10));

      const startedAt = Date.now();
      await manager.shutdown();
      expect(Date.now() - startedAt).toBeLessThan(250);
      expect(manager.state).toBe('stopped');

      const outcome = await running;
      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('DRIVER_CRASHED');
      }
    });

    it('should be idempotent', async () => {
      const { manager } = setup(1);
      await manager.start();

      const first = manager.shutdown();
      const second = manager.shutdown();

      expect(second).toBe(first);
      await first;
      expect(manager.state).toBe('stopped');
    });
  });
});

describe('classifyOutcome', () => {
  it('should map error codes to outcome classes', () => {
    expect(classifyOutcome(fail(Errors.driverTimeout('drv_a', 50)))).toBe('timeout');
    expect(classifyOutcome(fail(Errors.poolExhausted(10)))).toBe('exhausted');
    expect(classifyOutcome(fail(Errors.poolClosed()))).toBe('closed');
    expect(classifyOutcome(fail(Errors.driverLaunchFailed(new Error('no chrome'))))).toBe('launch_failed');
    expect(classifyOutcome(fail(Errors.internalError('boom')))).toBe('error');
    expect(classifyOutcome({ success: true, value: null })).toBe('success');
  });
});

describe('createSessionManager', () => {
  it('should wire a working manager from configuration', async () => {
    const factory = new MemoryDriverFactory({ page: { h1: ['Catalog'] } });
    const created = createSessionManager(
      {
        ...DEFAULT_CONFIG,
        pool: { ...DEFAULT_CONFIG.pool, maxSize: 1, healthCheckIntervalMs: 0 },
        logging: { level: 'silent', pretty: false },
      },
      { driverFactory: factory.create }
    );
    await created.start();

    const outcome = await created.submit({ target: TARGET, extract: { heading: { selectors: ['h1'] } } });
    await created.shutdown();

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.value.data).toEqual({ heading: 'Catalog' });
    }
    expect(created.healthCheck().pool.maxSize).toBe(1);
    expect(factory.stats.closed).toBe(1);
  });
});
