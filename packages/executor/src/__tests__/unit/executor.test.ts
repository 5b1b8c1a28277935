/**
 * Executor Unit Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { createTask, type TaskInput } from '@drover/core';
import { DriverPool, MemoryDriverFactory, type MemoryDriverOptions } from '@drover/session-pool';
import { TaskExecutor, createTaskExecutor, type ExecutorEvent } from '../../index.js';

const DEFAULTS = { timeoutMs: 1000, maxRetries: 1 };

function makeTask(input: Partial<TaskInput> = {}) {
  return createTask({ id: 'task_1', target: 'https://shop.example.test', ...input }, DEFAULTS);
}

describe('TaskExecutor', () => {
  let pool: DriverPool | undefined;

  function setup(options: MemoryDriverOptions = {}, maxSize = 1) {
    const factory = new MemoryDriverFactory(options);
    pool = new DriverPool(factory.create, { maxSize, leaseTimeoutMs: 200, healthCheckIntervalMs: 0 });
    const executor = new TaskExecutor();
    const events: ExecutorEvent[] = [];
    executor.on((event) => events.push(event));
    return { factory, pool, executor, events };
  }

  afterEach(async () => {
    await pool?.shutdown();
    pool = undefined;
  });

  describe('run', () => {
    it('should return extracted data with metadata', async () => {
      const { pool, executor } = setup({ page: { h1: ['Weekly deals'] } });

      const outcome = await executor.run(makeTask({ extract: { title: { selectors: ['h1'] } } }), pool);

      expect(outcome.success).toBe(true);
      if (outcome.success) {
        expect(outcome.value.taskId).toBe('task_1');
        expect(outcome.value.data).toEqual({ title: 'Weekly deals' });
        expect(outcome.value.metadata).toMatchObject({ retryCount: 0, attempts: 1 });
        expect(outcome.value.metadata.handleId).toBe(pool.getHandles()[0]?.id);
      }
      expect(pool.getStatus()).toMatchObject({ idle: 1, activeLeases: 0 });
    });

    it('should retry a crash once on a fresh driver', async () => {
      const { factory, pool, executor, events } = setup({
        behavior: (call) => (call === 1 ? 'crash' : 'ok'),
      });

      const outcome = await executor.run(makeTask(), pool);

      expect(outcome.success).toBe(true);
      if (outcome.success) {
        expect(outcome.value.metadata.retryCount).toBe(1);
        expect(outcome.value.metadata.attempts).toBe(2);
        expect(outcome.value.metadata.handleId).toBe(factory.handles[1]?.id);
      }
      expect(factory.stats.launched).toBe(2);
      expect(events.map((event) => event.type)).toEqual([
        'attempt_started',
        'attempt_failed',
        'task_retry',
        'attempt_started',
        'task_completed',
      ]);
    });

    it('should surface a second crash with the attempt history', async () => {
      const { pool, executor } = setup({ behavior: () => 'crash' });

      const outcome = await executor.run(makeTask(), pool);

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('DRIVER_CRASHED');
        const attempts = outcome.error.details?.attempts;
        expect(Array.isArray(attempts) ? attempts.length : 0).toBe(2);
        expect(attempts).toMatchObject([
          { attempt: 0, outcome: 'DRIVER_CRASHED' },
          { attempt: 1, outcome: 'DRIVER_CRASHED' },
        ]);
      }
      expect(executor.getStats()).toMatchObject({ totalFailed: 1, totalRetries: 1, totalAttempts: 2 });
    });

    it('should not retry a crash when the retry budget is zero', async () => {
      const { factory, pool, executor } = setup({ behavior: () => 'crash' });

      const outcome = await executor.run(makeTask({ maxRetries: 0 }), pool);

      expect(outcome.success).toBe(false);
      expect(factory.stats.executions).toBe(1);
    });

    it('should return a timeout without retrying and release the driver at once', async () => {
      let executeStartedAt = 0;
      let releasedAt = 0;
      const { factory, pool, executor } = setup({
        probeDelayMs: 20,
        behavior: () => {
          executeStartedAt = Date.now();
          return 'ok';
        },
      });
      const release = pool.release.bind(pool);
      vi.spyOn(pool, 'release').mockImplementation((lease, options) => {
        releasedAt = Date.now();
        return release(lease, options);
      });

      const outcome = await executor.run(
        makeTask({ actions: [{ type: 'wait', durationMs: 500 }], timeoutMs: 50 }),
        pool
      );

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('DRIVER_TIMEOUT');
        expect(outcome.error.httpStatus).toBe(504);
      }
      // Released within 10ms of the 50ms budget elapsing
      expect(releasedAt - executeStartedAt).toBeGreaterThanOrEqual(45);
      expect(releasedAt - executeStartedAt).toBeLessThan(60);
      expect(factory.stats.executions).toBe(1);
      expect(pool.getStatus()).toMatchObject({ activeLeases: 0, probing: 1 });

      await pool.settle();
      expect(pool.getStatus().idle).toBe(1);
    });

    it('should not retry an action failure', async () => {
      const { factory, pool, executor } = setup({ behavior: () => ({ failAt: 0, message: 'net::ERR_NAME_NOT_RESOLVED' }) });

      const outcome = await executor.run(makeTask(), pool);

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('ACTION_FAILED');
        expect(outcome.error.details).toMatchObject({ step: 0, action: 'navigate' });
      }
      expect(factory.stats.executions).toBe(1);
    });

    it('should turn an unexpected fault into INTERNAL_ERROR and verify the driver', async () => {
      const { pool, executor } = setup({ behavior: () => 'fault', probeDelayMs: 20 });

      const outcome = await executor.run(makeTask(), pool);

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('INTERNAL_ERROR');
        expect(outcome.error.message).toBe('Unexpected fault running task task_1: Injected fault in execution 1');
      }
      expect(pool.getStatus()).toMatchObject({ activeLeases: 0, probing: 1 });
    });

    it('should recover the driver after a fault mid-task', async () => {
      const { factory, pool, executor } = setup({ behavior: () => ({ faultAt: 2 }) });

      const outcome = await executor.run(
        makeTask({
          actions: [
            { type: 'navigate' },
            { type: 'click', selector: '#search' },
            { type: 'type', selector: '#search', text: 'boots' },
          ],
        }),
        pool
      );

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('INTERNAL_ERROR');
        expect(outcome.error.message).toBe(
          'Unexpected fault running task task_1: Injected fault at step 2 of execution 1'
        );
      }
      expect(factory.stats.visited).toEqual(['https://shop.example.test']);

      await pool.settle();
      expect(pool.getStatus()).toMatchObject({ idle: 1, busy: 0, probing: 0, activeLeases: 0 });
      expect(factory.stats.launched).toBe(1);
    });

    it('should surface pool exhaustion without retrying', async () => {
      const { pool } = setup();
      const executor = createTaskExecutor({ leaseTimeoutMs: 30 });
      const held = await pool.lease();

      const outcome = await executor.run(makeTask(), pool);

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('POOL_EXHAUSTED');
        expect(outcome.error.details).toMatchObject({ timeoutMs: 30 });
      }
      pool.release(held);
    });

    it('should surface launch failures', async () => {
      const { pool, executor } = setup({ failLaunches: [1] });

      const outcome = await executor.run(makeTask(), pool);

      expect(outcome.success).toBe(false);
      if (!outcome.success) {
        expect(outcome.error.code).toBe('DRIVER_LAUNCH_FAILED');
      }
    });

    it('should release every lease exactly once', async () => {
      const { pool, executor } = setup({ behavior: (call) => (call === 1 ? 'crash' : 'ok') }, 2);
      const release = vi.spyOn(pool, 'release');

      await executor.run(makeTask(), pool);

      expect(release).toHaveBeenCalledTimes(2);
      expect(release.mock.results.map((result) => result.value)).toEqual([true, true]);
      expect(pool.getStatus().activeLeases).toBe(0);
    });
  });

  describe('events', () => {
    it('should keep running when a handler throws', async () => {
      const { pool, executor } = setup();
      executor.on(() => {
        throw new Error('handler failed');
      });

      const outcome = await executor.run(makeTask(), pool);

      expect(outcome.success).toBe(true);
    });

    it('should stop delivering after unsubscribe', async () => {
      const { pool } = setup();
      const executor = new TaskExecutor();
      const handler = vi.fn();
      const unsubscribe = executor.on(handler);
      unsubscribe();

      await executor.run(makeTask(), pool);

      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('getStats', () => {
    it('should track completions and failures', async () => {
      const { pool, executor } = setup({ behavior: (call) => (call === 2 ? { failAt: 0 } : 'ok') });

      await executor.run(makeTask(), pool);
      await executor.run(makeTask(), pool);

      const stats = executor.getStats();
      expect(stats).toMatchObject({
        executing: 0,
        totalCompleted: 1,
        totalFailed: 1,
        failuresByCode: { ACTION_FAILED: 1 },
        successRate: 0.5,
      });
    });
  });
});
