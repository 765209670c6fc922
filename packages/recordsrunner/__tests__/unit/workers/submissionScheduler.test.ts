import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { SubmissionScheduler } from '../../../src/workers/SubmissionScheduler.js';
import { quietLogger } from '../../fixtures/logger.js';

describe('SubmissionScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('runs the first cycle immediately and then every interval', async () => {
    const orchestrator = { runCycle: vi.fn(async () => ({})) };
    const scheduler = new SubmissionScheduler({ orchestrator, intervalMs: 1_000, logger: quietLogger() });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(orchestrator.runCycle).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(orchestrator.runCycle).toHaveBeenCalledTimes(2);
    expect(scheduler.cycleCount).toBe(2);

    await scheduler.stop();
    await vi.advanceTimersByTimeAsync(5_000);
    expect(orchestrator.runCycle).toHaveBeenCalledTimes(2);
    expect(scheduler.isRunning).toBe(false);
  });

  test('cycles never overlap', async () => {
    let release: () => void = () => {};
    const orchestrator = {
      runCycle: vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          }),
      ),
    };
    const scheduler = new SubmissionScheduler({ orchestrator, intervalMs: 100, logger: quietLogger() });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(orchestrator.runCycle).toHaveBeenCalledTimes(1);
    expect(scheduler.isCycleInFlight).toBe(true);

    release();
    await vi.advanceTimersByTimeAsync(100);
    expect(orchestrator.runCycle).toHaveBeenCalledTimes(2);

    release();
    await scheduler.stop();
  });

  test('a failing cycle is logged and the loop continues', async () => {
    const orchestrator = {
      runCycle: vi.fn().mockRejectedValueOnce(new Error('db down')).mockResolvedValue({}),
    };
    const scheduler = new SubmissionScheduler({ orchestrator, intervalMs: 500, logger: quietLogger() });
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    scheduler.start();
    await vi.advanceTimersByTimeAsync(500);

    expect(orchestrator.runCycle).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(error.mock.calls[0][0]))).toMatchObject({ msg: 'Cycle failed', error: 'db down' });

    error.mockRestore();
    await scheduler.stop();
  });

  test('stop waits for the in-flight cycle up to the drain timeout', async () => {
    const orchestrator = { runCycle: vi.fn(() => new Promise<void>(() => {})) };
    const scheduler = new SubmissionScheduler({
      orchestrator,
      intervalMs: 100,
      drainTimeoutMs: 2_000,
      logger: quietLogger(),
    });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(0);

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(1_999);
    expect(stopped).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await stopping;
    expect(stopped).toBe(true);
  });
});
