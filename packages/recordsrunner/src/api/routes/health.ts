import { Hono } from 'hono';
import type { SubmissionScheduler } from '../../workers/SubmissionScheduler.js';

const startedAt = Date.now();

export type SchedulerProbe = Pick<SubmissionScheduler, 'isRunning' | 'isCycleInFlight' | 'cycleCount'>;

export function createHealthRoutes(scheduler?: SchedulerProbe) {
  const health = new Hono();

  health.get('/', (c) => {
    return c.json({
      status: 'ok',
      service: 'recordsrunner',
      version: process.env.npm_package_version ?? '0.1.0',
      uptime_ms: Date.now() - startedAt,
      scheduler: scheduler
        ? {
            running: scheduler.isRunning,
            cycle_in_flight: scheduler.isCycleInFlight,
            cycles: scheduler.cycleCount,
          }
        : null,
      timestamp: new Date().toISOString(),
    });
  });

  return health;
}
