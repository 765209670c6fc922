import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';

const DRAIN_TIMEOUT_MS = 120_000;

export interface CycleRunner {
  runCycle(): Promise<unknown>;
}

export interface SubmissionSchedulerOptions {
  orchestrator: CycleRunner;
  /** Wait between the end of one cycle and the start of the next */
  intervalMs: number;
  drainTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Single background loop over RequestOrchestrator.runCycle().
 *
 * The next cycle is scheduled only after the previous one finishes, so cycles
 * never overlap and a slow submission pass simply delays the next poll.
 */
export class SubmissionScheduler {
  private readonly orchestrator: CycleRunner;
  private readonly intervalMs: number;
  private readonly drainTimeoutMs: number;
  private readonly logger: Logger;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private completedCycles = 0;

  constructor(opts: SubmissionSchedulerOptions) {
    this.orchestrator = opts.orchestrator;
    this.intervalMs = opts.intervalMs;
    this.drainTimeoutMs = opts.drainTimeoutMs ?? DRAIN_TIMEOUT_MS;
    this.logger = opts.logger ?? getLogger().child({ component: 'SubmissionScheduler' });
  }

  /** Start looping; the first cycle runs immediately. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info('Scheduler started', { intervalMs: this.intervalMs });
    this.schedule(0);
  }

  /** Stop scheduling and wait (bounded) for an in-flight cycle to finish. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const inFlight = this.inFlight;
    if (!inFlight) {
      this.logger.info('Scheduler stopped');
      return;
    }

    this.logger.info('Draining in-flight cycle', { drainTimeoutMs: this.drainTimeoutMs });
    let drainTimer: ReturnType<typeof setTimeout> | undefined;
    const drained = await Promise.race([
      inFlight.then(() => true),
      new Promise<false>((resolve) => {
        drainTimer = setTimeout(() => resolve(false), this.drainTimeoutMs);
      }),
    ]);
    clearTimeout(drainTimer);

    if (drained) {
      this.logger.info('Scheduler stopped');
    } else {
      this.logger.warn('Scheduler stopped with a cycle still running', { drainTimeoutMs: this.drainTimeoutMs });
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isCycleInFlight(): boolean {
    return this.inFlight !== null;
  }

  get cycleCount(): number {
    return this.completedCycles;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runCycle().finally(() => {
        this.inFlight = null;
        if (this.running) this.schedule(this.intervalMs);
      });
    }, delayMs);
  }

  private async runCycle(): Promise<void> {
    try {
      await this.orchestrator.runCycle();
    } catch (err) {
      this.logger.error('Cycle failed', { error: errorMessage(err) });
    } finally {
      this.completedCycles++;
    }
  }
}
