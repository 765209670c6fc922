/**
 * Human-plausible timing between automated actions.
 *
 * Randomness and sleeping are injected so tests can run the full pipeline
 * without waiting.
 */

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export const PACING_PROFILE = {
  keystroke: { minMs: 50, maxMs: 150 },
  micro: { minMs: 50, maxMs: 150 },
  fieldGap: { minMs: 500, maxMs: 1_500 },
  pageSettle: { minMs: 1_500, maxMs: 2_500 },
  preNavigation: { minMs: 2_000, maxMs: 4_000 },
  afterSelection: { minMs: 1_000, maxMs: 2_000 },
  beforeSubmit: { minMs: 1_000, maxMs: 2_000 },
  confirmationSettle: { minMs: 3_000, maxMs: 5_000 },
  betweenSubmissions: { minMs: 30_000, maxMs: 90_000 },
  betweenStatusChecks: { minMs: 5_000, maxMs: 15_000 },
} as const satisfies Record<string, DelayRange>;

export type PacingPreset = keyof typeof PACING_PROFILE;

export interface PacingOptions {
  /** Uniform source in [0, 1). Default: Math.random */
  random?: () => number;
  /** Default: setTimeout-based sleep */
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class Pacing {
  private readonly random: () => number;
  private readonly sleeper: (ms: number) => Promise<void>;

  constructor(options: PacingOptions = {}) {
    this.random = options.random ?? Math.random;
    this.sleeper = options.sleep ?? sleep;
  }

  /** A random interval within the range, in whole milliseconds. */
  interval(range: DelayRange | PacingPreset): number {
    const { minMs, maxMs } = typeof range === 'string' ? PACING_PROFILE[range] : range;
    return Math.round(minMs + this.random() * (maxMs - minMs));
  }

  async pause(range: DelayRange | PacingPreset): Promise<number> {
    const ms = this.interval(range);
    await this.sleeper(ms);
    return ms;
  }

  /** Fixed wait, still routed through the injected sleeper. */
  async wait(ms: number): Promise<void> {
    await this.sleeper(ms);
  }
}
