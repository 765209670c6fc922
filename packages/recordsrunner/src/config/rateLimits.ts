/**
 * Submission throughput limits.
 *
 * The portal is a single fragile government system, so the whole worker
 * fleet shares one hourly budget. Attempts are counted per request.
 */
export const SUBMISSION_LIMITS = {
  /** Submissions allowed per hourly window, across all workers */
  perHour: 10,
  /** Submission attempts per request before it is marked failed */
  maxAttempts: 3,
  /** Window durations in milliseconds */
  windows: {
    hourly: 60 * 60 * 1000,
  },
} as const;
