/**
 * RequestEventTypes — Canonical event type constants for the request audit log.
 *
 * Every event appended through RequestRepository should use one of these.
 */

export const REQUEST_EVENT_TYPES = {
  // Payment
  PAYMENT_CONFIRMED: 'payment_confirmed',
  PAYMENT_FAILED: 'payment_failed',
  REFUND_RECORDED: 'refund_recorded',

  // Submission
  SUBMISSION_STARTED: 'submission_started',
  CONFIRMATION_RECEIVED: 'confirmation_received',
  SUBMITTED: 'submitted',
  SUBMISSION_RETRY_SCHEDULED: 'submission_retry_scheduled',
  SUBMISSION_FAILED: 'submission_failed',
  SUBMISSION_REJECTED_INVALID_INPUT: 'submission_rejected_invalid_input',
  ENGINE_EXCEPTION: 'engine_exception',
  SUBMISSION_INTERRUPTED: 'submission_interrupted',

  // Reconciliation
  PORTAL_STATUS_CHECKED: 'portal_status_checked',
  COMPLETED: 'completed',

  // Operator
  REQUEUED: 'requeued',
} as const;

export type RequestEventType = (typeof REQUEST_EVENT_TYPES)[keyof typeof REQUEST_EVENT_TYPES];
