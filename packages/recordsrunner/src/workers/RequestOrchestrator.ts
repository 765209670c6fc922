/**
 * RequestOrchestrator — owns every status change of a records request.
 *
 *   pending_payment ──► payment_confirmed ──► submitting ──► submitted ──► completed
 *        │                     ▲                  │
 *        │                     └── retry ─────────┤
 *        ├──► payment_failed                      └──► failed ──► refunded
 *        └──► refunded
 *
 * Payment events arrive from outside (webhook, API); submissions and
 * reconciliation run from the scheduling loop. Every transition goes through
 * RequestRepository.transition, so concurrent callers are serialized by the
 * status compare-and-set and each change writes one audit event. Requests
 * stranded in `submitting` are settled by the recovery pass of the next cycle.
 */

import { z } from 'zod';
import type { PortalStatus } from '../engine/patterns.js';
import { Pacing } from '../engine/pacing.js';
import { prepareSubmission } from '../engine/prepareSubmission.js';
import type { SubmissionOutcome, SubmissionRequest, SubmitOptions } from '../engine/types.js';
import { REQUEST_EVENT_TYPES } from '../events/RequestEventTypes.js';
import { InvalidTransitionError, PersistenceConflictError, RequestNotFoundError, type RequestRepository } from '../db/RequestRepository.js';
import type { RecordsRequest, RequestStatus } from '../db/types.js';
import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';
import { RateLimitExceededError, type SubmissionRateLimiter } from '../security/rateLimit.js';
import { ValidationError } from '../security/sanitize.js';
import type { PortalStatusChecker } from './PortalStatusChecker.js';
import { DEFAULT_RETRY_POLICY, attemptsExhausted, cooldownAfter, isDueForAttempt, type RetryPolicy } from './retryPolicy.js';

// ── Collaborators ─────────────────────────────────────────────────────────

/** The part of SubmissionEngine the orchestrator drives. */
export interface Submitter {
  submit(request: SubmissionRequest, options?: SubmitOptions): Promise<SubmissionOutcome>;
}

export interface RequestOrchestratorOptions {
  repository: RequestRepository;
  engine: Submitter;
  rateLimiter: Pick<SubmissionRateLimiter, 'acquire'>;
  statusChecker?: PortalStatusChecker;
  retryPolicy?: RetryPolicy;
  pacing?: Pacing;
  logger?: Logger;
  clock?: () => Date;
  /** Max requests loaded per pass */
  batchSize?: number;
  /** Submitted requests are first checked this long after submission */
  reconcileAfterMs?: number;
  /** Minimum gap between two status checks of the same request */
  reconcileIntervalMs?: number;
  /** A request left in `submitting` longer than this is recovered by the next cycle */
  staleSubmittingMs?: number;
}

// ── Results ───────────────────────────────────────────────────────────────

export interface PaymentConfirmedInput {
  requestId: string;
  amountCents: number;
  paymentReference: string;
}

export interface PaymentFailedInput {
  requestId: string;
  paymentReference?: string | null;
  reason: string;
}

export interface RefundInput {
  requestId: string;
  refundReference: string;
}

export interface EventResult {
  /** False when the event was a duplicate and changed nothing */
  applied: boolean;
  status: RequestStatus;
}

export type ProcessResult =
  | { kind: 'submitted'; request: RecordsRequest }
  | { kind: 'retry_scheduled'; request: RecordsRequest; cooldownMs: number }
  | { kind: 'failed'; request: RecordsRequest }
  | { kind: 'rejected_invalid_input'; request: RecordsRequest }
  | { kind: 'deferred' }
  | { kind: 'skipped'; reason: string };

export interface SubmissionPassSummary {
  considered: number;
  submitted: number;
  retryScheduled: number;
  failed: number;
  rejected: number;
  /** True when the pass stopped early on an exhausted rate budget */
  deferred: boolean;
}

export interface ReconciliationPassSummary {
  checked: number;
  completed: number;
  errors: number;
}

export interface RecoveryPassSummary {
  /** Stale attempts whose confirmation had already been recorded */
  recovered: number;
  retryScheduled: number;
  failed: number;
  errors: number;
}

export interface CycleSummary {
  recovery: RecoveryPassSummary;
  submission: SubmissionPassSummary;
  reconciliation: ReconciliationPassSummary;
}

const PORTAL_CONTACTED = new Set<ProcessResult['kind']>(['submitted', 'retry_scheduled', 'failed']);

const attemptStartedPayload = z.object({ attempt: z.number().int().positive() });

const confirmationReceivedPayload = z.object({
  attempt: z.number().int().positive(),
  runId: z.string(),
  confirmationCode: z.string().min(1),
  confirmationSynthetic: z.boolean(),
  statusMessage: z.string().nullable(),
  evidencePaths: z.array(z.string()),
});

type ConfirmationReceived = z.infer<typeof confirmationReceivedPayload>;

// ── Orchestrator ──────────────────────────────────────────────────────────

export class RequestOrchestrator {
  private readonly repository: RequestRepository;
  private readonly engine: Submitter;
  private readonly rateLimiter: Pick<SubmissionRateLimiter, 'acquire'>;
  private readonly statusChecker: PortalStatusChecker | null;
  private readonly retryPolicy: RetryPolicy;
  private readonly pacing: Pacing;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly batchSize: number;
  private readonly reconcileAfterMs: number;
  private readonly reconcileIntervalMs: number;
  private readonly staleSubmittingMs: number;

  constructor(options: RequestOrchestratorOptions) {
    this.repository = options.repository;
    this.engine = options.engine;
    this.rateLimiter = options.rateLimiter;
    this.statusChecker = options.statusChecker ?? null;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.pacing = options.pacing ?? new Pacing();
    this.logger = options.logger ?? getLogger().child({ component: 'RequestOrchestrator' });
    this.clock = options.clock ?? (() => new Date());
    this.batchSize = options.batchSize ?? 10;
    this.reconcileAfterMs = options.reconcileAfterMs ?? 60 * 60_000;
    this.reconcileIntervalMs = options.reconcileIntervalMs ?? 6 * 60 * 60_000;
    this.staleSubmittingMs = options.staleSubmittingMs ?? 30 * 60_000;
  }

  // ── Payment events ────────────────────────────────────────────────────

  /**
   * Confirm payment once. Redeliveries, and deliveries that lose a race to a
   * concurrent one, return `applied: false`.
   */
  async handlePaymentConfirmed(input: PaymentConfirmedInput): Promise<EventResult> {
    const log = this.logger.child({ requestId: input.requestId });
    const request = await this.requireRequest(input.requestId);

    if (request.status !== 'pending_payment') {
      if (request.paymentReference && request.paymentReference !== input.paymentReference) {
        log.warn('Payment confirmation with a different reference ignored', { status: request.status });
      } else {
        log.info('Duplicate payment confirmation ignored', { status: request.status });
      }
      return { applied: false, status: request.status };
    }

    try {
      const updated = await this.repository.transition(
        input.requestId,
        'pending_payment',
        {
          status: 'payment_confirmed',
          paymentReference: input.paymentReference,
          amountPaidCents: input.amountCents,
        },
        {
          eventType: REQUEST_EVENT_TYPES.PAYMENT_CONFIRMED,
          payload: { paymentReference: input.paymentReference, amountCents: input.amountCents },
          originator: 'payment_webhook',
        },
      );
      log.info('Payment confirmed', { amountCents: input.amountCents });
      return { applied: true, status: updated.status };
    } catch (err) {
      if (err instanceof PersistenceConflictError) {
        log.info('Concurrent payment confirmation lost the race', { status: err.actual });
        return { applied: false, status: err.actual };
      }
      throw err;
    }
  }

  async handlePaymentFailed(input: PaymentFailedInput): Promise<EventResult> {
    const log = this.logger.child({ requestId: input.requestId });
    const request = await this.requireRequest(input.requestId);

    if (request.status !== 'pending_payment') {
      log.info('Payment failure ignored', { status: request.status });
      return { applied: false, status: request.status };
    }

    try {
      const updated = await this.repository.transition(
        input.requestId,
        'pending_payment',
        {
          status: 'payment_failed',
          paymentReference: input.paymentReference ?? null,
          errorReason: input.reason,
        },
        {
          eventType: REQUEST_EVENT_TYPES.PAYMENT_FAILED,
          payload: { paymentReference: input.paymentReference ?? null, reason: input.reason },
          originator: 'payment_webhook',
        },
      );
      log.warn('Payment failed', { reason: input.reason });
      return { applied: true, status: updated.status };
    } catch (err) {
      if (err instanceof PersistenceConflictError) {
        return { applied: false, status: err.actual };
      }
      throw err;
    }
  }

  /**
   * Record a refund issued outside this system. Only called from the event
   * API; permanent failures are never refunded automatically.
   *
   * @throws InvalidTransitionError unless the request is pending payment or failed
   */
  async recordRefund(input: RefundInput): Promise<EventResult> {
    const request = await this.requireRequest(input.requestId);
    if (request.status === 'refunded') {
      return { applied: false, status: request.status };
    }
    if (request.status !== 'pending_payment' && request.status !== 'failed') {
      throw new InvalidTransitionError(input.requestId, request.status, 'refunded');
    }

    const updated = await this.repository.transition(
      input.requestId,
      request.status,
      { status: 'refunded' },
      {
        eventType: REQUEST_EVENT_TYPES.REFUND_RECORDED,
        payload: { refundReference: input.refundReference, previousStatus: request.status },
        originator: 'payment_webhook',
      },
    );
    this.logger.info('Refund recorded', { requestId: input.requestId, previousStatus: request.status });
    return { applied: true, status: updated.status };
  }

  /**
   * Manually put a failed request back in the submission queue with a fresh
   * attempt budget.
   *
   * @throws InvalidTransitionError unless the request is failed
   */
  async requeue(requestId: string, operator: string): Promise<RecordsRequest> {
    const request = await this.requireRequest(requestId);
    if (request.status !== 'failed') {
      throw new InvalidTransitionError(requestId, request.status, 'payment_confirmed');
    }

    const updated = await this.repository.transition(
      requestId,
      'failed',
      { status: 'payment_confirmed', attemptCount: 0, lastAttemptAt: null, errorReason: null },
      {
        eventType: REQUEST_EVENT_TYPES.REQUEUED,
        payload: { operator, previousAttempts: request.attemptCount },
        originator: 'operator',
      },
    );
    this.logger.info('Request requeued', { requestId, operator });
    return updated;
  }

  // ── Submission ────────────────────────────────────────────────────────

  /** One submission attempt for a `payment_confirmed` request. */
  async processRequest(request: RecordsRequest): Promise<ProcessResult> {
    const log = this.logger.child({ requestId: request.requestId });
    if (request.status !== 'payment_confirmed') {
      return { kind: 'skipped', reason: `status is ${request.status}` };
    }

    const submission: SubmissionRequest = {
      category: request.category,
      referenceNumber: request.referenceNumber,
      contact: request.contact,
      extraFields: request.extraFields,
    };
    const attempt = request.attemptCount + 1;

    // Input that can never succeed fails now, without spending rate budget.
    try {
      prepareSubmission(submission, this.clock());
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      const submitting = await this.startAttempt(request, attempt, 'validation');
      if (!submitting) return { kind: 'skipped', reason: 'status changed concurrently' };
      return this.rejectInvalidInput(submitting, err, log);
    }

    try {
      await this.rateLimiter.acquire();
    } catch (err) {
      if (err instanceof RateLimitExceededError) {
        log.info('Submission deferred, hourly budget exhausted', { window: err.windowKey, limit: err.limit });
        return { kind: 'deferred' };
      }
      throw err;
    }

    const submitting = await this.startAttempt(request, attempt, 'portal');
    if (!submitting) return { kind: 'skipped', reason: 'status changed concurrently' };

    let outcome: SubmissionOutcome;
    try {
      outcome = await this.engine.submit(submission, { runId: `${request.requestId}-a${attempt}` });
    } catch (err) {
      if (err instanceof ValidationError) {
        return this.rejectInvalidInput(submitting, err, log);
      }
      log.error('Submission engine raised an unclassified error', { attempt, error: errorMessage(err) });
      await this.repository.appendEvent(request.requestId, {
        eventType: REQUEST_EVENT_TYPES.ENGINE_EXCEPTION,
        payload: {
          attempt,
          errorName: err instanceof Error ? err.name : typeof err,
          message: errorMessage(err),
        },
        originator: 'engine',
      });
      return this.recordFailedAttempt(submitting, attempt, { reason: 'engine_exception', evidencePaths: [] }, log);
    }

    if (outcome.status === 'submitted' && outcome.confirmationCode) {
      const confirmation: ConfirmationReceived = {
        attempt,
        runId: outcome.runId,
        confirmationCode: outcome.confirmationCode,
        confirmationSynthetic: outcome.confirmationSynthetic,
        statusMessage: outcome.statusMessage,
        evidencePaths: outcome.evidencePaths,
      };
      // The portal has accepted the request; the code must survive a failed status write.
      await this.repository.appendEvent(request.requestId, {
        eventType: REQUEST_EVENT_TYPES.CONFIRMATION_RECEIVED,
        payload: confirmation,
        originator: 'engine',
      });
      const updated = await this.markSubmitted(request.requestId, confirmation, this.clock(), false);
      log.info('Request submitted', { attempt, synthetic: outcome.confirmationSynthetic });
      return { kind: 'submitted', request: updated };
    }

    return this.recordFailedAttempt(
      submitting,
      attempt,
      {
        reason: outcome.errorKind ?? outcome.status,
        detail: outcome.errorMessage,
        runId: outcome.runId,
        evidencePaths: outcome.evidencePaths,
      },
      log,
    );
  }

  /**
   * Submit every due `payment_confirmed` request, one at a time with a paced
   * gap between portal visits. Stops at the first deferral.
   */
  async runSubmissionPass(): Promise<SubmissionPassSummary> {
    const summary: SubmissionPassSummary = {
      considered: 0,
      submitted: 0,
      retryScheduled: 0,
      failed: 0,
      rejected: 0,
      deferred: false,
    };

    const now = this.clock();
    const candidates = await this.repository.listAwaitingSubmission(this.retryPolicy.maxAttempts, this.batchSize);
    const due = candidates.filter((r) => isDueForAttempt(this.retryPolicy, r, now));
    summary.considered = due.length;

    let lastContactedPortal = false;
    for (const request of due) {
      if (lastContactedPortal) {
        await this.pacing.pause('betweenSubmissions');
      }

      let result: ProcessResult;
      try {
        result = await this.processRequest(request);
      } catch (err) {
        this.logger.error('Submission attempt crashed', { requestId: request.requestId, error: errorMessage(err) });
        lastContactedPortal = false;
        continue;
      }

      lastContactedPortal = PORTAL_CONTACTED.has(result.kind);
      switch (result.kind) {
        case 'submitted':
          summary.submitted++;
          break;
        case 'retry_scheduled':
          summary.retryScheduled++;
          break;
        case 'failed':
          summary.failed++;
          break;
        case 'rejected_invalid_input':
          summary.rejected++;
          break;
        case 'deferred':
          summary.deferred = true;
          break;
        case 'skipped':
          break;
      }
      if (summary.deferred) break;
    }

    if (summary.considered > 0) {
      this.logger.info('Submission pass finished', { ...summary });
    }
    return summary;
  }

  // ── Reconciliation ────────────────────────────────────────────────────

  /**
   * Ask the portal about submitted requests. A `ready` answer completes the
   * request; anything else is recorded and re-checked later.
   */
  async runReconciliationPass(): Promise<ReconciliationPassSummary> {
    const summary: ReconciliationPassSummary = { checked: 0, completed: 0, errors: 0 };
    if (!this.statusChecker) return summary;

    const now = this.clock();
    const candidates = await this.repository.listAwaitingReconciliation({
      submittedBefore: new Date(now.getTime() - this.reconcileAfterMs),
      checkedBefore: new Date(now.getTime() - this.reconcileIntervalMs),
      limit: this.batchSize,
    });

    for (const request of candidates) {
      // Locally generated codes are unknown to the portal.
      if (request.confirmationSynthetic || !request.confirmationCode) continue;

      if (summary.checked > 0 || summary.errors > 0) {
        await this.pacing.pause('betweenStatusChecks');
      }

      let status: PortalStatus;
      try {
        status = await this.statusChecker.check(request.confirmationCode);
      } catch (err) {
        summary.errors++;
        this.logger.warn('Portal status check failed', { requestId: request.requestId, error: errorMessage(err) });
        continue;
      }
      summary.checked++;

      if (await this.applyPortalStatus(request, status)) {
        summary.completed++;
      }
    }

    if (candidates.length > 0) {
      this.logger.info('Reconciliation pass finished', { ...summary });
    }
    return summary;
  }

  // ── Recovery ──────────────────────────────────────────────────────────

  /**
   * Settle requests left in `submitting` by a crashed worker or a failed
   * status write. An attempt whose confirmation was recorded becomes
   * `submitted`; any other consumes the attempt like a failed portal visit.
   */
  async runRecoveryPass(): Promise<RecoveryPassSummary> {
    const summary: RecoveryPassSummary = { recovered: 0, retryScheduled: 0, failed: 0, errors: 0 };

    const startedBefore = new Date(this.clock().getTime() - this.staleSubmittingMs);
    const stale = await this.repository.listStaleSubmitting(startedBefore, this.batchSize);

    for (const request of stale) {
      let result: ProcessResult;
      try {
        result = await this.recoverStaleSubmission(request);
      } catch (err) {
        if (err instanceof PersistenceConflictError) {
          this.logger.info('Request changed before recovery', { requestId: request.requestId, status: err.actual });
          continue;
        }
        summary.errors++;
        this.logger.error('Recovery of a stale submission failed', {
          requestId: request.requestId,
          error: errorMessage(err),
        });
        continue;
      }

      if (result.kind === 'submitted') summary.recovered++;
      else if (result.kind === 'retry_scheduled') summary.retryScheduled++;
      else if (result.kind === 'failed') summary.failed++;
    }

    if (stale.length > 0) {
      this.logger.warn('Recovery pass finished', { ...summary });
    }
    return summary;
  }

  async runCycle(): Promise<CycleSummary> {
    const recovery = await this.runRecoveryPass();
    const submission = await this.runSubmissionPass();
    const reconciliation = await this.runReconciliationPass();
    return { recovery, submission, reconciliation };
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private async requireRequest(requestId: string): Promise<RecordsRequest> {
    const request = await this.repository.findByRequestId(requestId);
    if (!request) throw new RequestNotFoundError(requestId);
    return request;
  }

  /** CAS `payment_confirmed → submitting`; null when another actor moved it first. */
  private async startAttempt(
    request: RecordsRequest,
    attempt: number,
    phase: 'validation' | 'portal',
  ): Promise<RecordsRequest | null> {
    try {
      return await this.repository.transition(
        request.requestId,
        'payment_confirmed',
        { status: 'submitting', lastAttemptAt: this.clock() },
        {
          eventType: REQUEST_EVENT_TYPES.SUBMISSION_STARTED,
          payload: { attempt, phase },
          originator: 'orchestrator',
        },
      );
    } catch (err) {
      if (err instanceof PersistenceConflictError) {
        this.logger.info('Request changed before submission started', {
          requestId: request.requestId,
          status: err.actual,
        });
        return null;
      }
      throw err;
    }
  }

  /** CAS `submitting → submitted` carrying the portal's confirmation. */
  private async markSubmitted(
    requestId: string,
    confirmation: ConfirmationReceived,
    submittedAt: Date,
    recovered: boolean,
  ): Promise<RecordsRequest> {
    return this.repository.transition(
      requestId,
      'submitting',
      {
        status: 'submitted',
        confirmationCode: confirmation.confirmationCode,
        confirmationSynthetic: confirmation.confirmationSynthetic,
        evidencePaths: confirmation.evidencePaths,
        errorReason: null,
        submittedAt,
      },
      {
        eventType: REQUEST_EVENT_TYPES.SUBMITTED,
        payload: {
          attempt: confirmation.attempt,
          runId: confirmation.runId,
          confirmationCode: confirmation.confirmationCode,
          confirmationSynthetic: confirmation.confirmationSynthetic,
          statusMessage: confirmation.statusMessage,
          evidenceCount: confirmation.evidencePaths.length,
          recovered,
        },
        originator: recovered ? 'orchestrator' : 'engine',
      },
    );
  }

  private async recoverStaleSubmission(request: RecordsRequest): Promise<ProcessResult> {
    const log = this.logger.child({ requestId: request.requestId });
    const events = await this.repository.listEvents(request.requestId);

    // Only what the latest attempt recorded counts.
    let attempt = request.attemptCount + 1;
    let confirmation: { payload: ConfirmationReceived; receivedAt: Date } | null = null;
    for (const event of events) {
      if (event.eventType === REQUEST_EVENT_TYPES.SUBMISSION_STARTED) {
        const started = attemptStartedPayload.safeParse(event.payload);
        attempt = started.success ? started.data.attempt : request.attemptCount + 1;
        confirmation = null;
      } else if (event.eventType === REQUEST_EVENT_TYPES.CONFIRMATION_RECEIVED) {
        const received = confirmationReceivedPayload.safeParse(event.payload);
        if (received.success) confirmation = { payload: received.data, receivedAt: event.createdAt };
      }
    }

    if (confirmation) {
      const updated = await this.markSubmitted(request.requestId, confirmation.payload, confirmation.receivedAt, true);
      log.warn('Recovered a submission whose status write was lost', { attempt });
      return { kind: 'submitted', request: updated };
    }

    await this.repository.appendEvent(request.requestId, {
      eventType: REQUEST_EVENT_TYPES.SUBMISSION_INTERRUPTED,
      payload: {
        attempt,
        lastAttemptAt: request.lastAttemptAt?.toISOString() ?? null,
        staleAfterMs: this.staleSubmittingMs,
      },
      originator: 'orchestrator',
    });
    return this.recordFailedAttempt(request, attempt, { reason: 'interrupted', evidencePaths: [] }, log);
  }

  private async rejectInvalidInput(request: RecordsRequest, err: ValidationError, log: Logger): Promise<ProcessResult> {
    const updated = await this.repository.transition(
      request.requestId,
      'submitting',
      { status: 'failed', errorReason: `invalid_input:${err.field}` },
      {
        eventType: REQUEST_EVENT_TYPES.SUBMISSION_REJECTED_INVALID_INPUT,
        payload: { field: err.field, message: err.message },
        originator: 'orchestrator',
      },
    );
    log.warn('Request rejected for invalid input', { field: err.field });
    return { kind: 'rejected_invalid_input', request: updated };
  }

  private async recordFailedAttempt(
    request: RecordsRequest,
    attempt: number,
    failure: { reason: string; detail?: string | null; runId?: string; evidencePaths: string[] },
    log: Logger,
  ): Promise<ProcessResult> {
    const payload = {
      attempt,
      reason: failure.reason,
      detail: failure.detail ?? null,
      runId: failure.runId ?? null,
      evidenceCount: failure.evidencePaths.length,
    };
    const patch = {
      attemptCount: attempt,
      errorReason: failure.reason,
      evidencePaths: failure.evidencePaths.length > 0 ? failure.evidencePaths : request.evidencePaths,
    };

    if (attemptsExhausted(this.retryPolicy, attempt)) {
      const updated = await this.repository.transition(
        request.requestId,
        'submitting',
        { status: 'failed', ...patch },
        { eventType: REQUEST_EVENT_TYPES.SUBMISSION_FAILED, payload, originator: 'orchestrator' },
      );
      log.error('Request failed permanently', { attempt, reason: failure.reason });
      return { kind: 'failed', request: updated };
    }

    const cooldownMs = cooldownAfter(this.retryPolicy, attempt);
    const updated = await this.repository.transition(
      request.requestId,
      'submitting',
      { status: 'payment_confirmed', ...patch },
      {
        eventType: REQUEST_EVENT_TYPES.SUBMISSION_RETRY_SCHEDULED,
        payload: { ...payload, cooldownMs },
        originator: 'orchestrator',
      },
    );
    log.warn('Submission attempt failed, retry scheduled', { attempt, reason: failure.reason, cooldownMs });
    return { kind: 'retry_scheduled', request: updated, cooldownMs };
  }

  private async applyPortalStatus(request: RecordsRequest, status: PortalStatus): Promise<boolean> {
    const checkedAt = this.clock();

    if (status !== 'ready') {
      await this.repository.recordStatusCheck(request.requestId, status, checkedAt, {
        eventType: REQUEST_EVENT_TYPES.PORTAL_STATUS_CHECKED,
        payload: { portalStatus: status },
        originator: 'reconciler',
      });
      return false;
    }

    try {
      await this.repository.transition(
        request.requestId,
        'submitted',
        { status: 'completed', completedAt: checkedAt, portalStatus: status, portalStatusCheckedAt: checkedAt },
        {
          eventType: REQUEST_EVENT_TYPES.COMPLETED,
          payload: { portalStatus: status },
          originator: 'reconciler',
        },
      );
    } catch (err) {
      if (err instanceof PersistenceConflictError) {
        this.logger.info('Request changed before completion', { requestId: request.requestId, status: err.actual });
        return false;
      }
      throw err;
    }
    this.logger.info('Request completed', { requestId: request.requestId });
    return true;
  }
}
