import {
  canTransition,
  type NewRecordsRequest,
  type NewRequestEvent,
  type RecordsRequest,
  type RequestEvent,
  type RequestPatch,
  type RequestStatus,
} from './types.js';

// ── Errors ────────────────────────────────────────────────────────────────

/** The request was not in the status the caller expected (lost a race). */
export class PersistenceConflictError extends Error {
  readonly kind = 'persistence_conflict' as const;

  constructor(
    public readonly requestId: string,
    public readonly expected: RequestStatus,
    public readonly actual: RequestStatus,
  ) {
    super(`Request ${requestId} is ${actual}, expected ${expected}`);
    this.name = 'PersistenceConflictError';
  }
}

export class RequestNotFoundError extends Error {
  readonly kind = 'request_not_found' as const;

  constructor(public readonly requestId: string) {
    super(`Request ${requestId} not found`);
    this.name = 'RequestNotFoundError';
  }
}

export class DuplicateRequestError extends Error {
  readonly kind = 'duplicate_request' as const;

  constructor(public readonly requestId: string) {
    super(`Request ${requestId} already exists`);
    this.name = 'DuplicateRequestError';
  }
}

export class InvalidTransitionError extends Error {
  readonly kind = 'invalid_transition' as const;

  constructor(
    public readonly requestId: string,
    public readonly from: RequestStatus,
    public readonly to: RequestStatus,
  ) {
    super(`Request ${requestId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function assertTransition(requestId: string, from: RequestStatus, to: RequestStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(requestId, from, to);
  }
}

// ── Contract ──────────────────────────────────────────────────────────────

export interface ReconciliationQuery {
  /** Only requests submitted at or before this instant */
  submittedBefore: Date;
  /** Only requests never checked, or last checked at or before this instant */
  checkedBefore: Date;
  limit: number;
}

/**
 * Persistence for records requests and their audit trail.
 *
 * `transition` is the only way to change a request's status: it is a
 * compare-and-set on the current status and writes exactly one event in the
 * same unit of work.
 */
export interface RequestRepository {
  findByRequestId(requestId: string): Promise<RecordsRequest | null>;
  create(input: NewRecordsRequest): Promise<RecordsRequest>;

  /** `payment_confirmed` requests under the attempt ceiling, oldest first. */
  listAwaitingSubmission(maxAttempts: number, limit: number): Promise<RecordsRequest[]>;
  /** `submitted` requests with a portal-issued code that are due a status check. */
  listAwaitingReconciliation(query: ReconciliationQuery): Promise<RecordsRequest[]>;
  /** `submitting` requests whose attempt started at or before `startedBefore`, oldest first. */
  listStaleSubmitting(startedBefore: Date, limit: number): Promise<RecordsRequest[]>;

  /**
   * Move `requestId` from `expected` to `patch.status`.
   *
   * @throws RequestNotFoundError
   * @throws PersistenceConflictError when the current status is not `expected`
   * @throws InvalidTransitionError when the move is not in the transition table
   */
  transition(
    requestId: string,
    expected: RequestStatus,
    patch: RequestPatch,
    event: NewRequestEvent,
  ): Promise<RecordsRequest>;

  /** Store a portal status observation without changing the request status. */
  recordStatusCheck(requestId: string, portalStatus: string, checkedAt: Date, event: NewRequestEvent): Promise<void>;

  appendEvent(requestId: string, event: NewRequestEvent): Promise<RequestEvent>;
  /** Events in creation order. */
  listEvents(requestId: string): Promise<RequestEvent[]>;
}
