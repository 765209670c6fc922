import {
  DuplicateRequestError,
  PersistenceConflictError,
  RequestNotFoundError,
  assertTransition,
  type ReconciliationQuery,
  type RequestRepository,
} from './RequestRepository.js';
import type {
  NewRecordsRequest,
  NewRequestEvent,
  RecordsRequest,
  RequestEvent,
  RequestPatch,
  RequestStatus,
} from './types.js';

/**
 * In-process RequestRepository. Used by tests and by single-process runs
 * without DATABASE_URL. Every read returns a copy.
 */
export class MemoryRequestRepository implements RequestRepository {
  private readonly requests = new Map<string, RecordsRequest>();
  private readonly events: RequestEvent[] = [];
  private nextRequestId = 1;
  private nextEventId = 1;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async findByRequestId(requestId: string): Promise<RecordsRequest | null> {
    const request = this.requests.get(requestId);
    return request ? structuredClone(request) : null;
  }

  async create(input: NewRecordsRequest): Promise<RecordsRequest> {
    if (this.requests.has(input.requestId)) {
      throw new DuplicateRequestError(input.requestId);
    }
    const now = this.clock();
    const request: RecordsRequest = {
      id: this.nextRequestId++,
      requestId: input.requestId,
      category: input.category,
      referenceNumber: input.referenceNumber,
      contact: { ...input.contact },
      extraFields: { ...input.extraFields },
      status: 'pending_payment',
      paymentReference: null,
      amountPaidCents: null,
      confirmationCode: null,
      confirmationSynthetic: false,
      evidencePaths: [],
      errorReason: null,
      attemptCount: 0,
      lastAttemptAt: null,
      portalStatus: null,
      portalStatusCheckedAt: null,
      createdAt: now,
      updatedAt: now,
      submittedAt: null,
      completedAt: null,
    };
    this.requests.set(request.requestId, request);
    return structuredClone(request);
  }

  async listAwaitingSubmission(maxAttempts: number, limit: number): Promise<RecordsRequest[]> {
    return [...this.requests.values()]
      .filter((r) => r.status === 'payment_confirmed' && r.attemptCount < maxAttempts)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime() || a.id - b.id)
      .slice(0, limit)
      .map((r) => structuredClone(r));
  }

  async listStaleSubmitting(startedBefore: Date, limit: number): Promise<RecordsRequest[]> {
    return [...this.requests.values()]
      .filter(
        (r) =>
          r.status === 'submitting' &&
          (r.lastAttemptAt === null || r.lastAttemptAt.getTime() <= startedBefore.getTime()),
      )
      .sort((a, b) => (a.lastAttemptAt?.getTime() ?? 0) - (b.lastAttemptAt?.getTime() ?? 0) || a.id - b.id)
      .slice(0, limit)
      .map((r) => structuredClone(r));
  }

  async listAwaitingReconciliation(query: ReconciliationQuery): Promise<RecordsRequest[]> {
    return [...this.requests.values()]
      .filter(
        (r) =>
          r.status === 'submitted' &&
          !r.confirmationSynthetic &&
          r.submittedAt !== null &&
          r.submittedAt.getTime() <= query.submittedBefore.getTime() &&
          (r.portalStatusCheckedAt === null || r.portalStatusCheckedAt.getTime() <= query.checkedBefore.getTime()),
      )
      .sort((a, b) => (a.submittedAt?.getTime() ?? 0) - (b.submittedAt?.getTime() ?? 0))
      .slice(0, query.limit)
      .map((r) => structuredClone(r));
  }

  async transition(
    requestId: string,
    expected: RequestStatus,
    patch: RequestPatch,
    event: NewRequestEvent,
  ): Promise<RecordsRequest> {
    const current = this.requests.get(requestId);
    if (!current) throw new RequestNotFoundError(requestId);
    if (current.status !== expected) {
      throw new PersistenceConflictError(requestId, expected, current.status);
    }
    assertTransition(requestId, current.status, patch.status);

    const updated: RecordsRequest = { ...current, ...patch, updatedAt: this.clock() };
    this.requests.set(requestId, updated);
    this.pushEvent(requestId, event);
    return structuredClone(updated);
  }

  async recordStatusCheck(
    requestId: string,
    portalStatus: string,
    checkedAt: Date,
    event: NewRequestEvent,
  ): Promise<void> {
    const current = this.requests.get(requestId);
    if (!current) throw new RequestNotFoundError(requestId);
    this.requests.set(requestId, { ...current, portalStatus, portalStatusCheckedAt: checkedAt });
    this.pushEvent(requestId, event);
  }

  async appendEvent(requestId: string, event: NewRequestEvent): Promise<RequestEvent> {
    if (!this.requests.has(requestId)) throw new RequestNotFoundError(requestId);
    return structuredClone(this.pushEvent(requestId, event));
  }

  async listEvents(requestId: string): Promise<RequestEvent[]> {
    return this.events.filter((e) => e.requestId === requestId).map((e) => structuredClone(e));
  }

  private pushEvent(requestId: string, event: NewRequestEvent): RequestEvent {
    const stored: RequestEvent = {
      id: this.nextEventId++,
      requestId,
      eventType: event.eventType,
      payload: structuredClone(event.payload),
      originator: event.originator,
      createdAt: this.clock(),
    };
    this.events.push(stored);
    return stored;
  }
}
