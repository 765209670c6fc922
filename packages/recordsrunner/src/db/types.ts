import type { ReportCategory } from '../config/categories.js';
import type { ContactInfo, ExtraFields } from '../engine/types.js';

// ── Request status machine ────────────────────────────────────────────────

export type RequestStatus =
  | 'pending_payment'
  | 'payment_confirmed'
  | 'submitting'
  | 'submitted'
  | 'completed'
  | 'failed'
  | 'payment_failed'
  | 'refunded';

export const REQUEST_STATUSES: readonly RequestStatus[] = [
  'pending_payment',
  'payment_confirmed',
  'submitting',
  'submitted',
  'completed',
  'failed',
  'payment_failed',
  'refunded',
];

/**
 * Allowed transitions. `submitting → payment_confirmed` is the bounded retry
 * loop; `failed → payment_confirmed` is the manual re-queue.
 */
const TRANSITIONS: Record<RequestStatus, readonly RequestStatus[]> = {
  pending_payment: ['payment_confirmed', 'payment_failed', 'refunded'],
  payment_confirmed: ['submitting'],
  submitting: ['submitted', 'failed', 'payment_confirmed'],
  submitted: ['completed'],
  completed: [],
  failed: ['refunded', 'payment_confirmed'],
  payment_failed: [],
  refunded: [],
};

export const TERMINAL_STATUSES: ReadonlySet<RequestStatus> = new Set<RequestStatus>([
  'completed',
  'failed',
  'payment_failed',
  'refunded',
]);

export function canTransition(from: RequestStatus, to: RequestStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isRequestStatus(value: string): value is RequestStatus {
  return (REQUEST_STATUSES as readonly string[]).includes(value);
}

// ── Entities ──────────────────────────────────────────────────────────────

export interface RecordsRequest {
  id: number;
  /** Public opaque identifier handed to the buyer */
  requestId: string;
  category: ReportCategory;
  referenceNumber: string | null;
  contact: ContactInfo;
  extraFields: ExtraFields;
  status: RequestStatus;

  paymentReference: string | null;
  amountPaidCents: number | null;

  confirmationCode: string | null;
  confirmationSynthetic: boolean;
  evidencePaths: string[];
  errorReason: string | null;

  attemptCount: number;
  lastAttemptAt: Date | null;

  portalStatus: string | null;
  portalStatusCheckedAt: Date | null;

  createdAt: Date;
  updatedAt: Date;
  submittedAt: Date | null;
  completedAt: Date | null;
}

export interface NewRecordsRequest {
  requestId: string;
  category: ReportCategory;
  referenceNumber: string | null;
  contact: ContactInfo;
  extraFields?: ExtraFields;
}

/** Columns a transition may change alongside the status. */
export type RequestPatch = Partial<
  Pick<
    RecordsRequest,
    | 'paymentReference'
    | 'amountPaidCents'
    | 'confirmationCode'
    | 'confirmationSynthetic'
    | 'evidencePaths'
    | 'errorReason'
    | 'attemptCount'
    | 'lastAttemptAt'
    | 'submittedAt'
    | 'completedAt'
    | 'portalStatus'
    | 'portalStatusCheckedAt'
  >
> & { status: RequestStatus };

export type EventOriginator = 'orchestrator' | 'payment_webhook' | 'engine' | 'reconciler' | 'operator';

export interface RequestEvent {
  id: number;
  requestId: string;
  eventType: string;
  payload: Record<string, unknown>;
  originator: EventOriginator;
  createdAt: Date;
}

export type NewRequestEvent = Pick<RequestEvent, 'eventType' | 'payload' | 'originator'>;
