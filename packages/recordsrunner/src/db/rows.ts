import { z } from 'zod';
import { isReportCategory, type ReportCategory } from '../config/categories.js';
import { isRequestStatus, type RecordsRequest, type RequestEvent, type RequestStatus } from './types.js';

/**
 * Row decoding for the Postgres tables in schema.sql. JSONB columns and
 * free-text enums are checked on the way out of the database.
 */

export const contactSchema = z.object({
  email: z.string(),
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
  phone: z.string().nullish(),
});

export const extraFieldsSchema = z.object({
  incidentDate: z.string().optional(),
  officerBadge: z.string().optional(),
  location: z.string().optional(),
  address: z.string().optional(),
  area: z.string().optional(),
  dateRange: z.string().optional(),
  timeRange: z.string().optional(),
});

const categorySchema = z.string().refine((v): v is ReportCategory => isReportCategory(v), {
  message: 'unknown report category',
});
const statusSchema = z.string().refine((v): v is RequestStatus => isRequestStatus(v), {
  message: 'unknown request status',
});
const originatorSchema = z.enum(['orchestrator', 'payment_webhook', 'engine', 'reconciler', 'operator']);

const requestRowSchema = z.object({
  id: z.coerce.number().int(),
  request_id: z.string(),
  category: categorySchema,
  reference_number: z.string().nullable(),
  contact: contactSchema,
  extra_fields: extraFieldsSchema,
  status: statusSchema,
  payment_reference: z.string().nullable(),
  amount_paid_cents: z.number().int().nullable(),
  confirmation_code: z.string().nullable(),
  confirmation_synthetic: z.boolean(),
  evidence_paths: z.array(z.string()),
  error_reason: z.string().nullable(),
  attempt_count: z.number().int(),
  last_attempt_at: z.date().nullable(),
  portal_status: z.string().nullable(),
  portal_status_checked_at: z.date().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
  submitted_at: z.date().nullable(),
  completed_at: z.date().nullable(),
});

const eventRowSchema = z.object({
  id: z.coerce.number().int(),
  request_id: z.string(),
  event_type: z.string(),
  payload: z.record(z.unknown()),
  originator: originatorSchema,
  created_at: z.date(),
});

export function decodeRequestRow(row: unknown): RecordsRequest {
  const r = requestRowSchema.parse(row);
  return {
    id: r.id,
    requestId: r.request_id,
    category: r.category,
    referenceNumber: r.reference_number,
    contact: r.contact,
    extraFields: r.extra_fields,
    status: r.status,
    paymentReference: r.payment_reference,
    amountPaidCents: r.amount_paid_cents,
    confirmationCode: r.confirmation_code,
    confirmationSynthetic: r.confirmation_synthetic,
    evidencePaths: r.evidence_paths,
    errorReason: r.error_reason,
    attemptCount: r.attempt_count,
    lastAttemptAt: r.last_attempt_at,
    portalStatus: r.portal_status,
    portalStatusCheckedAt: r.portal_status_checked_at,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
    submittedAt: r.submitted_at,
    completedAt: r.completed_at,
  };
}

export function decodeEventRow(row: unknown): RequestEvent {
  const r = eventRowSchema.parse(row);
  return {
    id: r.id,
    requestId: r.request_id,
    eventType: r.event_type,
    payload: r.payload,
    originator: r.originator,
    createdAt: r.created_at,
  };
}
