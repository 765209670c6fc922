import type { ExtraFieldName, ReportCategory } from '../config/categories.js';
import type { SubmissionErrorKind } from './errors.js';

// ── Inputs ────────────────────────────────────────────────────────────────

export interface ContactInfo {
  email: string;
  firstName?: string | null;
  lastName?: string | null;
  phone?: string | null;
}

export type ExtraFields = Partial<Record<ExtraFieldName, string>>;

/** Raw, unsanitized inputs for one portal submission. */
export interface SubmissionRequest {
  category: ReportCategory;
  referenceNumber: string | null;
  contact: ContactInfo;
  extraFields: ExtraFields;
}

export type LogicalField = 'referenceNumber' | 'firstName' | 'lastName' | 'email' | 'phone' | ExtraFieldName;

export interface PreparedField {
  field: LogicalField;
  value: string;
}

/** Sanitized inputs, in the order the fill stage types them. */
export interface PreparedSubmission {
  category: ReportCategory;
  referenceNumber: string | null;
  fields: PreparedField[];
}

// ── Outcome ───────────────────────────────────────────────────────────────

export type SubmissionStatus =
  | 'submitted'
  | 'not_found_form'
  | 'validation_rejected'
  | 'timeout'
  | 'unknown_error';

export interface SubmissionOutcome {
  status: SubmissionStatus;
  runId: string;
  confirmationCode: string | null;
  /** True when no confirmation pattern matched and the code was generated locally */
  confirmationSynthetic: boolean;
  evidencePaths: string[];
  rawConfirmationText: string | null;
  /** Sentence from the confirmation page carrying a success indicator */
  statusMessage: string | null;
  pageUrl: string | null;
  errorKind: SubmissionErrorKind | null;
  errorMessage: string | null;
}

export interface SubmitOptions {
  /** Namespaces evidence artifacts. Default: generated from the clock */
  runId?: string;
}
