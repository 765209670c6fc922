import {
  REPORT_CATEGORIES,
  parseIsoDate,
  validateCategoryRestrictions,
  type ExtraFieldName,
} from '../config/categories.js';
import {
  ValidationError,
  sanitizeEmail,
  sanitizeFreeText,
  sanitizeIdentifier,
  sanitizePhone,
} from '../security/sanitize.js';
import type { PreparedField, PreparedSubmission, SubmissionRequest } from './types.js';

const IDENTIFIER_EXTRAS = new Set<ExtraFieldName>(['officerBadge']);

function formatPortalDate(raw: string, field: string): string {
  const date = parseIsoDate(raw);
  if (!date) {
    throw new ValidationError(field, `${field} must be a valid YYYY-MM-DD date`);
  }
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `${mm}/${dd}/${date.getUTCFullYear()}`;
}

function hasText(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Validate a request against its category and sanitize every value that will
 * be typed into the portal.
 *
 * Runs before any browser work; a ValidationError here means the request can
 * never succeed as entered.
 */
export function prepareSubmission(request: SubmissionRequest, now: Date = new Date()): PreparedSubmission {
  const config = REPORT_CATEGORIES[request.category];

  validateCategoryRestrictions(
    request.category,
    { referenceNumber: request.referenceNumber, extraFields: request.extraFields },
    now,
  );

  const fields: PreparedField[] = [];
  let referenceNumber: string | null = null;

  if (config.usesReferenceNumber && hasText(request.referenceNumber)) {
    referenceNumber = sanitizeIdentifier(request.referenceNumber, 'referenceNumber');
    fields.push({ field: 'referenceNumber', value: referenceNumber });
  }

  const { contact } = request;
  if (hasText(contact.firstName)) {
    fields.push({ field: 'firstName', value: sanitizeFreeText(contact.firstName, 'firstName') });
  }
  if (hasText(contact.lastName)) {
    fields.push({ field: 'lastName', value: sanitizeFreeText(contact.lastName, 'lastName') });
  }
  fields.push({ field: 'email', value: sanitizeEmail(contact.email) });
  if (hasText(contact.phone)) {
    fields.push({ field: 'phone', value: sanitizePhone(contact.phone) });
  }

  for (const field of config.extraFields) {
    const raw = request.extraFields[field];
    if (!hasText(raw)) continue;

    let value: string;
    if (field === 'incidentDate') {
      value = formatPortalDate(raw, field);
    } else if (IDENTIFIER_EXTRAS.has(field)) {
      value = sanitizeIdentifier(raw, field);
    } else {
      value = sanitizeFreeText(raw, field);
    }
    fields.push({ field, value });
  }

  return { category: request.category, referenceNumber, fields };
}
