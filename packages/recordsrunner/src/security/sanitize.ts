/**
 * Input sanitization for the records portal.
 *
 * The portal's form handling breaks on structural/markup characters
 * (`< > & #` and friends): a single one in any field gets the whole
 * submission rejected or mangled. Every value typed into the portal passes
 * through one of these functions first:
 *
 *   1. Free text: denylisted characters replaced, control characters dropped
 *   2. Identifiers: alphanumerics and hyphens only, uppercased
 *   3. Email: lowercased and format-checked
 *   4. Phone: reduced to a 10-digit US number
 *
 * All functions are pure. Anything that cleans down to nothing, or fails its
 * format check, throws a ValidationError instead of being passed through.
 */

export type FieldSemantics = 'free_text' | 'identifier' | 'email' | 'phone';

export class ValidationError extends Error {
  readonly kind = 'validation_error' as const;

  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ── Free text ─────────────────────────────────────────────────────────────

const FREE_TEXT_REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/</g, '('],
  [/>/g, ')'],
  [/&/g, ' and '],
  [/#/g, ' number '],
  [/"/g, "'"],
  [/[\r\n\t]/g, ' '],
];

const NON_PRINTABLE = /\p{C}/gu;

export function sanitizeFreeText(raw: string, field = 'text'): string {
  let value = raw;
  for (const [pattern, replacement] of FREE_TEXT_REPLACEMENTS) {
    value = value.replace(pattern, replacement);
  }
  value = value.replace(NON_PRINTABLE, '').replace(/\s+/g, ' ').trim();

  if (!value) {
    throw new ValidationError(field, `${field} is empty after sanitization`);
  }
  return value;
}

// ── Identifiers (case / report numbers, badge numbers) ────────────────────

export function sanitizeIdentifier(raw: string, field = 'referenceNumber'): string {
  const value = raw.replace(/[^A-Za-z0-9-]/g, '').toUpperCase();
  if (!value) {
    throw new ValidationError(field, `${field} '${raw}' contains no valid characters`);
  }
  return value;
}

// ── Email ─────────────────────────────────────────────────────────────────

const EMAIL_PATTERN = /^[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}$/;

export function sanitizeEmail(raw: string, field = 'email'): string {
  const value = raw.trim().toLowerCase().replace(/[<>&#]/g, '');
  if (!EMAIL_PATTERN.test(value)) {
    throw new ValidationError(field, 'Invalid email format');
  }
  return value;
}

// ── Phone ─────────────────────────────────────────────────────────────────

export function sanitizePhone(raw: string, field = 'phone'): string {
  let digits = raw.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }
  if (digits.length !== 10) {
    throw new ValidationError(field, 'Phone number must have 10 digits');
  }
  return digits;
}

// ── Dispatcher ────────────────────────────────────────────────────────────

const SANITIZERS: Record<FieldSemantics, (raw: string, field?: string) => string> = {
  free_text: sanitizeFreeText,
  identifier: sanitizeIdentifier,
  email: sanitizeEmail,
  phone: sanitizePhone,
};

/**
 * Sanitize a value according to the semantics of the field it is destined for.
 */
export function sanitizeField(semantics: FieldSemantics, raw: string, field?: string): string {
  return SANITIZERS[semantics](raw, field);
}
