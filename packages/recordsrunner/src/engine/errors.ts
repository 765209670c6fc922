/**
 * Distinguished failure kinds raised by the submission pipeline.
 *
 * Stages never surface raw exceptions: each failure is one of these, so the
 * orchestrator can tell a transient problem (navigation timeout) from a
 * structural one (the form changed shape). Both currently get the same retry
 * treatment.
 */

export type StageName = 'navigate' | 'locate_form' | 'select_category' | 'fill_fields' | 'submit';

export type SubmissionErrorKind =
  | 'navigation_timeout'
  | 'portal_unavailable'
  | 'form_not_found'
  | 'category_not_selectable'
  | 'insufficient_fields_filled'
  | 'submit_control_not_found';

export abstract class SubmissionStageError extends Error {
  abstract readonly kind: SubmissionErrorKind;

  constructor(
    message: string,
    public readonly stage: StageName,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NavigationTimeoutError extends SubmissionStageError {
  readonly kind = 'navigation_timeout' as const;

  constructor(
    message: string,
    public readonly attempts: number,
  ) {
    super(message, 'navigate');
  }
}

export class PortalUnavailableError extends SubmissionStageError {
  readonly kind = 'portal_unavailable' as const;

  constructor(
    message: string,
    public readonly attempts: number,
  ) {
    super(message, 'navigate');
  }
}

export class FormNotFoundError extends SubmissionStageError {
  readonly kind = 'form_not_found' as const;

  constructor(message = 'No records request form found on the portal') {
    super(message, 'locate_form');
  }
}

export class CategoryNotSelectableError extends SubmissionStageError {
  readonly kind = 'category_not_selectable' as const;

  constructor(public readonly category: string) {
    super(`Could not select report category '${category}'`, 'select_category');
  }
}

export class InsufficientFieldsFilledError extends SubmissionStageError {
  readonly kind = 'insufficient_fields_filled' as const;

  constructor(
    public readonly filledFields: string[],
    public readonly required: number,
  ) {
    super(
      `Only ${filledFields.length} field(s) filled (${filledFields.join(', ') || 'none'}); need at least ${required} including the reference number`,
      'fill_fields',
    );
  }
}

export class SubmitControlNotFoundError extends SubmissionStageError {
  readonly kind = 'submit_control_not_found' as const;

  constructor() {
    super('No submit control found on the request form', 'submit');
  }
}

export function isSubmissionStageError(err: unknown): err is SubmissionStageError {
  return err instanceof SubmissionStageError;
}
