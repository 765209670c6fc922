import { ValidationError } from '../security/sanitize.js';

/**
 * Report categories offered by the records portal.
 *
 * One table drives the whole submission engine: display names and form
 * values feed the category-selection probes, `usesReferenceNumber` and
 * `extraFields` decide what gets typed, and `restrictions` are checked
 * before a browser is ever opened.
 */

export type ReportCategory =
  | 'incident'
  | 'traffic_crash'
  | 'body_camera'
  | 'surveillance'
  | 'recordings_911'
  | 'calls_for_service'
  | 'crime_statistics';

export type ExtraFieldName =
  | 'incidentDate'
  | 'officerBadge'
  | 'location'
  | 'address'
  | 'area'
  | 'dateRange'
  | 'timeRange';

export interface CategoryRestrictions {
  /** Reference number must be present */
  requiresReferenceNumber?: boolean;
  /** Either the reference number or one of these extras must be present */
  requiresReferenceOr?: ExtraFieldName[];
  /** Extras that must be present */
  requiredExtras?: ExtraFieldName[];
  /** Portal retention window for the incident date, in days */
  maxIncidentAgeDays?: number;
}

export interface CategoryConfig {
  displayName: string;
  /** Value used by the portal's radio/checkbox/select inputs */
  formValue: string;
  /** Portal fee in cents */
  portalFeeCents: number;
  usesReferenceNumber: boolean;
  extraFields: ExtraFieldName[];
  restrictions: CategoryRestrictions;
}

export const REPORT_CATEGORIES: Record<ReportCategory, CategoryConfig> = {
  incident: {
    displayName: 'Incident Report',
    formValue: 'incident_report',
    portalFeeCents: 500,
    usesReferenceNumber: true,
    extraFields: [],
    restrictions: { requiresReferenceNumber: true },
  },
  traffic_crash: {
    displayName: 'Traffic Crash',
    formValue: 'traffic_crash',
    portalFeeCents: 500,
    usesReferenceNumber: true,
    extraFields: [],
    restrictions: { requiresReferenceNumber: true },
  },
  body_camera: {
    displayName: 'On Body Camera Audio/Video',
    formValue: 'body_camera',
    portalFeeCents: 400,
    usesReferenceNumber: true,
    extraFields: ['officerBadge', 'incidentDate', 'timeRange'],
    restrictions: { requiresReferenceOr: ['officerBadge'] },
  },
  surveillance: {
    displayName: 'Surveillance Videos',
    formValue: 'surveillance_video',
    portalFeeCents: 400,
    usesReferenceNumber: true,
    extraFields: ['officerBadge', 'location', 'incidentDate'],
    restrictions: { requiresReferenceOr: ['officerBadge'] },
  },
  recordings_911: {
    displayName: '911 Recordings',
    formValue: '911_recording',
    portalFeeCents: 1650,
    usesReferenceNumber: true,
    extraFields: ['incidentDate'],
    restrictions: {
      requiresReferenceNumber: true,
      requiredExtras: ['incidentDate'],
      maxIncidentAgeDays: 190,
    },
  },
  calls_for_service: {
    displayName: 'Calls for Service',
    formValue: 'calls_for_service',
    portalFeeCents: 0,
    usesReferenceNumber: false,
    extraFields: ['address', 'dateRange'],
    restrictions: { requiredExtras: ['address'] },
  },
  crime_statistics: {
    displayName: 'Crime Statistics',
    formValue: 'crime_statistics',
    portalFeeCents: 0,
    usesReferenceNumber: false,
    extraFields: ['area', 'dateRange'],
    restrictions: { requiredExtras: ['area'] },
  },
};

export const REPORT_CATEGORY_IDS: readonly ReportCategory[] = [
  'incident',
  'traffic_crash',
  'body_camera',
  'surveillance',
  'recordings_911',
  'calls_for_service',
  'crime_statistics',
];

export function isReportCategory(value: string): value is ReportCategory {
  return Object.prototype.hasOwnProperty.call(REPORT_CATEGORIES, value);
}

export function getCategoryConfig(category: ReportCategory): CategoryConfig {
  return REPORT_CATEGORIES[category];
}

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a `YYYY-MM-DD` date as UTC midnight. Returns null for anything that
 * is not a real calendar date (e.g. 2024-02-30).
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value.trim());
  if (!match) return null;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  if (
    date.getUTCFullYear() !== Number(y) ||
    date.getUTCMonth() !== Number(m) - 1 ||
    date.getUTCDate() !== Number(d)
  ) {
    return null;
  }
  return date;
}

export interface RestrictionInput {
  referenceNumber: string | null;
  extraFields: Partial<Record<ExtraFieldName, string>>;
}

function present(value: string | null | undefined): boolean {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Check a request against its category's restrictions.
 * @throws ValidationError naming the first violated rule
 */
export function validateCategoryRestrictions(
  category: ReportCategory,
  input: RestrictionInput,
  now: Date = new Date(),
): void {
  const { restrictions: rules, displayName } = REPORT_CATEGORIES[category];

  if (rules.requiresReferenceNumber && !present(input.referenceNumber)) {
    throw new ValidationError('referenceNumber', `${displayName} requests require a case or report number`);
  }

  if (rules.requiresReferenceOr) {
    const alternatives = rules.requiresReferenceOr;
    const hasAlternative = alternatives.some((f) => present(input.extraFields[f]));
    if (!present(input.referenceNumber) && !hasAlternative) {
      throw new ValidationError(
        'referenceNumber',
        `${displayName} requests require either a case number or ${alternatives.join(' or ')}`,
      );
    }
  }

  for (const field of rules.requiredExtras ?? []) {
    if (!present(input.extraFields[field])) {
      throw new ValidationError(field, `${displayName} requests require ${field}`);
    }
  }

  if (rules.maxIncidentAgeDays !== undefined) {
    const raw = input.extraFields.incidentDate;
    const incident = raw ? parseIsoDate(raw) : null;
    if (!incident) {
      throw new ValidationError('incidentDate', 'Incident date must be a valid YYYY-MM-DD date');
    }
    const ageDays = Math.floor((now.getTime() - incident.getTime()) / DAY_MS);
    if (ageDays > rules.maxIncidentAgeDays) {
      throw new ValidationError(
        'incidentDate',
        `${displayName} are only available within ${rules.maxIncidentAgeDays} days of the incident`,
      );
    }
  }
}
