import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { CategoryConfig } from '../config/categories.js';
import type { LogicalField } from './types.js';

/**
 * Ordered pattern lists for the records portal, loaded from
 * portal-patterns.json next to this module. Earlier entries win.
 *
 * Category selectors are templates: `{formValue}` and `{displayName}` are
 * filled in from the category table.
 */

const selectorList = z.array(z.string().min(1)).min(1);
const regexList = z.array(z.string().min(1)).min(1);

const portalPatternsSchema = z.object({
  formLinks: selectorList,
  categoryControls: z
    .array(
      z.object({
        selector: z.string().min(1),
        action: z.enum(['click', 'select_label']),
      }),
    )
    .min(1),
  fields: z.object({
    referenceNumber: selectorList,
    firstName: selectorList,
    lastName: selectorList,
    email: selectorList,
    phone: selectorList,
    incidentDate: selectorList,
    officerBadge: selectorList,
    location: selectorList,
    address: selectorList,
    area: selectorList,
    dateRange: selectorList,
    timeRange: selectorList,
  }),
  submitControls: selectorList,
  confirmation: regexList,
  rejection: regexList,
  successIndicators: z.array(z.string().min(1)).min(1),
  statusLookup: z.object({
    searchInputs: selectorList,
    searchButtons: selectorList,
    ready: regexList,
    processing: regexList,
  }),
});

export type PortalPatterns = z.infer<typeof portalPatternsSchema>;

export type CategoryAction = PortalPatterns['categoryControls'][number]['action'];

export interface CategoryControl {
  selector: string;
  action: CategoryAction;
}

export type PortalStatus = 'ready' | 'processing' | 'unknown';

export function parsePortalPatterns(raw: unknown): PortalPatterns {
  return portalPatternsSchema.parse(raw);
}

const PATTERNS_FILE = new URL('./portal-patterns.json', import.meta.url);

export const PORTAL_PATTERNS: PortalPatterns = parsePortalPatterns(JSON.parse(readFileSync(PATTERNS_FILE, 'utf-8')));

const compile = (sources: string[], flags = 'i'): RegExp[] => sources.map((source) => new RegExp(source, flags));

const CONFIRMATION_REGEXES = compile(PORTAL_PATTERNS.confirmation, 'gi');
const REJECTION_REGEXES = compile(PORTAL_PATTERNS.rejection);
const READY_REGEXES = compile(PORTAL_PATTERNS.statusLookup.ready);
const PROCESSING_REGEXES = compile(PORTAL_PATTERNS.statusLookup.processing);

// ── Selectors ─────────────────────────────────────────────────────────────

export function fieldSelectors(field: LogicalField): readonly string[] {
  return PORTAL_PATTERNS.fields[field];
}

function quoteForSelector(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function categoryControls(config: Pick<CategoryConfig, 'formValue' | 'displayName'>): CategoryControl[] {
  const formValue = quoteForSelector(config.formValue);
  const displayName = quoteForSelector(config.displayName);
  return PORTAL_PATTERNS.categoryControls.map(({ selector, action }) => ({
    selector: selector.replaceAll('{formValue}', formValue).replaceAll('{displayName}', displayName),
    action,
  }));
}

// ── Page text classification ──────────────────────────────────────────────

export interface ConfirmationMatch {
  code: string;
  pattern: string;
}

/**
 * First confirmation pattern that matches wins; the code is uppercased.
 * Matches equal to one of `excluded` (the requester's own reference number,
 * echoed back by the page) are skipped.
 */
export function extractConfirmationCode(text: string, excluded: readonly string[] = []): ConfirmationMatch | null {
  const skip = new Set(excluded.map((value) => value.toUpperCase()));
  for (const regex of CONFIRMATION_REGEXES) {
    for (const match of text.matchAll(regex)) {
      const code = match[1]?.toUpperCase();
      if (code && !skip.has(code)) {
        return { code, pattern: regex.source };
      }
    }
  }
  return null;
}

/** The portal's own validation message, if the page shows one. */
export function findRejection(text: string): string | null {
  for (const regex of REJECTION_REGEXES) {
    const match = regex.exec(text);
    if (match) return match[0];
  }
  return null;
}

/** The first sentence containing a success indicator, trimmed. */
export function findStatusSentence(text: string): string | null {
  const sentences = text.split('.');
  for (const indicator of PORTAL_PATTERNS.successIndicators) {
    const sentence = sentences.find((s) => s.toLowerCase().includes(indicator));
    if (sentence !== undefined) return sentence.trim();
  }
  return null;
}

export function classifyPortalStatus(text: string): PortalStatus {
  if (READY_REGEXES.some((regex) => regex.test(text))) return 'ready';
  if (PROCESSING_REGEXES.some((regex) => regex.test(text))) return 'processing';
  return 'unknown';
}
