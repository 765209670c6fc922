/**
 * SubmissionEngine — drives one records request through the portal's web form.
 *
 * Five stages, each a prioritized probe over page shapes:
 *
 *   navigate → locate form → select category → fill fields → submit & confirm
 *
 * Every stage failure is a SubmissionStageError, mapped to a
 * SubmissionOutcome here. Input problems surface as ValidationError before a
 * browser is opened. Anything unclassified propagates after the session is
 * closed.
 */

import { errors, type Locator, type Page } from 'playwright-core';
import { REPORT_CATEGORIES } from '../config/categories.js';
import { utcStamp } from '../lib/timestamps.js';
import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';
import type { BrowserSessionFactory } from './browser.js';
import {
  CategoryNotSelectableError,
  FormNotFoundError,
  InsufficientFieldsFilledError,
  NavigationTimeoutError,
  PortalUnavailableError,
  SubmitControlNotFoundError,
  isSubmissionStageError,
  type SubmissionErrorKind,
  type SubmissionStageError,
} from './errors.js';
import { EvidenceRecorder } from './EvidenceRecorder.js';
import { typeLikeHuman } from './keyboard.js';
import { Pacing } from './pacing.js';
import {
  PORTAL_PATTERNS,
  categoryControls,
  extractConfirmationCode,
  fieldSelectors,
  findRejection,
  findStatusSentence,
} from './patterns.js';
import { prepareSubmission } from './prepareSubmission.js';
import { firstSuccess, selectorMatcher, type Matcher } from './probe.js';
import type {
  LogicalField,
  PreparedSubmission,
  SubmissionOutcome,
  SubmissionRequest,
  SubmissionStatus,
  SubmitOptions,
} from './types.js';

// ── Config ────────────────────────────────────────────────────────────────

export interface SubmissionTimeouts {
  navigationMs: number;
  formLinkMs: number;
  categoryMs: number;
  fieldMs: number;
  submitMs: number;
  /** Network-idle wait after clicks */
  settleMs: number;
}

export const DEFAULT_TIMEOUTS: SubmissionTimeouts = {
  navigationMs: 60_000,
  formLinkMs: 5_000,
  categoryMs: 3_000,
  fieldMs: 2_000,
  submitMs: 3_000,
  settleMs: 30_000,
};

/** Outcome status per stage error kind. */
const STAGE_FAILURE_STATUS: Record<SubmissionErrorKind, SubmissionStatus> = {
  navigation_timeout: 'timeout',
  portal_unavailable: 'unknown_error',
  // The form was reached but did not have the expected shape.
  form_not_found: 'not_found_form',
  category_not_selectable: 'not_found_form',
  insufficient_fields_filled: 'not_found_form',
  submit_control_not_found: 'not_found_form',
};

/** Minimum number of fields that must be typed before submitting. */
export const MIN_FILLED_FIELDS = 2;

export interface SubmissionEngineOptions {
  portalUrl: string;
  sessions: BrowserSessionFactory;
  evidenceDir: string;
  /** Landing page is accepted when its title contains one of these (case-insensitive) */
  titleKeywords?: string[];
  pacing?: Pacing;
  logger?: Logger;
  timeouts?: Partial<SubmissionTimeouts>;
  navigationAttempts?: number;
  navigationCooldownMs?: number;
  clock?: () => Date;
}

interface RunContext {
  page: Page;
  prepared: PreparedSubmission;
  evidence: EvidenceRecorder;
  log: Logger;
  runId: string;
}

export function isPlaywrightTimeout(err: unknown): boolean {
  return err instanceof errors.TimeoutError;
}

// ── Engine ────────────────────────────────────────────────────────────────

export class SubmissionEngine {
  private readonly portalUrl: string;
  private readonly sessions: BrowserSessionFactory;
  private readonly evidenceDir: string;
  private readonly titleKeywords: string[];
  private readonly pacing: Pacing;
  private readonly logger: Logger;
  private readonly timeouts: SubmissionTimeouts;
  private readonly navigationAttempts: number;
  private readonly navigationCooldownMs: number;
  private readonly clock: () => Date;

  constructor(options: SubmissionEngineOptions) {
    this.portalUrl = options.portalUrl;
    this.sessions = options.sessions;
    this.evidenceDir = options.evidenceDir;
    this.titleKeywords = (options.titleKeywords ?? []).map((k) => k.toLowerCase());
    this.pacing = options.pacing ?? new Pacing();
    this.logger = options.logger ?? getLogger().child({ component: 'SubmissionEngine' });
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.navigationAttempts = options.navigationAttempts ?? 3;
    this.navigationCooldownMs = options.navigationCooldownMs ?? 5_000;
    this.clock = options.clock ?? (() => new Date());
  }

  async submit(request: SubmissionRequest, options: SubmitOptions = {}): Promise<SubmissionOutcome> {
    // Throws ValidationError; no browser work for input that can never succeed.
    const prepared = prepareSubmission(request, this.clock());

    const runId = options.runId ?? `run-${utcStamp(this.clock())}`;
    const log = this.logger.child({ runId, category: prepared.category });
    const evidence = new EvidenceRecorder({
      rootDir: this.evidenceDir,
      runId,
      logger: log,
      clock: this.clock,
    });

    const session = await this.sessions.open();
    const ctx: RunContext = { page: session.page, prepared, evidence, log, runId };

    try {
      const outcome = await this.runStages(ctx);
      log.info('Submission finished', { status: outcome.status, synthetic: outcome.confirmationSynthetic });
      return outcome;
    } catch (err) {
      if (isSubmissionStageError(err)) {
        log.warn('Submission stage failed', { stage: err.stage, kind: err.kind, error: err.message });
        await ctx.evidence.capture(ctx.page, `${err.stage}_failed`);
        return this.stageFailure(ctx, err);
      }
      if (isPlaywrightTimeout(err)) {
        log.warn('Submission timed out outside a stage probe', { error: errorMessage(err) });
        await ctx.evidence.capture(ctx.page, 'timeout');
        return this.outcome(ctx, 'timeout', { errorMessage: errorMessage(err) });
      }
      throw err;
    } finally {
      await session.close().catch((closeErr: unknown) => {
        log.warn('Failed to close browser session', { error: errorMessage(closeErr) });
      });
    }
  }

  private async runStages(ctx: RunContext): Promise<SubmissionOutcome> {
    await this.navigate(ctx);
    await this.locateForm(ctx);
    await this.selectCategory(ctx);
    await this.fillFields(ctx);
    return this.submitAndConfirm(ctx);
  }

  // ── Stage 1: navigate ─────────────────────────────────────────────────

  private async navigate(ctx: RunContext): Promise<void> {
    const { page, log } = ctx;
    let timeouts = 0;
    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= this.navigationAttempts; attempt++) {
      try {
        log.info('Navigating to portal', { attempt });
        await this.pacing.pause('preNavigation');

        const response = await page.goto(this.portalUrl, {
          waitUntil: 'networkidle',
          timeout: this.timeouts.navigationMs,
        });
        if (response && response.status() >= 400) {
          log.warn('Portal responded with error status', { status: response.status(), attempt });
        }

        await page.waitForLoadState('domcontentloaded');
        await this.pacing.pause('pageSettle');
        await ctx.evidence.capture(page, 'landing');

        const title = await page.title();
        if (this.isPortalTitle(title)) {
          log.info('Portal loaded', { attempt });
          return;
        }
        lastReason = `unexpected page title "${title}"`;
        log.warn('Landing page did not look like the portal', { title, attempt });
      } catch (err) {
        if (isPlaywrightTimeout(err)) {
          timeouts++;
          lastReason = 'navigation timed out';
          log.warn('Navigation timeout', { attempt });
        } else {
          lastReason = errorMessage(err);
          log.warn('Navigation failed', { attempt, error: lastReason });
        }
      }

      if (attempt < this.navigationAttempts) {
        await this.pacing.wait(this.navigationCooldownMs);
      }
    }

    const summary = `Portal not reachable after ${this.navigationAttempts} attempt(s): ${lastReason}`;
    if (timeouts === this.navigationAttempts) {
      throw new NavigationTimeoutError(summary, this.navigationAttempts);
    }
    throw new PortalUnavailableError(summary, this.navigationAttempts);
  }

  private isPortalTitle(title: string): boolean {
    if (this.titleKeywords.length === 0) return true;
    const lower = title.toLowerCase();
    return this.titleKeywords.some((keyword) => lower.includes(keyword));
  }

  // ── Stage 2: locate form ──────────────────────────────────────────────

  private async locateForm(ctx: RunContext): Promise<void> {
    const { page, log } = ctx;

    const hit = await firstSuccess(
      PORTAL_PATTERNS.formLinks.map((selector) =>
        selectorMatcher(page, selector, this.timeouts.formLinkMs, async (link) => {
          await link.hover();
          await this.pacing.pause('micro');
          await link.click();
          await this.settle(ctx, 'form_link');
          await this.pacing.pause('pageSettle');
        }),
      ),
    );

    if (hit) {
      log.info('Found request form link', { pattern: hit.label, tried: hit.tried });
      await ctx.evidence.capture(page, 'request_form');
      return;
    }

    // No link matched; a form already on the page is a weak positive.
    const formCount = await page.locator('form').count();
    if (formCount > 0) {
      log.info('No request link matched, using form on current page', { formCount });
      await ctx.evidence.capture(page, 'form_fallback');
      return;
    }

    throw new FormNotFoundError();
  }

  // ── Stage 3: select category ──────────────────────────────────────────

  private async selectCategory(ctx: RunContext): Promise<void> {
    const { page, prepared, log } = ctx;
    const config = REPORT_CATEGORIES[prepared.category];

    const matchers: Matcher<Locator, void>[] = categoryControls(config).map(({ selector, action }) =>
      selectorMatcher(page, selector, this.timeouts.categoryMs, async (control) => {
        if (action === 'select_label') {
          await control.selectOption({ label: config.displayName });
        } else {
          await control.click();
        }
      }),
    );

    const hit = await firstSuccess(matchers);
    if (!hit) {
      throw new CategoryNotSelectableError(prepared.category);
    }

    log.info('Selected report category', { pattern: hit.label, displayName: config.displayName });
    await this.pacing.pause('afterSelection');
    await ctx.evidence.capture(page, 'category_selected');
  }

  // ── Stage 4: fill fields ──────────────────────────────────────────────

  private async fillFields(ctx: RunContext): Promise<void> {
    const { page, prepared, log } = ctx;
    const filled: LogicalField[] = [];

    for (const [index, { field, value }] of prepared.fields.entries()) {
      if (index > 0) await this.pacing.pause('fieldGap');

      const hit = await firstSuccess(
        fieldSelectors(field).map((selector) =>
          selectorMatcher(page, selector, this.timeouts.fieldMs, (input) => typeLikeHuman(page, input, value, this.pacing)),
        ),
      );

      if (hit) {
        filled.push(field);
        log.debug('Filled field', { field, pattern: hit.label });
      } else {
        log.debug('No input found for field', { field });
      }
    }

    await ctx.evidence.capture(page, 'form_filled');

    const referenceMissing = prepared.referenceNumber !== null && !filled.includes('referenceNumber');
    if (filled.length < MIN_FILLED_FIELDS || referenceMissing) {
      throw new InsufficientFieldsFilledError(filled, MIN_FILLED_FIELDS);
    }
    log.info('Form filled', { filled });
  }

  // ── Stage 5: submit and confirm ───────────────────────────────────────

  private async submitAndConfirm(ctx: RunContext): Promise<SubmissionOutcome> {
    const { page, log } = ctx;

    const hit = await firstSuccess(
      PORTAL_PATTERNS.submitControls.map((selector) =>
        selectorMatcher(page, selector, this.timeouts.submitMs, async (control) => {
          await control.scrollIntoViewIfNeeded();
          await this.pacing.pause('beforeSubmit');
          await control.hover();
          await this.pacing.pause('micro');
          await ctx.evidence.capture(page, 'pre_submit');
          await control.click();
        }),
      ),
    );
    if (!hit) {
      throw new SubmitControlNotFoundError();
    }
    log.info('Submitted request form', { pattern: hit.label });

    // The click has happened; from here on nothing may trigger a second one.
    await this.settle(ctx, 'submit');
    await this.pacing.pause('confirmationSettle');
    await ctx.evidence.capture(page, 'confirmation');

    const bodyText = await page.innerText('body');
    const statusMessage = findStatusSentence(bodyText);

    // A re-rendered form can echo the requester's own case number next to a
    // validation message, so rejection is decided before any code is read.
    const rejection = findRejection(bodyText);
    if (rejection) {
      log.warn('Portal rejected the submission', { rejection });
      return this.outcome(ctx, 'validation_rejected', {
        rawConfirmationText: bodyText,
        statusMessage,
        errorMessage: `Portal rejected the submission: ${rejection}`,
      });
    }

    const excluded = ctx.prepared.referenceNumber ? [ctx.prepared.referenceNumber] : [];
    const confirmation = extractConfirmationCode(bodyText, excluded);
    if (confirmation) {
      log.info('Confirmation code found', { pattern: confirmation.pattern });
      return this.outcome(ctx, 'submitted', {
        confirmationCode: confirmation.code,
        rawConfirmationText: bodyText,
        statusMessage,
      });
    }

    const syntheticCode = `LOCAL-${utcStamp(this.clock())}`;
    log.warn('No confirmation code on page, using local code', { syntheticCode });
    return this.outcome(ctx, 'submitted', {
      confirmationCode: syntheticCode,
      confirmationSynthetic: true,
      rawConfirmationText: bodyText,
      statusMessage,
    });
  }

  /** Wait for network idle; a timeout here is logged and tolerated. */
  private async settle(ctx: RunContext, after: string): Promise<void> {
    try {
      await ctx.page.waitForLoadState('networkidle', { timeout: this.timeouts.settleMs });
    } catch (err) {
      if (!isPlaywrightTimeout(err)) throw err;
      ctx.log.warn('Page did not reach network idle', { after, timeoutMs: this.timeouts.settleMs });
    }
  }

  // ── Outcomes ──────────────────────────────────────────────────────────

  private stageFailure(ctx: RunContext, err: SubmissionStageError): SubmissionOutcome {
    return this.outcome(ctx, STAGE_FAILURE_STATUS[err.kind], { errorKind: err.kind, errorMessage: err.message });
  }

  private outcome(ctx: RunContext, status: SubmissionStatus, fields: Partial<SubmissionOutcome>): SubmissionOutcome {
    return {
      status,
      runId: ctx.runId,
      confirmationCode: null,
      confirmationSynthetic: false,
      rawConfirmationText: null,
      statusMessage: null,
      errorKind: null,
      errorMessage: null,
      ...fields,
      evidencePaths: ctx.evidence.artifacts,
      pageUrl: ctx.page.url(),
    };
  }
}
