import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { SubmissionEngine } from '../../../src/engine/SubmissionEngine.js';
import { Pacing } from '../../../src/engine/pacing.js';
import type { SubmissionRequest } from '../../../src/engine/types.js';
import { ValidationError } from '../../../src/security/sanitize.js';
import { FakePortal, fakeSessions } from '../../fixtures/fakePortal.js';
import { quietLogger } from '../../fixtures/logger.js';

const FORM_LINK = 'text=/records request/i';
const CATEGORY_RADIO = "input[type='radio'][value*='incident_report']";
const CATEGORY_SELECT = "select:has(option:has-text('Incident Report'))";
const CASE_INPUT = "input[name*='case']";
const EMAIL_INPUT = "input[type='email']";
const SUBMIT = "button[type='submit']";

const PORTAL_FORM = [FORM_LINK, CATEGORY_RADIO, CASE_INPUT, EMAIL_INPUT, SUBMIT];

const REQUEST: SubmissionRequest = {
  category: 'incident',
  referenceNumber: '2024-AB-100',
  contact: { email: 'a@b.com' },
  extraFields: {},
};

const NOW = new Date('2025-03-01T12:00:00Z');

const evidenceNames = (paths: string[]) => paths.map((p) => path.basename(p));

describe('SubmissionEngine', () => {
  let evidenceDir: string;
  let sleep: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    evidenceDir = await mkdtemp(path.join(os.tmpdir(), 'engine-evidence-'));
    sleep = vi.fn(async () => {});
  });

  afterEach(async () => {
    await rm(evidenceDir, { recursive: true, force: true });
  });

  function createEngine(portal: FakePortal) {
    const { sessions, close } = fakeSessions(portal);
    const engine = new SubmissionEngine({
      portalUrl: 'https://portal.example.gov/',
      sessions,
      evidenceDir,
      titleKeywords: ['phoenix'],
      pacing: new Pacing({ random: () => 0, sleep }),
      logger: quietLogger(),
      clock: () => NOW,
    });
    return { engine, sessions, close };
  }

  test('submits the form and reads the confirmation code', async () => {
    const portal = new FakePortal({
      visible: PORTAL_FORM,
      body: 'Thank you. Your request has been received. Confirmation Number: PHX-2024-0042',
    });
    const { engine, close } = createEngine(portal);

    const outcome = await engine.submit(REQUEST, { runId: 'REQ-1-a1' });

    expect(outcome).toMatchObject({
      status: 'submitted',
      runId: 'REQ-1-a1',
      confirmationCode: 'PHX-2024-0042',
      confirmationSynthetic: false,
      statusMessage: 'Your request has been received',
      errorKind: null,
      pageUrl: 'https://portal.example.gov/records',
    });
    expect(outcome.evidencePaths.map((p) => path.basename(p))).toEqual([
      '01-landing-20250301120000.png',
      '02-request_form-20250301120000.png',
      '03-category_selected-20250301120000.png',
      '04-form_filled-20250301120000.png',
      '05-pre_submit-20250301120000.png',
      '06-confirmation-20250301120000.png',
    ]);
    expect(portal.typed.get(CASE_INPUT)).toBe('2024-AB-100');
    expect(portal.typed.get(EMAIL_INPUT)).toBe('a@b.com');
    expect(portal.clickCount(SUBMIT)).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('selects the category from a dropdown by its label', async () => {
    const portal = new FakePortal({
      visible: [FORM_LINK, CATEGORY_SELECT, CASE_INPUT, EMAIL_INPUT, SUBMIT],
      body: 'Request ID: R-5521',
    });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(portal.selections).toEqual([{ selector: CATEGORY_SELECT, label: 'Incident Report' }]);
    expect(outcome.confirmationCode).toBe('R-5521');
    expect(outcome.runId).toBe('run-20250301120000');
  });

  test('uses a form already on the page when no link matches', async () => {
    const portal = new FakePortal({
      visible: [CATEGORY_RADIO, CASE_INPUT, EMAIL_INPUT, SUBMIT],
      formCount: 1,
      body: 'Confirmation number is 7781',
    });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome.status).toBe('submitted');
    expect(outcome.evidencePaths.map((p) => path.basename(p))[1]).toBe('02-form_fallback-20250301120000.png');
  });

  test('never clicks submit when the reference number field cannot be filled', async () => {
    const portal = new FakePortal({ visible: [FORM_LINK, CATEGORY_RADIO, CASE_INPUT, SUBMIT] });
    const { engine, close } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({ status: 'not_found_form', errorKind: 'insufficient_fields_filled' });
    expect(portal.clickCount(SUBMIT)).toBe(0);
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('reports an unselectable category', async () => {
    const portal = new FakePortal({ visible: [FORM_LINK, CASE_INPUT, EMAIL_INPUT, SUBMIT] });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({ status: 'not_found_form', errorKind: 'category_not_selectable' });
    expect(evidenceNames(outcome.evidencePaths)).toEqual([
      '01-landing-20250301120000.png',
      '02-request_form-20250301120000.png',
      '03-select_category_failed-20250301120000.png',
    ]);
  });

  test('reports a missing form', async () => {
    const portal = new FakePortal({ visible: [] });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({ status: 'not_found_form', errorKind: 'form_not_found' });
    expect(evidenceNames(outcome.evidencePaths)).toEqual([
      '01-landing-20250301120000.png',
      '02-locate_form_failed-20250301120000.png',
    ]);
  });

  test('captures the form when no submit control is found', async () => {
    const portal = new FakePortal({ visible: [FORM_LINK, CATEGORY_RADIO, CASE_INPUT, EMAIL_INPUT] });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({ status: 'not_found_form', errorKind: 'submit_control_not_found' });
    expect(evidenceNames(outcome.evidencePaths)).toEqual([
      '01-landing-20250301120000.png',
      '02-request_form-20250301120000.png',
      '03-category_selected-20250301120000.png',
      '04-form_filled-20250301120000.png',
      '05-submit_failed-20250301120000.png',
    ]);
  });

  test('invalid input fails before a browser session is opened', async () => {
    const portal = new FakePortal({ visible: PORTAL_FORM });
    const { engine, sessions } = createEngine(portal);

    await expect(engine.submit({ ...REQUEST, referenceNumber: '<<<>>>' })).rejects.toBeInstanceOf(ValidationError);
    expect(sessions.open).not.toHaveBeenCalled();
  });

  test('gives up after repeated navigation timeouts', async () => {
    const portal = new FakePortal({ visible: PORTAL_FORM, navigationTimeouts: 5 });
    const { engine, close } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({ status: 'timeout', errorKind: 'navigation_timeout' });
    expect(evidenceNames(outcome.evidencePaths)).toEqual(['01-navigate_failed-20250301120000.png']);
    expect(portal.goto).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(5_000);
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('recovers when a later navigation attempt succeeds', async () => {
    const portal = new FakePortal({ visible: PORTAL_FORM, navigationTimeouts: 2, body: 'Confirmation: C-99' });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome.confirmationCode).toBe('C-99');
    expect(portal.goto).toHaveBeenCalledTimes(3);
  });

  test('a page that is not the portal is reported as unavailable', async () => {
    const portal = new FakePortal({ visible: PORTAL_FORM, title: 'Domain for sale' });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({ status: 'unknown_error', errorKind: 'portal_unavailable' });
    expect(outcome.errorMessage).toBe('Portal not reachable after 3 attempt(s): unexpected page title "Domain for sale"');
  });

  test('a portal validation message is returned as validation_rejected', async () => {
    const portal = new FakePortal({ visible: PORTAL_FORM, body: 'Error: Phone is required' });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({
      status: 'validation_rejected',
      confirmationCode: null,
      errorMessage: 'Portal rejected the submission: is required',
    });
  });

  test('a rejected form that echoes the case number is not read as a confirmation', async () => {
    const portal = new FakePortal({
      visible: PORTAL_FORM,
      body: 'Case Number: 2024-AB-100. Email is required. Please correct the errors below.',
    });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({
      status: 'validation_rejected',
      confirmationCode: null,
      errorMessage: 'Portal rejected the submission: is required',
    });
  });

  test('the requester\'s own case number is never taken as the confirmation code', async () => {
    const portal = new FakePortal({
      visible: PORTAL_FORM,
      body: 'Thank you. Case Number: 2024-AB-100 has been received',
    });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({
      status: 'submitted',
      confirmationCode: 'LOCAL-20250301120000',
      confirmationSynthetic: true,
    });
  });

  test('generates a local code when the page shows none', async () => {
    const portal = new FakePortal({ visible: PORTAL_FORM, body: 'Thank you for your submission' });
    const { engine } = createEngine(portal);

    const outcome = await engine.submit(REQUEST);

    expect(outcome).toMatchObject({
      status: 'submitted',
      confirmationCode: 'LOCAL-20250301120000',
      confirmationSynthetic: true,
    });
  });

  test('unclassified errors propagate after the session is closed', async () => {
    const portal = new FakePortal({ visible: PORTAL_FORM });
    portal.innerText.mockRejectedValueOnce(new TypeError('body is detached'));
    const { engine, close } = createEngine(portal);

    await expect(engine.submit(REQUEST)).rejects.toThrow('body is detached');
    expect(close).toHaveBeenCalledTimes(1);
  });
});
