import { mkdtemp, rm, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { EvidenceRecorder } from '../../../src/engine/EvidenceRecorder.js';
import { quietLogger } from '../../fixtures/logger.js';

const CLOCK = () => new Date('2025-03-01T12:00:00Z');

describe('EvidenceRecorder', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'evidence-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('numbers captures in order inside the run directory', async () => {
    const recorder = new EvidenceRecorder({ rootDir: root, runId: 'REQ-1-a1', logger: quietLogger(), clock: CLOCK });
    const page = { screenshot: vi.fn(async () => Buffer.from('')) };

    const first = await recorder.capture(page, 'landing');
    const second = await recorder.capture(page, 'Request Form');

    expect(first).toBe(path.join(root, 'req-1-a1', '01-landing-20250301120000.png'));
    expect(second).toBe(path.join(root, 'req-1-a1', '02-request_form-20250301120000.png'));
    expect(page.screenshot).toHaveBeenCalledWith({ path: first, fullPage: true });
    expect(recorder.artifacts).toEqual([first, second]);
    expect((await stat(recorder.runDir)).isDirectory()).toBe(true);
  });

  test('a failed screenshot is skipped without throwing', async () => {
    const recorder = new EvidenceRecorder({ rootDir: root, runId: 'run', logger: quietLogger(), clock: CLOCK });
    const page = {
      screenshot: vi
        .fn()
        .mockRejectedValueOnce(new Error('Target closed'))
        .mockResolvedValueOnce(Buffer.from('')),
    };

    expect(await recorder.capture(page, 'landing')).toBeNull();
    const next = await recorder.capture(page, 'confirmation');

    expect(next).toBe(path.join(root, 'run', '02-confirmation-20250301120000.png'));
    expect(recorder.artifacts).toEqual([next]);
  });

  test('artifacts is a copy', async () => {
    const recorder = new EvidenceRecorder({ rootDir: root, runId: 'run', logger: quietLogger(), clock: CLOCK });
    recorder.artifacts.push('/tmp/elsewhere.png');
    expect(recorder.artifacts).toEqual([]);
  });
});
