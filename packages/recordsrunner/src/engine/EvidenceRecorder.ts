/**
 * EvidenceRecorder — full-page screenshots at each submission milestone.
 *
 * Files land in `<rootDir>/<runId>/` and are prefixed with a per-run sequence
 * number so the order of a run can be rebuilt from a directory listing.
 * Capture is best-effort: a failed screenshot is logged and never aborts the
 * submission.
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { Page } from 'playwright-core';
import { utcStamp } from '../lib/timestamps.js';
import { errorMessage, type Logger } from '../monitoring/logger.js';

export interface EvidenceRecorderOptions {
  rootDir: string;
  runId: string;
  logger: Logger;
  clock?: () => Date;
}

export type ScreenshotTarget = Pick<Page, 'screenshot'>;

function safeLabel(label: string): string {
  return label.toLowerCase().replace(/[^a-z0-9_-]+/g, '_');
}

export class EvidenceRecorder {
  readonly runDir: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly paths: string[] = [];
  private sequence = 0;
  private dirReady: Promise<string | undefined> | null = null;

  constructor(options: EvidenceRecorderOptions) {
    this.runDir = path.join(options.rootDir, safeLabel(options.runId));
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Paths captured so far, in capture order. */
  get artifacts(): string[] {
    return [...this.paths];
  }

  async capture(page: ScreenshotTarget, label: string): Promise<string | null> {
    this.sequence++;
    const seq = String(this.sequence).padStart(2, '0');
    const filePath = path.join(this.runDir, `${seq}-${safeLabel(label)}-${utcStamp(this.clock())}.png`);

    try {
      this.dirReady ??= mkdir(this.runDir, { recursive: true });
      await this.dirReady;
      await page.screenshot({ path: filePath, fullPage: true });
    } catch (err) {
      this.dirReady = null;
      this.logger.warn('Evidence capture failed', { label, error: errorMessage(err) });
      return null;
    }

    this.paths.push(filePath);
    this.logger.debug('Evidence captured', { label, path: filePath });
    return filePath;
  }
}
