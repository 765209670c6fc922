import type { BrowserSessionFactory } from '../engine/browser.js';
import { typeLikeHuman } from '../engine/keyboard.js';
import { Pacing } from '../engine/pacing.js';
import { PORTAL_PATTERNS, classifyPortalStatus, type PortalStatus } from '../engine/patterns.js';
import { firstSuccess, selectorMatcher } from '../engine/probe.js';
import { errorMessage, getLogger, type Logger } from '../monitoring/logger.js';

/** Looks up a submitted request on the portal by its confirmation code. */
export interface PortalStatusChecker {
  check(confirmationCode: string): Promise<PortalStatus>;
}

export interface BrowserPortalStatusCheckerOptions {
  statusUrl: string;
  sessions: BrowserSessionFactory;
  pacing?: Pacing;
  logger?: Logger;
  navigationTimeoutMs?: number;
  probeTimeoutMs?: number;
}

export class BrowserPortalStatusChecker implements PortalStatusChecker {
  private readonly statusUrl: string;
  private readonly sessions: BrowserSessionFactory;
  private readonly pacing: Pacing;
  private readonly logger: Logger;
  private readonly navigationTimeoutMs: number;
  private readonly probeTimeoutMs: number;

  constructor(options: BrowserPortalStatusCheckerOptions) {
    this.statusUrl = options.statusUrl;
    this.sessions = options.sessions;
    this.pacing = options.pacing ?? new Pacing();
    this.logger = options.logger ?? getLogger().child({ component: 'PortalStatusChecker' });
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 60_000;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 3_000;
  }

  async check(confirmationCode: string): Promise<PortalStatus> {
    const session = await this.sessions.open();
    const { page } = session;

    try {
      await page.goto(this.statusUrl, { waitUntil: 'networkidle', timeout: this.navigationTimeoutMs });
      await this.pacing.pause('pageSettle');

      const typed = await firstSuccess(
        PORTAL_PATTERNS.statusLookup.searchInputs.map((selector) =>
          selectorMatcher(page, selector, this.probeTimeoutMs, (input) =>
            typeLikeHuman(page, input, confirmationCode, this.pacing),
          ),
        ),
      );
      if (!typed) {
        this.logger.warn('No status lookup input found', { statusUrl: this.statusUrl });
        return 'unknown';
      }

      await this.pacing.pause('beforeSubmit');
      const searched = await firstSuccess(
        PORTAL_PATTERNS.statusLookup.searchButtons.map((selector) =>
          selectorMatcher(page, selector, this.probeTimeoutMs, (button) => button.click()),
        ),
      );
      if (!searched) {
        await page.keyboard.press('Enter');
      }

      await page.waitForLoadState('networkidle', { timeout: this.navigationTimeoutMs }).catch((err: unknown) => {
        this.logger.debug('Status page did not settle', { error: errorMessage(err) });
      });
      await this.pacing.pause('pageSettle');

      const status = classifyPortalStatus(await page.innerText('body'));
      this.logger.info('Portal status checked', { status });
      return status;
    } finally {
      await session.close().catch((err: unknown) => {
        this.logger.warn('Failed to close browser session', { error: errorMessage(err) });
      });
    }
  }
}
