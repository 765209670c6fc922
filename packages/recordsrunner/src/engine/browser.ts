import { chromium, type Browser, type Page } from 'playwright-core';
import type { Logger } from '../monitoring/logger.js';
import { parseProxyUrl, type ProxyRotation } from '../security/proxyRotation.js';

// ── Session contract ──────────────────────────────────────────────────────

export interface BrowserSession {
  page: Page;
  close(): Promise<void>;
}

/** One session per submission; the caller always closes it. */
export interface BrowserSessionFactory {
  open(): Promise<BrowserSession>;
}

// ── Chromium implementation ───────────────────────────────────────────────

const LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-features=IsolateOrigins,site-per-process',
  '--disable-site-isolation-trials',
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-accelerated-2d-canvas',
  '--no-first-run',
  '--disable-gpu',
  '--hide-scrollbars',
  '--mute-audio',
];

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

const EXTRA_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  DNT: '1',
  'Upgrade-Insecure-Requests': '1',
};

// Runs in the page before any portal script.
const AUTOMATION_MASK_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
Object.defineProperty(navigator, 'plugins', { get: () => [1, 2, 3, 4, 5] });
Object.defineProperty(navigator, 'languages', { get: () => ['en-US', 'en'] });
const originalQuery = window.navigator.permissions.query;
window.navigator.permissions.query = (parameters) =>
  parameters.name === 'notifications'
    ? Promise.resolve({ state: Notification.permission })
    : originalQuery(parameters);
`;

export interface ChromiumSessionOptions {
  headless: boolean;
  timezoneId: string;
  proxies?: ProxyRotation;
  logger: Logger;
  userAgent?: string;
  geolocation?: { latitude: number; longitude: number };
  launchTimeoutMs?: number;
}

export class ChromiumSessionFactory implements BrowserSessionFactory {
  constructor(private readonly options: ChromiumSessionOptions) {}

  async open(): Promise<BrowserSession> {
    const { options } = this;
    const proxyUrl = options.proxies?.next() ?? null;
    const proxy = proxyUrl ? parseProxyUrl(proxyUrl) : null;
    if (proxyUrl && !proxy) {
      options.logger.warn('Ignoring unparseable proxy URL');
    }

    const browser: Browser = await chromium.launch({
      headless: options.headless,
      args: LAUNCH_ARGS,
      timeout: options.launchTimeoutMs ?? 30_000,
      ...(proxy ? { proxy } : {}),
    });

    try {
      const context = await browser.newContext({
        viewport: { width: 1920, height: 1080 },
        userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
        locale: 'en-US',
        timezoneId: options.timezoneId,
        permissions: ['geolocation'],
        geolocation: options.geolocation ?? { latitude: 33.4484, longitude: -112.074 },
        extraHTTPHeaders: EXTRA_HEADERS,
      });
      await context.addInitScript({ content: AUTOMATION_MASK_SCRIPT });
      const page = await context.newPage();

      options.logger.debug('Browser session opened', { proxied: proxy !== null });

      return {
        page,
        close: async () => {
          await browser.close();
        },
      };
    } catch (err) {
      await browser.close();
      throw err;
    }
  }
}
