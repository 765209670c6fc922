import { Redis } from 'ioredis';
import type { Pool } from 'pg';
import { startServer } from '../api/server.js';
import { getEnv, splitList } from '../config/env.js';
import { MemoryRequestRepository } from '../db/MemoryRequestRepository.js';
import { PgRequestRepository, createPool } from '../db/PgRequestRepository.js';
import type { RequestRepository } from '../db/RequestRepository.js';
import { ChromiumSessionFactory } from '../engine/browser.js';
import { SubmissionEngine } from '../engine/SubmissionEngine.js';
import { errorMessage, getLogger } from '../monitoring/logger.js';
import { createProxyRotation, isValidProxyUrl } from '../security/proxyRotation.js';
import {
  MemoryCounterBackend,
  RedisCounterBackend,
  SubmissionRateLimiter,
  type CounterBackend,
} from '../security/rateLimit.js';
import { BrowserPortalStatusChecker } from './PortalStatusChecker.js';
import { RequestOrchestrator } from './RequestOrchestrator.js';
import { SubmissionScheduler } from './SubmissionScheduler.js';

/**
 * Records runner entry point
 *
 * One long-running process that:
 * 1. Opens the request store (Postgres when DATABASE_URL is set, in-memory otherwise)
 * 2. Opens the hourly submission budget (Redis when REDIS_URL is set)
 * 3. Runs the submission and reconciliation loop on POLL_INTERVAL_MS
 * 4. Serves the event-ingress API on RECORDS_API_PORT
 */

function parseWorkerId(): string {
  const arg = process.argv.find((a) => a.startsWith('--worker-id='));
  if (arg) {
    const id = arg.split('=')[1];
    if (!id) {
      throw new Error('--worker-id requires a value (e.g. --worker-id=runner-1)');
    }
    return id;
  }
  return process.env.RECORDS_WORKER_ID || `runner-${process.env.NODE_ENV || 'local'}-${Date.now()}`;
}

const WORKER_ID = parseWorkerId();

async function main(): Promise<void> {
  const logger = getLogger({ bindings: { workerId: WORKER_ID } });
  const env = getEnv();
  logger.info('Records runner starting', { workerId: WORKER_ID, portalUrl: env.PORTAL_URL });

  // ── Persistence ──────────────────────────────────────────────────
  let pool: Pool | null = null;
  let repository: RequestRepository;
  if (env.DATABASE_URL) {
    pool = createPool(env.DATABASE_URL);
    const pgRepository = new PgRequestRepository({ pool, tablePrefix: env.RECORDS_TABLE_PREFIX });
    await pgRepository.migrate();
    repository = pgRepository;
    logger.info('Using Postgres request store', { tablePrefix: env.RECORDS_TABLE_PREFIX });
  } else {
    repository = new MemoryRequestRepository();
    logger.warn('DATABASE_URL not set, using in-memory request store (state is lost on restart)');
  }

  // ── Submission budget ────────────────────────────────────────────
  let redis: Redis | null = null;
  let counters: CounterBackend;
  if (env.REDIS_URL) {
    redis = new Redis(env.REDIS_URL, { maxRetriesPerRequest: 3, lazyConnect: true });
    await redis.connect();
    counters = new RedisCounterBackend(redis);
    logger.info('Redis connected for submission budget');
  } else {
    counters = new MemoryCounterBackend();
    logger.warn('REDIS_URL not set, submission budget is per-process');
  }
  const rateLimiter = new SubmissionRateLimiter({ backend: counters, limit: env.SUBMISSIONS_PER_HOUR });

  // ── Browser ──────────────────────────────────────────────────────
  const proxyUrls = splitList(env.PROXY_URLS);
  const validProxies = proxyUrls.filter(isValidProxyUrl);
  if (validProxies.length < proxyUrls.length) {
    logger.warn('Ignoring malformed proxy URLs', { dropped: proxyUrls.length - validProxies.length });
  }
  const sessions = new ChromiumSessionFactory({
    headless: env.BROWSER_HEADLESS,
    timezoneId: env.PORTAL_TIMEZONE,
    proxies: validProxies.length > 0 ? createProxyRotation(env.PROXY_STRATEGY, validProxies) : undefined,
    logger: logger.child({ component: 'browser' }),
  });

  const engine = new SubmissionEngine({
    portalUrl: env.PORTAL_URL,
    sessions,
    evidenceDir: env.EVIDENCE_DIR,
    titleKeywords: splitList(env.PORTAL_TITLE_KEYWORDS),
  });

  const statusChecker = env.PORTAL_STATUS_URL
    ? new BrowserPortalStatusChecker({ statusUrl: env.PORTAL_STATUS_URL, sessions })
    : undefined;
  if (!statusChecker) {
    logger.info('PORTAL_STATUS_URL not set, reconciliation disabled');
  }

  // ── Lifecycle ────────────────────────────────────────────────────
  const orchestrator = new RequestOrchestrator({
    repository,
    engine,
    rateLimiter,
    statusChecker,
    retryPolicy: {
      maxAttempts: env.MAX_SUBMISSION_ATTEMPTS,
      baseCooldownMs: env.RETRY_BASE_COOLDOWN_MS,
      maxCooldownMs: env.RETRY_MAX_COOLDOWN_MS,
    },
    batchSize: env.SUBMISSION_BATCH_SIZE,
    reconcileAfterMs: env.RECONCILE_AFTER_MS,
    reconcileIntervalMs: env.RECONCILE_INTERVAL_MS,
    staleSubmittingMs: env.SUBMITTING_STALE_AFTER_MS,
  });

  const scheduler = new SubmissionScheduler({ orchestrator, intervalMs: env.POLL_INTERVAL_MS });

  if (!env.RECORDS_SERVICE_KEY) {
    logger.warn('RECORDS_SERVICE_KEY not set, authenticated API routes will answer 500');
  }
  const server = startServer(
    { orchestrator, repository, serviceKey: env.RECORDS_SERVICE_KEY, scheduler },
    env.RECORDS_API_PORT,
  );

  // ── Graceful shutdown ────────────────────────────────────────────
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) {
      logger.warn('Second signal received, forcing exit', { signal });
      process.exit(1);
    }
    shuttingDown = true;
    logger.info('Received signal, starting graceful shutdown', { signal });

    await scheduler.stop();

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) logger.warn('API server close failed', { error: err.message });
        resolve();
      });
    });

    if (redis) {
      try {
        await redis.quit();
        logger.info('Redis connection closed');
      } catch (err) {
        logger.warn('Redis quit failed', { error: errorMessage(err) });
      }
    }

    if (pool) {
      try {
        await pool.end();
      } catch (err) {
        logger.warn('Postgres pool close failed', { error: errorMessage(err) });
      }
    }

    logger.info('Records runner shut down gracefully', { workerId: WORKER_ID });
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed', { error: errorMessage(err) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', { error: error.message });
    setTimeout(() => process.exit(1), 1000);
  });

  scheduler.start();
  logger.info('Records runner running', { workerId: WORKER_ID, pollIntervalMs: env.POLL_INTERVAL_MS });
}

main().catch((err) => {
  getLogger().error('Records runner fatal error', { error: errorMessage(err) });
  process.exit(1);
});
