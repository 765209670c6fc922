/**
 * recordsrunner — public-records request automation.
 *
 * Portal submission engine plus the request lifecycle around it.
 */

export * from './engine/index.js';
export * from './db/index.js';
export * from './workers/index.js';
export * from './monitoring/index.js';
export * from './api/index.js';
export { REQUEST_EVENT_TYPES, type RequestEventType } from './events/RequestEventTypes.js';
export {
  SubmissionRateLimiter,
  RedisCounterBackend,
  MemoryCounterBackend,
  RateLimitExceededError,
  type CounterBackend,
  type SubmissionRateLimiterOptions,
} from './security/rateLimit.js';
export { createProxyRotation, isValidProxyUrl, parseProxyUrl, type ProxyRotation, type ProxyStrategy } from './security/proxyRotation.js';
export {
  ValidationError,
  sanitizeEmail,
  sanitizeField,
  sanitizeFreeText,
  sanitizeIdentifier,
  sanitizePhone,
} from './security/sanitize.js';
export { getCategoryConfig, parseIsoDate } from './config/categories.js';
export * from './config/index.js';
