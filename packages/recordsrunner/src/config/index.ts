export { getEnv, parseEnv, splitList, type Env } from './env.js';
export {
  REPORT_CATEGORIES,
  REPORT_CATEGORY_IDS,
  isReportCategory,
  validateCategoryRestrictions,
  type ReportCategory,
  type CategoryConfig,
  type ExtraFieldName,
} from './categories.js';
export { SUBMISSION_LIMITS } from './rateLimits.js';
