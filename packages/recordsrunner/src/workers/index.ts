export {
  RequestOrchestrator,
  type RequestOrchestratorOptions,
  type Submitter,
  type PaymentConfirmedInput,
  type PaymentFailedInput,
  type RefundInput,
  type EventResult,
  type ProcessResult,
  type SubmissionPassSummary,
  type ReconciliationPassSummary,
  type CycleSummary,
} from './RequestOrchestrator.js';
export { SubmissionScheduler, type SubmissionSchedulerOptions, type CycleRunner } from './SubmissionScheduler.js';
export { BrowserPortalStatusChecker, type PortalStatusChecker, type BrowserPortalStatusCheckerOptions } from './PortalStatusChecker.js';
export { DEFAULT_RETRY_POLICY, attemptsExhausted, cooldownAfter, isDueForAttempt, type RetryPolicy } from './retryPolicy.js';
