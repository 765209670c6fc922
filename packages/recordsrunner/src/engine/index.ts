/**
 * Engine module — portal submission pipeline and its building blocks.
 */

export {
  SubmissionEngine,
  DEFAULT_TIMEOUTS,
  MIN_FILLED_FIELDS,
  isPlaywrightTimeout,
  type SubmissionEngineOptions,
  type SubmissionTimeouts,
} from './SubmissionEngine.js';
export { prepareSubmission } from './prepareSubmission.js';
export { typeLikeHuman } from './keyboard.js';
export { EvidenceRecorder, type EvidenceRecorderOptions, type ScreenshotTarget } from './EvidenceRecorder.js';
export { ChromiumSessionFactory, type BrowserSession, type BrowserSessionFactory, type ChromiumSessionOptions } from './browser.js';
export { Pacing, PACING_PROFILE, sleep, type DelayRange, type PacingPreset, type PacingOptions } from './pacing.js';
export { firstSuccess, findVisible, selectorMatcher, type Matcher, type ProbeHit, type ProbeOptions } from './probe.js';
export {
  PORTAL_PATTERNS,
  categoryControls,
  classifyPortalStatus,
  extractConfirmationCode,
  fieldSelectors,
  findRejection,
  findStatusSentence,
  type PortalStatus,
} from './patterns.js';
export {
  SubmissionStageError,
  NavigationTimeoutError,
  PortalUnavailableError,
  FormNotFoundError,
  CategoryNotSelectableError,
  InsufficientFieldsFilledError,
  SubmitControlNotFoundError,
  isSubmissionStageError,
  type StageName,
  type SubmissionErrorKind,
} from './errors.js';
export type {
  ContactInfo,
  ExtraFields,
  LogicalField,
  PreparedField,
  PreparedSubmission,
  SubmissionOutcome,
  SubmissionRequest,
  SubmissionStatus,
  SubmitOptions,
} from './types.js';
