export {
  type RequestRepository,
  type ReconciliationQuery,
  PersistenceConflictError,
  RequestNotFoundError,
  DuplicateRequestError,
  InvalidTransitionError,
  assertTransition,
} from './RequestRepository.js';
export { PgRequestRepository, createPool, type PgRequestRepositoryOptions } from './PgRequestRepository.js';
export { MemoryRequestRepository } from './MemoryRequestRepository.js';
export { contactSchema, extraFieldsSchema } from './rows.js';
export {
  REQUEST_STATUSES,
  TERMINAL_STATUSES,
  canTransition,
  isRequestStatus,
  type RequestStatus,
  type RecordsRequest,
  type NewRecordsRequest,
  type RequestPatch,
  type RequestEvent,
  type NewRequestEvent,
  type EventOriginator,
} from './types.js';
