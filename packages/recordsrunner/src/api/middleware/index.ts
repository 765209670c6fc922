export { serviceKeyAuth, SERVICE_KEY_HEADER } from './auth.js';
export { validateBody } from './validation.js';
export { errorHandler } from './error-handler.js';
