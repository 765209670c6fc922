export { createApp, startServer, type AppDeps } from './server.js';
export { toPublicView } from './routes/requests.js';
export { SERVICE_KEY_HEADER } from './middleware/auth.js';
