import type { MiddlewareHandler } from 'hono';

export const SERVICE_KEY_HEADER = 'X-Records-Service-Key';

/**
 * Service-to-service authentication: the X-Records-Service-Key header must
 * match the configured key.
 */
export function serviceKeyAuth(expectedKey: string | undefined): MiddlewareHandler {
  return async (c, next) => {
    if (!expectedKey) {
      return c.json({ error: 'server_config_error', message: 'Service key not configured' }, 500);
    }

    const serviceKey = c.req.header(SERVICE_KEY_HEADER);
    if (!serviceKey) {
      return c.json({ error: 'unauthorized', message: 'Missing authentication credentials' }, 401);
    }
    if (serviceKey !== expectedKey) {
      return c.json({ error: 'unauthorized', message: 'Invalid service key' }, 401);
    }

    await next();
  };
}
