import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import {
  DuplicateRequestError,
  InvalidTransitionError,
  PersistenceConflictError,
  RequestNotFoundError,
} from '../../db/RequestRepository.js';
import { getLogger } from '../../monitoring/logger.js';

/**
 * Global error handler for the Hono app. Domain errors map to 404/409;
 * anything else is a 500 without internal detail.
 */
export function errorHandler(err: Error, c: Context) {
  if (err instanceof RequestNotFoundError) {
    return c.json({ error: 'not_found', message: 'Request not found' }, 404);
  }

  if (err instanceof InvalidTransitionError) {
    return c.json({ error: 'invalid_transition', status: err.from }, 409);
  }

  if (err instanceof DuplicateRequestError) {
    return c.json({ error: 'duplicate_request', message: 'Request already exists' }, 409);
  }

  if (err instanceof PersistenceConflictError) {
    return c.json({ error: 'conflict', status: err.actual }, 409);
  }

  if (err instanceof HTTPException) {
    return new Response(JSON.stringify({ error: 'http_error', message: err.message }), {
      status: err.status,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  getLogger().error('API error', { message: err.message, stack: err.stack });
  return c.json(
    {
      error: 'internal_error',
      message: 'An unexpected error occurred',
    },
    500,
  );
}
