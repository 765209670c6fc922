import type { MiddlewareHandler } from 'hono';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';

/**
 * Creates middleware that validates the request body against a Zod schema.
 * Parsed data is stored in c.set('validatedBody', data), typed from the schema.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<{ Variables: { validatedBody: T } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'bad_request', message: 'Invalid JSON body' }, 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        {
          error: 'validation_error',
          details: formatZodError(result.error),
        },
        422,
      );
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

function formatZodError(error: ZodError) {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}
