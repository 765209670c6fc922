import { Hono } from 'hono';
import type { RequestOrchestrator } from '../../workers/RequestOrchestrator.js';
import { validateBody } from '../middleware/validation.js';
import { PaymentConfirmedSchema, PaymentFailedSchema, RefundRecordedSchema } from '../schemas/index.js';

export type PaymentEventHandler = Pick<
  RequestOrchestrator,
  'handlePaymentConfirmed' | 'handlePaymentFailed' | 'recordRefund'
>;

/**
 * Inbound payment events. Redeliveries answer 200 with `applied: false`;
 * unknown requests and disallowed transitions go through the error handler.
 */
export function createEventRoutes(orchestrator: PaymentEventHandler) {
  const events = new Hono();

  events.post('/payment-confirmed', validateBody(PaymentConfirmedSchema), async (c) => {
    const body = c.get('validatedBody');
    const result = await orchestrator.handlePaymentConfirmed({
      requestId: body.request_id,
      amountCents: body.amount_cents,
      paymentReference: body.payment_reference,
    });
    return c.json(result);
  });

  events.post('/payment-failed', validateBody(PaymentFailedSchema), async (c) => {
    const body = c.get('validatedBody');
    const result = await orchestrator.handlePaymentFailed({
      requestId: body.request_id,
      paymentReference: body.payment_reference ?? null,
      reason: body.reason,
    });
    return c.json(result);
  });

  events.post('/refund-recorded', validateBody(RefundRecordedSchema), async (c) => {
    const body = c.get('validatedBody');
    const result = await orchestrator.recordRefund({
      requestId: body.request_id,
      refundReference: body.refund_reference,
    });
    return c.json(result);
  });

  return events;
}
