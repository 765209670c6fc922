import { z } from 'zod';

const requestId = z.string().min(1).max(128);
const reference = z.string().trim().min(1).max(255);

export const PaymentConfirmedSchema = z.object({
  request_id: requestId,
  amount_cents: z.number().int().nonnegative(),
  payment_reference: reference,
});

export type PaymentConfirmedBody = z.infer<typeof PaymentConfirmedSchema>;

export const PaymentFailedSchema = z.object({
  request_id: requestId,
  payment_reference: reference.nullish(),
  reason: z.string().trim().min(1).max(500),
});

export type PaymentFailedBody = z.infer<typeof PaymentFailedSchema>;

export const RefundRecordedSchema = z.object({
  request_id: requestId,
  refund_reference: reference,
});

export type RefundRecordedBody = z.infer<typeof RefundRecordedSchema>;
