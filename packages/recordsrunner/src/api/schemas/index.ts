export {
  PaymentConfirmedSchema,
  PaymentFailedSchema,
  RefundRecordedSchema,
  type PaymentConfirmedBody,
  type PaymentFailedBody,
  type RefundRecordedBody,
} from './events.js';
export { CreateRequestSchema, RequeueSchema, type CreateRequestBody, type RequeueBody } from './requests.js';
