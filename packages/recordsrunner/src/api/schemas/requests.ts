import { z } from 'zod';
import { isReportCategory, type ReportCategory } from '../../config/categories.js';

const optionalText = z.string().trim().max(200).nullish();

export const CreateRequestSchema = z.object({
  request_id: z.string().min(1).max(128).optional(),
  category: z.string().refine((v): v is ReportCategory => isReportCategory(v), {
    message: 'unknown report category',
  }),
  reference_number: z.string().trim().max(64).nullish(),
  contact: z.object({
    email: z.string().trim().min(1).max(254),
    first_name: optionalText,
    last_name: optionalText,
    phone: z.string().trim().max(32).nullish(),
  }),
  extra_fields: z
    .object({
      incident_date: z.string().max(32).optional(),
      officer_badge: z.string().max(64).optional(),
      location: z.string().max(200).optional(),
      address: z.string().max(200).optional(),
      area: z.string().max(200).optional(),
      date_range: z.string().max(64).optional(),
      time_range: z.string().max(64).optional(),
    })
    .default({}),
});

export type CreateRequestBody = z.infer<typeof CreateRequestSchema>;

export const RequeueSchema = z.object({
  operator: z.string().trim().min(1).max(100),
});

export type RequeueBody = z.infer<typeof RequeueSchema>;
