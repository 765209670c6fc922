import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import { RequestNotFoundError, type RequestRepository } from '../../db/RequestRepository.js';
import type { NewRecordsRequest, RecordsRequest, RequestStatus } from '../../db/types.js';
import type { RequestOrchestrator } from '../../workers/RequestOrchestrator.js';
import { validateBody } from '../middleware/validation.js';
import { CreateRequestSchema, RequeueSchema, type CreateRequestBody } from '../schemas/index.js';

const CODE_VISIBLE: ReadonlySet<RequestStatus> = new Set<RequestStatus>(['submitted', 'completed']);

/** Only status and confirmation code leave the service. */
export function toPublicView(request: RecordsRequest) {
  return {
    request_id: request.requestId,
    status: request.status,
    confirmation_code: CODE_VISIBLE.has(request.status) ? request.confirmationCode : null,
  };
}

/** Maps the snake_case API body onto the repository's input. */
export function toNewRequest(body: CreateRequestBody, requestId: string): NewRecordsRequest {
  const extra = body.extra_fields;
  return {
    requestId,
    category: body.category,
    referenceNumber: body.reference_number ?? null,
    contact: {
      email: body.contact.email,
      firstName: body.contact.first_name ?? null,
      lastName: body.contact.last_name ?? null,
      phone: body.contact.phone ?? null,
    },
    extraFields: {
      incidentDate: extra.incident_date,
      officerBadge: extra.officer_badge,
      location: extra.location,
      address: extra.address,
      area: extra.area,
      dateRange: extra.date_range,
      timeRange: extra.time_range,
    },
  };
}

export interface RequestRoutesDeps {
  repository: Pick<RequestRepository, 'findByRequestId' | 'create'>;
  orchestrator: Pick<RequestOrchestrator, 'requeue'>;
}

export function createRequestRoutes({ repository, orchestrator }: RequestRoutesDeps) {
  const requests = new Hono();

  // Accepts a paid-for order; the request waits in pending_payment for its payment event.
  requests.post('/', validateBody(CreateRequestSchema), async (c) => {
    const body = c.get('validatedBody');
    const created = await repository.create(toNewRequest(body, body.request_id ?? randomUUID()));
    return c.json(toPublicView(created), 201);
  });

  requests.get('/:requestId', async (c) => {
    const requestId = c.req.param('requestId');
    const request = await repository.findByRequestId(requestId);
    if (!request) throw new RequestNotFoundError(requestId);
    return c.json(toPublicView(request));
  });

  requests.post('/:requestId/requeue', validateBody(RequeueSchema), async (c) => {
    const { operator } = c.get('validatedBody');
    const updated = await orchestrator.requeue(c.req.param('requestId'), operator);
    return c.json(toPublicView(updated));
  });

  return requests;
}
