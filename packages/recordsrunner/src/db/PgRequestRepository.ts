import { readFile } from 'node:fs/promises';
import pg from 'pg';
import type { Pool, PoolClient } from 'pg';
import { getLogger } from '../monitoring/logger.js';
import {
  DuplicateRequestError,
  PersistenceConflictError,
  RequestNotFoundError,
  assertTransition,
  type ReconciliationQuery,
  type RequestRepository,
} from './RequestRepository.js';
import { decodeEventRow, decodeRequestRow } from './rows.js';
import {
  isRequestStatus,
  type NewRecordsRequest,
  type NewRequestEvent,
  type RecordsRequest,
  type RequestEvent,
  type RequestPatch,
  type RequestStatus,
} from './types.js';

const logger = getLogger().child({ component: 'PgRequestRepository' });

type Row = Record<string, unknown>;

/** Patch property → column. evidence_paths is JSONB and is sent as JSON text. */
const PATCH_COLUMNS: ReadonlyArray<readonly [keyof RequestPatch, string]> = [
  ['status', 'status'],
  ['paymentReference', 'payment_reference'],
  ['amountPaidCents', 'amount_paid_cents'],
  ['confirmationCode', 'confirmation_code'],
  ['confirmationSynthetic', 'confirmation_synthetic'],
  ['evidencePaths', 'evidence_paths'],
  ['errorReason', 'error_reason'],
  ['attemptCount', 'attempt_count'],
  ['lastAttemptAt', 'last_attempt_at'],
  ['submittedAt', 'submitted_at'],
  ['completedAt', 'completed_at'],
  ['portalStatus', 'portal_status'],
  ['portalStatusCheckedAt', 'portal_status_checked_at'],
];

const SCHEMA_FILE = new URL('./schema.sql', import.meta.url);

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
}

export function createPool(connectionString: string): Pool {
  return new pg.Pool({ connectionString, max: 5 });
}

export interface PgRequestRepositoryOptions {
  pool: Pool;
  /** Table name prefix, e.g. `rr_` */
  tablePrefix?: string;
}

export class PgRequestRepository implements RequestRepository {
  private readonly pool: Pool;
  private readonly prefix: string;
  private readonly requestsTable: string;
  private readonly eventsTable: string;

  constructor(options: PgRequestRepositoryOptions) {
    this.pool = options.pool;
    this.prefix = options.tablePrefix ?? 'rr_';
    if (!/^[a-z_]*$/.test(this.prefix)) {
      throw new Error(`Invalid table prefix: ${this.prefix}`);
    }
    this.requestsTable = `${this.prefix}records_requests`;
    this.eventsTable = `${this.prefix}request_events`;
  }

  /** Apply schema.sql (idempotent). */
  async migrate(): Promise<void> {
    const sql = (await readFile(SCHEMA_FILE, 'utf-8')).replaceAll('{{prefix}}', this.prefix);
    await this.pool.query(sql);
    logger.info('Schema applied', { requestsTable: this.requestsTable, eventsTable: this.eventsTable });
  }

  async findByRequestId(requestId: string): Promise<RecordsRequest | null> {
    const result = await this.pool.query<Row>(`SELECT * FROM ${this.requestsTable} WHERE request_id = $1`, [
      requestId,
    ]);
    const row = result.rows[0];
    return row ? decodeRequestRow(row) : null;
  }

  async create(input: NewRecordsRequest): Promise<RecordsRequest> {
    try {
      const result = await this.pool.query<Row>(
        `INSERT INTO ${this.requestsTable} (request_id, category, reference_number, contact, extra_fields)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING *`,
        [
          input.requestId,
          input.category,
          input.referenceNumber,
          JSON.stringify(input.contact),
          JSON.stringify(input.extraFields ?? {}),
        ],
      );
      return decodeRequestRow(result.rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateRequestError(input.requestId);
      throw err;
    }
  }

  async listAwaitingSubmission(maxAttempts: number, limit: number): Promise<RecordsRequest[]> {
    const result = await this.pool.query<Row>(
      `SELECT * FROM ${this.requestsTable}
       WHERE status = 'payment_confirmed' AND attempt_count < $1
       ORDER BY updated_at ASC, id ASC
       LIMIT $2`,
      [maxAttempts, limit],
    );
    return result.rows.map(decodeRequestRow);
  }

  async listStaleSubmitting(startedBefore: Date, limit: number): Promise<RecordsRequest[]> {
    const result = await this.pool.query<Row>(
      `SELECT * FROM ${this.requestsTable}
       WHERE status = 'submitting'
         AND (last_attempt_at IS NULL OR last_attempt_at <= $1)
       ORDER BY last_attempt_at ASC NULLS FIRST, id ASC
       LIMIT $2`,
      [startedBefore, limit],
    );
    return result.rows.map(decodeRequestRow);
  }

  async listAwaitingReconciliation(query: ReconciliationQuery): Promise<RecordsRequest[]> {
    const result = await this.pool.query<Row>(
      `SELECT * FROM ${this.requestsTable}
       WHERE status = 'submitted'
         AND confirmation_synthetic = FALSE
         AND submitted_at <= $1
         AND (portal_status_checked_at IS NULL OR portal_status_checked_at <= $2)
       ORDER BY submitted_at ASC
       LIMIT $3`,
      [query.submittedBefore, query.checkedBefore, query.limit],
    );
    return result.rows.map(decodeRequestRow);
  }

  async transition(
    requestId: string,
    expected: RequestStatus,
    patch: RequestPatch,
    event: NewRequestEvent,
  ): Promise<RecordsRequest> {
    return this.inTransaction(async (client) => {
      const locked = await client.query<{ status: string }>(
        `SELECT status FROM ${this.requestsTable} WHERE request_id = $1 FOR UPDATE`,
        [requestId],
      );
      const current = locked.rows[0]?.status;
      if (current === undefined) throw new RequestNotFoundError(requestId);
      if (!isRequestStatus(current)) {
        throw new Error(`Request ${requestId} has unknown status ${current}`);
      }
      if (current !== expected) {
        throw new PersistenceConflictError(requestId, expected, current);
      }
      assertTransition(requestId, current, patch.status);

      const assignments: string[] = [];
      const params: unknown[] = [];
      for (const [key, column] of PATCH_COLUMNS) {
        const value = patch[key];
        if (value === undefined) continue;
        params.push(column === 'evidence_paths' ? JSON.stringify(value) : value);
        assignments.push(`${column} = $${params.length}`);
      }
      params.push(requestId);

      const updated = await client.query<Row>(
        `UPDATE ${this.requestsTable}
         SET ${assignments.join(', ')}, updated_at = NOW()
         WHERE request_id = $${params.length}
         RETURNING *`,
        params,
      );
      await this.insertEvent(client, requestId, event);
      return decodeRequestRow(updated.rows[0]);
    });
  }

  async recordStatusCheck(
    requestId: string,
    portalStatus: string,
    checkedAt: Date,
    event: NewRequestEvent,
  ): Promise<void> {
    await this.inTransaction(async (client) => {
      const result = await client.query(
        `UPDATE ${this.requestsTable}
         SET portal_status = $1, portal_status_checked_at = $2, updated_at = NOW()
         WHERE request_id = $3`,
        [portalStatus, checkedAt, requestId],
      );
      if (result.rowCount === 0) throw new RequestNotFoundError(requestId);
      await this.insertEvent(client, requestId, event);
    });
  }

  async appendEvent(requestId: string, event: NewRequestEvent): Promise<RequestEvent> {
    const client = await this.pool.connect();
    try {
      return await this.insertEvent(client, requestId, event);
    } finally {
      client.release();
    }
  }

  async listEvents(requestId: string): Promise<RequestEvent[]> {
    const result = await this.pool.query<Row>(
      `SELECT * FROM ${this.eventsTable} WHERE request_id = $1 ORDER BY created_at ASC, id ASC`,
      [requestId],
    );
    return result.rows.map(decodeEventRow);
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private async insertEvent(client: PoolClient, requestId: string, event: NewRequestEvent): Promise<RequestEvent> {
    const result = await client.query<Row>(
      `INSERT INTO ${this.eventsTable} (request_id, event_type, payload, originator)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [requestId, event.eventType, JSON.stringify(event.payload), event.originator],
    );
    return decodeEventRow(result.rows[0]);
  }

  private async inTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        logger.error('Rollback failed', {
          error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
        });
      });
      throw err;
    } finally {
      client.release();
    }
  }
}
