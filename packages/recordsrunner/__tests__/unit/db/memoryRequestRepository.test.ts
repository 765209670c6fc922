import { beforeEach, describe, expect, test } from 'vitest';
import { MemoryRequestRepository } from '../../../src/db/MemoryRequestRepository.js';
import {
  DuplicateRequestError,
  InvalidTransitionError,
  PersistenceConflictError,
  RequestNotFoundError,
} from '../../../src/db/RequestRepository.js';
import { canTransition } from '../../../src/db/types.js';
import { newRequest, seedConfirmed } from '../../fixtures/requests.js';

const EVENT = { eventType: 'test', payload: {}, originator: 'orchestrator' } as const;

describe('status machine', () => {
  test('allows the retry loop and manual requeue', () => {
    expect(canTransition('submitting', 'payment_confirmed')).toBe(true);
    expect(canTransition('failed', 'payment_confirmed')).toBe(true);
  });

  test('terminal statuses go nowhere', () => {
    expect(canTransition('completed', 'submitted')).toBe(false);
    expect(canTransition('refunded', 'payment_confirmed')).toBe(false);
    expect(canTransition('payment_failed', 'payment_confirmed')).toBe(false);
  });

  test('submissions never skip the submitting state', () => {
    expect(canTransition('payment_confirmed', 'submitted')).toBe(false);
  });
});

describe('MemoryRequestRepository', () => {
  let now: Date;
  let repository: MemoryRequestRepository;

  beforeEach(() => {
    now = new Date('2025-03-01T12:00:00Z');
    repository = new MemoryRequestRepository(() => now);
  });

  test('create starts in pending_payment with no attempts', async () => {
    const created = await repository.create(newRequest());
    expect(created).toMatchObject({
      requestId: 'REQ-1',
      status: 'pending_payment',
      attemptCount: 0,
      confirmationCode: null,
      createdAt: now,
    });
  });

  test('create rejects a duplicate request id', async () => {
    await repository.create(newRequest());
    await expect(repository.create(newRequest())).rejects.toBeInstanceOf(DuplicateRequestError);
  });

  test('returned records are copies', async () => {
    const created = await repository.create(newRequest());
    created.contact.email = 'changed@b.com';
    expect((await repository.findByRequestId('REQ-1'))?.contact.email).toBe('a@b.com');
  });

  test('transition applies the patch and writes one event', async () => {
    await repository.create(newRequest());
    now = new Date('2025-03-01T12:05:00Z');

    const updated = await repository.transition(
      'REQ-1',
      'pending_payment',
      { status: 'payment_confirmed', amountPaidCents: 500 },
      EVENT,
    );

    expect(updated.status).toBe('payment_confirmed');
    expect(updated.amountPaidCents).toBe(500);
    expect(updated.updatedAt).toEqual(now);
    expect(await repository.listEvents('REQ-1')).toHaveLength(1);
  });

  test('transition fails on a status mismatch without writing', async () => {
    await repository.create(newRequest());

    const err = await repository
      .transition('REQ-1', 'payment_confirmed', { status: 'submitting' }, EVENT)
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PersistenceConflictError);
    expect(err).toMatchObject({ expected: 'payment_confirmed', actual: 'pending_payment' });
    expect(await repository.listEvents('REQ-1')).toEqual([]);
  });

  test('transition refuses edges outside the status machine', async () => {
    await repository.create(newRequest());
    await expect(
      repository.transition('REQ-1', 'pending_payment', { status: 'submitted' }, EVENT),
    ).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  test('unknown requests raise RequestNotFoundError', async () => {
    await expect(repository.transition('nope', 'pending_payment', { status: 'refunded' }, EVENT)).rejects.toBeInstanceOf(
      RequestNotFoundError,
    );
    await expect(repository.appendEvent('nope', EVENT)).rejects.toBeInstanceOf(RequestNotFoundError);
  });

  test('listAwaitingSubmission returns confirmed requests under the attempt cap, oldest first', async () => {
    await seedConfirmed(repository, { requestId: 'A' });
    now = new Date('2025-03-01T12:01:00Z');
    await seedConfirmed(repository, { requestId: 'B' });
    await repository.create(newRequest({ requestId: 'C' }));

    expect((await repository.listAwaitingSubmission(3, 10)).map((r) => r.requestId)).toEqual(['A', 'B']);
    expect((await repository.listAwaitingSubmission(3, 1)).map((r) => r.requestId)).toEqual(['A']);
  });

  test('listAwaitingReconciliation skips synthetic codes and recently checked requests', async () => {
    for (const [requestId, synthetic] of [
      ['REAL', false],
      ['LOCAL', true],
    ] as const) {
      await seedConfirmed(repository, { requestId });
      await repository.transition(requestId, 'payment_confirmed', { status: 'submitting' }, EVENT);
      await repository.transition(
        requestId,
        'submitting',
        { status: 'submitted', confirmationCode: 'X-1', confirmationSynthetic: synthetic, submittedAt: now },
        EVENT,
      );
    }

    const query = { submittedBefore: now, checkedBefore: now, limit: 10 };
    expect((await repository.listAwaitingReconciliation(query)).map((r) => r.requestId)).toEqual(['REAL']);

    await repository.recordStatusCheck('REAL', 'processing', new Date('2025-03-01T12:30:00Z'), EVENT);
    expect(await repository.listAwaitingReconciliation(query)).toEqual([]);
  });

  test('listStaleSubmitting returns attempts started at or before the cutoff', async () => {
    for (const [requestId, startedAt] of [
      ['OLD', new Date('2025-03-01T11:00:00Z')],
      ['NEW', new Date('2025-03-01T11:50:00Z')],
    ] as const) {
      await seedConfirmed(repository, { requestId });
      await repository.transition(requestId, 'payment_confirmed', { status: 'submitting', lastAttemptAt: startedAt }, EVENT);
    }
    await seedConfirmed(repository, { requestId: 'IDLE' });

    const cutoff = new Date('2025-03-01T11:30:00Z');
    expect((await repository.listStaleSubmitting(cutoff, 10)).map((r) => r.requestId)).toEqual(['OLD']);
    expect((await repository.listStaleSubmitting(now, 10)).map((r) => r.requestId)).toEqual(['OLD', 'NEW']);
    expect((await repository.listStaleSubmitting(now, 1)).map((r) => r.requestId)).toEqual(['OLD']);
  });
});
