import { describe, expect, it, vi } from 'vitest';
import { ErrorKind, type Logger } from '@resilient-api/core';
import { BatchExecutor } from '../executor';
import { BatchTransaction, TransactionFailedError } from '../transaction';
import type { BatchOperation } from '../types';
import { createFakeOperations, createFakeRegistry } from './helpers';

const createApp: BatchOperation = {
  id: 'create-app',
  type: 'create',
  resource: 'app',
  data: { name: 'web' },
};

const getMissing: BatchOperation = {
  id: 'get-missing',
  type: 'get',
  resource: 'app',
  data: 'missing',
};

const setup = () => {
  const app = createFakeOperations({
    get: async (guid) => {
      if (guid === 'missing') throw new Error('app not found');
      return { guid };
    },
  });
  const space = createFakeOperations();
  const serviceInstance = createFakeOperations();
  const registry = createFakeRegistry(
    { app, space, service_instance: serviceInstance },
    ['service_instance']
  );
  return { app, space, serviceInstance, executor: new BatchExecutor(registry) };
};

const logger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

describe('BatchTransaction', () => {
  it('resolves with the results when everything succeeds', async () => {
    const { app, executor } = setup();

    const results = await new BatchTransaction(executor)
      .add(createApp)
      .add({ id: 'get-app', type: 'get', resource: 'app', data: 'a1' })
      .execute();

    expect(results.map((result) => result.success)).toEqual([true, true]);
    expect(app.delete).not.toHaveBeenCalled();
  });

  it('deletes reversible creates and reports everything else when an operation fails', async () => {
    const { app, serviceInstance, executor } = setup();
    const log = logger();
    const transaction = new BatchTransaction(executor, log)
      .add(createApp)
      .add({
        id: 'create-si',
        type: 'create',
        resource: 'service_instance',
        data: { name: 'db' },
      })
      .add({
        id: 'update-space',
        type: 'update',
        resource: 'space',
        data: { guid: 's1', request: { name: 'dev' } },
      })
      .add(getMissing);

    const error = await transaction.execute().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransactionFailedError);
    if (!(error instanceof TransactionFailedError)) return;
    expect(error.kind).toBe(ErrorKind.TransactionFailed);
    expect(error.message).toBe(
      'transaction failed, 1 operations failed: [get-missing]'
    );
    expect(error.failedIds).toEqual(['get-missing']);
    expect(error.results).toHaveLength(4);
    const attempted = error.rollback?.attempted ?? [];
    expect(attempted.map((result) => [result.id, result.success])).toEqual([
      ['rollback_create-app', true],
    ]);
    expect(error.rollback?.notReversed).toEqual(['create-si', 'update-space']);
    expect(app.delete).toHaveBeenCalledWith(
      'guid-web',
      expect.any(AbortSignal)
    );
    expect(serviceInstance.delete).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith('batch.transaction.rolled_back', {
      failed: ['get-missing'],
      reversed: ['rollback_create-app'],
      notReversed: ['create-si', 'update-space'],
    });
  });

  it('lists every failed id', async () => {
    const { executor } = setup();

    const error = await new BatchTransaction(executor)
      .add({ id: 'a', type: 'get', resource: 'app', data: 'missing' })
      .add({ id: 'b', type: 'get', resource: 'widget', data: 'w1' })
      .execute()
      .catch((e: unknown) => e);

    expect(error).toMatchObject({
      message: 'transaction failed, 2 operations failed: [a, b]',
      failedIds: ['a', 'b'],
      rollback: { attempted: [], notReversed: [] },
    });
  });

  it('returns failed results without rolling back when rollback is off', async () => {
    const { app, executor } = setup();

    const results = await new BatchTransaction(executor)
      .setRollback(false)
      .add(createApp)
      .add(getMissing)
      .execute();

    expect(results.map((result) => result.success)).toEqual([true, false]);
    expect(app.delete).not.toHaveBeenCalled();
  });
});
