import { describe, expect, it, vi } from 'vitest';
import {
  ApiHttpClient,
  decodeText,
  encodeText,
  type HttpTransport,
  type RawHttpResponse,
  type TransportRequest,
} from '@resilient-api/core';
import { BatchBuilder } from '../builder';
import { BatchExecutor } from '../executor';
import {
  createDefaultResourceRegistry,
  dispatchOperation,
  extractGuid,
} from '../registry';

const json = (
  status: number,
  body: unknown,
  headers: Record<string, string> = {}
): RawHttpResponse => ({
  status,
  headers: { 'Content-Type': 'application/json', ...headers },
  body: encodeText(JSON.stringify(body)),
});

const setup = () => {
  const sent: TransportRequest[] = [];
  const transport: HttpTransport = vi.fn(async (req: TransportRequest) => {
    sent.push(req);
    if (req.method === 'DELETE') {
      return {
        status: 202,
        headers: { Location: 'https://api.test/v3/jobs/job-1' },
        body: new Uint8Array(0),
      };
    }
    if (req.method === 'POST') {
      return json(201, { guid: 'space-1', name: 'dev' });
    }
    return json(200, { guid: req.url.split('/').pop() });
  });
  const http = new ApiHttpClient({ baseUrl: 'https://api.test', transport });
  return { sent, registry: createDefaultResourceRegistry(http) };
};

describe('createDefaultResourceRegistry', () => {
  it('registers the standard resources', () => {
    const { registry } = setup();

    expect(registry.resources()).toEqual([
      'app',
      'space',
      'organization',
      'route',
      'service_instance',
    ]);
    expect(registry.get('route')?.reversibleCreate).toBe(true);
    expect(registry.get('service_instance')?.reversibleCreate).toBe(false);
  });

  it('maps operations onto REST calls', async () => {
    const { sent, registry } = setup();
    const operations = new BatchBuilder()
      .addCreateSpace('create', { name: 'dev' })
      .addUpdateSpace('update', 'space-1', { name: 'prod' })
      .addDeleteSpace('delete', 'space-1')
      .addGetApp('get', 'app 1')
      .build();

    const executor = new BatchExecutor(registry, { concurrency: 1 });
    const results = await executor.execute(operations);

    expect(sent.map((req) => `${req.method} ${req.url}`)).toEqual([
      'POST https://api.test/v3/spaces',
      'PATCH https://api.test/v3/spaces/space-1',
      'DELETE https://api.test/v3/spaces/space-1',
      'GET https://api.test/v3/apps/app%201',
    ]);
    expect(sent[0].body && decodeText(sent[0].body)).toBe('{"name":"dev"}');
    expect(sent[1].body && decodeText(sent[1].body)).toBe('{"name":"prod"}');
    expect(results.map((result) => result.data)).toEqual([
      { guid: 'space-1', name: 'dev' },
      { guid: 'space-1' },
      { job: 'https://api.test/v3/jobs/job-1' },
      { guid: 'app%201' },
    ]);
  });

  it('rejects payloads of the wrong shape before any call', async () => {
    const { sent, registry } = setup();
    const signal = new AbortController().signal;

    await expect(
      dispatchOperation(
        registry,
        {
          id: 'x',
          type: 'create',
          resource: 'organization',
          data: ['not', 'an', 'object'],
        },
        signal
      )
    ).rejects.toThrow('invalid data type for organization operation: create');
    await expect(
      dispatchOperation(
        registry,
        { id: 'y', type: 'delete', resource: 'route', data: '' },
        signal
      )
    ).rejects.toThrow('invalid data type for route operation: delete');
    expect(sent).toHaveLength(0);
  });
});

describe('extractGuid', () => {
  it('reads the guid of a created resource', () => {
    expect(extractGuid({ guid: 'g1', name: 'web' })).toBe('g1');
    expect(extractGuid({ name: 'web' })).toBeUndefined();
    expect(extractGuid(undefined)).toBeUndefined();
  });
});
