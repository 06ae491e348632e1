import { describe, expect, it, vi } from 'vitest';
import { encodeJson } from '../request';
import {
  createFetchTransport,
  type FetchFunction,
} from '../transport/fetchTransport';

describe('createFetchTransport', () => {
  it('sends method, headers and body and reads the response in full', async () => {
    const fetchMock = vi.fn<FetchFunction>(
      async () =>
        new Response('{"guid":"app-1"}', {
          status: 201,
          headers: { 'X-Request-Id': 'req-1' },
        })
    );
    const transport = createFetchTransport({ fetch: fetchMock });
    const controller = new AbortController();

    const raw = await transport(
      {
        method: 'POST',
        url: 'https://api.example.com/v3/apps',
        headers: { 'Content-Type': 'application/json' },
        body: encodeJson({ name: 'app-1' }),
      },
      controller.signal
    );

    expect(raw.status).toBe(201);
    expect(raw.headers['x-request-id']).toBe('req-1');
    expect(new TextDecoder().decode(raw.body)).toBe('{"guid":"app-1"}');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.example.com/v3/apps');
    expect(init.method).toBe('POST');
    expect(init.signal).toBe(controller.signal);
    expect(init.body).toBeInstanceOf(Blob);
  });

  it('omits an empty body', async () => {
    const fetchMock = vi.fn<FetchFunction>(
      async () => new Response(null, { status: 204 })
    );
    const transport = createFetchTransport({ fetch: fetchMock });

    const raw = await transport(
      {
        method: 'DELETE',
        url: 'https://api.example.com/v3/apps/a',
        headers: {},
        body: new Uint8Array(),
      },
      new AbortController().signal
    );

    expect(raw.status).toBe(204);
    expect(raw.body.byteLength).toBe(0);
    expect(fetchMock.mock.calls[0][1].body).toBeUndefined();
  });
});
