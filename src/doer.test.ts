import { describe, it, expect } from 'vitest';
import { dumpRequest, dumpResponse, fetchDoer, wrapDoerDumpBase64 } from './doer.js';

const decode = (b64: string) => Buffer.from(b64, 'base64').toString('utf8');

describe('fetchDoer', () => {
  it('delegates to the given fetch implementation', async () => {
    const seen: string[] = [];
    const fetchFn: typeof fetch = async (input: RequestInfo | URL) => {
      seen.push(input instanceof Request ? input.url : String(input));
      return new Response('stubbed');
    };

    const response = await fetchDoer(fetchFn)(new Request('http://api.test/users'));

    expect(await response.text()).toBe('stubbed');
    expect(seen).toEqual(['http://api.test/users']);
  });
});

describe('dumps', () => {
  it('dumps a request with its host and body', async () => {
    const request = new Request('http://api.test/users?a=1', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"a":1}',
    });

    expect(await dumpRequest(request)).toBe(
      'POST /users?a=1 HTTP/1.1\r\ncontent-type: application/json\r\nhost: api.test\r\n\r\n{"a":1}',
    );
    expect(await request.text()).toBe('{"a":1}');
  });

  it('dumps a request without body', async () => {
    expect(await dumpRequest(new Request('http://api.test/users'))).toBe(
      'GET /users HTTP/1.1\r\nhost: api.test\r\n\r\n',
    );
  });

  it('dumps a response', async () => {
    const response = new Response('ok', {
      status: 201,
      statusText: 'Created',
      headers: { 'x-id': '1' },
    });

    expect(await dumpResponse(response)).toBe(
      'HTTP/1.1 201 Created\r\ncontent-type: text/plain;charset=UTF-8\r\nx-id: 1\r\n\r\nok',
    );
    expect(await response.text()).toBe('ok');
  });
});

describe('wrapDoerDumpBase64', () => {
  it('reports both sides of the exchange', async () => {
    const dumps: Array<[string, string]> = [];
    const doer = wrapDoerDumpBase64(
      async () => new Response(null, { status: 204 }),
      (req, res) => dumps.push([decode(req), decode(res)]),
    );

    const response = await doer(new Request('http://api.test/users/1', { method: 'DELETE' }));

    expect(response.status).toBe(204);
    expect(dumps).toEqual([
      ['DELETE /users/1 HTTP/1.1\r\nhost: api.test\r\n\r\n', 'HTTP/1.1 204\r\n\r\n'],
    ]);
  });

  it('reports an empty response when the doer fails', async () => {
    const cause = new Error('connection refused');
    const dumps: Array<[string, string]> = [];
    const doer = wrapDoerDumpBase64(
      () => Promise.reject(cause),
      (req, res) => dumps.push([decode(req), res]),
    );

    await expect(doer(new Request('http://api.test/users'))).rejects.toBe(cause);
    expect(dumps).toEqual([['GET /users HTTP/1.1\r\nhost: api.test\r\n\r\n', '']]);
  });

  it('works without a dump callback', async () => {
    const doer = wrapDoerDumpBase64(async () => new Response('ok'));
    const response = await doer(new Request('http://api.test/'));
    expect(await response.text()).toBe('ok');
  });
});
