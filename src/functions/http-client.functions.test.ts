import { describe, it, expect } from 'vitest';
import {
  declaredContentLength,
  encodeBase64,
  isClientError,
  isErrorOf,
  openBody,
  parseFormValues,
  resolveReadLimit,
  toError,
  toSearchParams,
} from './http-client.functions.js';

function streamOf(text: string, onCancel?: () => void) {
  const bytes = new TextEncoder().encode(text);
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(bytes);
      controller.close();
    },
    cancel() {
      onCancel?.();
    },
  });
}

describe('resolveReadLimit', () => {
  it('disables the cap for a negative limit whatever the declared length', () => {
    expect(resolveReadLimit(-1, 14)).toEqual({ type: 'unlimited' });
    expect(resolveReadLimit(-1, -1)).toEqual({ type: 'unlimited' });
  });

  it('caps at the limit when the length is unknown', () => {
    expect(resolveReadLimit(20, -1)).toEqual({ type: 'capped', bytes: 20 });
    expect(resolveReadLimit(0, -1)).toEqual({ type: 'capped', bytes: 0 });
  });

  it('trusts the declared length for a zero limit', () => {
    expect(resolveReadLimit(0, 14)).toEqual({ type: 'capped', bytes: 14 });
  });

  it('shrinks a limit above the declared length', () => {
    expect(resolveReadLimit(20, 14)).toEqual({ type: 'capped', bytes: 14 });
  });

  it('keeps a limit equal to the declared length', () => {
    expect(resolveReadLimit(14, 14)).toEqual({ type: 'capped', bytes: 14 });
  });

  it('rejects a declared length above the limit', () => {
    expect(resolveReadLimit(2, 14)).toEqual({
      type: 'exceeded',
      contentLength: 14,
      readLimit: 2,
    });
  });
});

describe('declaredContentLength', () => {
  it('reads the content-length header', () => {
    const response = new Response('x', { headers: { 'content-length': '14' } });
    expect(declaredContentLength(response)).toBe(14);
  });

  it('returns -1 without a usable header', () => {
    expect(declaredContentLength(new Response(null))).toBe(-1);
    expect(
      declaredContentLength(
        new Response('x', { headers: { 'content-length': 'abc' } }),
      ),
    ).toBe(-1);
  });

  it('treats encoded bodies as of unknown length', () => {
    const gzipped = new Response('x', {
      headers: { 'content-encoding': 'gzip', 'content-length': '14' },
    });
    const identity = new Response('x', {
      headers: { 'content-encoding': 'identity', 'content-length': '14' },
    });

    expect(declaredContentLength(gzipped)).toBe(-1);
    expect(declaredContentLength(identity)).toBe(14);
  });
});

describe('openBody', () => {
  it('yields at most the capped number of bytes', async () => {
    const body = openBody(streamOf('hello world!'));
    const text = await new Response(body.capped(5)).text();
    expect(text).toBe('hello');
  });

  it('yields everything when uncapped', async () => {
    const body = openBody(streamOf('hello world!'));
    const text = await new Response(body.capped(Infinity)).text();
    expect(text).toBe('hello world!');
  });

  it('releases the underlying body once', async () => {
    let cancels = 0;
    const body = openBody(streamOf('hello world!', () => cancels++));

    await body.close();
    await body.close();

    expect(cancels).toBe(1);
  });
});

describe('errors', () => {
  it('toError attaches the failure and the cause', () => {
    const cause = new TypeError('Failed to fetch');
    const err = toError(
      {
        type: 'execution-failed',
        message: 'unable to execute GET http://api.test/ request: Failed to fetch',
        method: 'GET',
        url: 'http://api.test/',
      },
      cause,
    );

    expect(err.name).toBe('HttpClientError.execution-failed');
    expect(err.message).toBe(
      'unable to execute GET http://api.test/ request: Failed to fetch',
    );
    expect(err.clientError.type).toBe('execution-failed');
    expect(err.cause).toBe(cause);
  });

  it('isClientError narrows by type', () => {
    const err = toError({ type: 'body-conflict', message: 'conflict' });
    expect(isClientError(err)).toBe(true);
    expect(isClientError(err, 'body-conflict')).toBe(true);
    expect(isClientError(err, 'unhandled-status')).toBe(false);
    expect(isClientError(new Error('plain'))).toBe(false);
    expect(isClientError('not an error')).toBe(false);
  });

  it('isErrorOf follows causes and aggregated errors', () => {
    const sentinel = new Error('unauthorized');
    const wrapped = new Error('outer', { cause: new Error('inner', { cause: sentinel }) });
    const aggregated = new AggregateError([new Error('other'), sentinel], 'many');

    expect(isErrorOf(sentinel, sentinel)).toBe(true);
    expect(isErrorOf(wrapped, sentinel)).toBe(true);
    expect(isErrorOf(aggregated, sentinel)).toBe(true);
    expect(isErrorOf(new Error('unauthorized'), sentinel)).toBe(false);
    expect(isErrorOf(undefined, sentinel)).toBe(false);
  });
});

describe('form values', () => {
  it('parses url-encoded content', () => {
    const values = parseFormValues('a=1&b=x+y&a=2&c');
    expect(values.getAll('a')).toEqual(['1', '2']);
    expect(values.get('b')).toBe('x y');
    expect(values.get('c')).toBe('');
  });

  it('rejects malformed escapes', () => {
    expect(() => parseFormValues('%zz=1')).toThrow('invalid URL escape in "%zz"');
  });

  it('rejects semicolon separators', () => {
    expect(() => parseFormValues('a=1;b=2')).toThrow(
      'invalid semicolon separator in query',
    );
  });

  it('toSearchParams sorts keys and keeps value order', () => {
    expect(toSearchParams({ b: '2', a: ['1', '3'] }).toString()).toBe('a=1&a=3&b=2');
  });
});

describe('encodeBase64', () => {
  it('encodes with padding', () => {
    expect(encodeBase64(new TextEncoder().encode('hello world!'))).toBe(
      'aGVsbG8gd29ybGQh',
    );
    expect(encodeBase64(new TextEncoder().encode('hi'))).toBe('aGk=');
  });
});

describe('declared length with real response bodies', () => {
  it('is independent of the actual body size', async () => {
    const response = new Response('hello world!', {
      headers: { 'content-length': '5' },
    });
    expect(declaredContentLength(response)).toBe(5);
    expect(await response.text()).toBe('hello world!');
  });
});
