import type {
  BodySerializer,
  Doer,
  ExchangeResult,
  RawBody,
  RequestBuilder,
  RequestOverride,
} from './entity/http-client.interfaces.js';
import { fetchDoer } from './doer.js';
import {
  messageOf,
  encodeBase64,
  entriesOf,
  toError,
  toSearchParams,
} from './functions/http-client.functions.js';
import { createResponse } from './response-builder.js';

type PendingBody = { value: unknown; serializer?: BodySerializer };

type RequestInitWithDuplex = RequestInit & { duplex?: 'half' };

/** Copy of `url` without its userinfo, which `Request` refuses. */
function withoutCredentials(url: URL): URL {
  const copy = new URL(url.href);
  copy.username = '';
  copy.password = '';
  return copy;
}

/** `Basic` authorization value of the userinfo of `url`, if any. */
function basicAuthorization(url: URL): string | undefined {
  if (url.username === '' && url.password === '') return undefined;
  const credentials = `${decodeURIComponent(url.username)}:${decodeURIComponent(url.password)}`;
  return `Basic ${encodeBase64(new TextEncoder().encode(credentials))}`;
}

/**
 * Starts building a request.
 *
 * Mutations apply to the builder itself and return it, so every handle on a
 * builder sees the same state. Invalid endpoints and body misconfiguration
 * are reported when the request is built, not when they are set.
 *
 * @example
 * ```ts
 * const error = await createRequest('PUT', 'https://api.example.com/users/{userID}/email')
 *   .pathReplacer('{userID}', userID)
 *   .sendJSON({ email })
 *   .execute()
 *   .successOnStatus(204)
 *   .errorOnStatus(404, ErrUserNotFound)
 *   .resolve();
 * ```
 */
export function createRequest(
  method: string,
  endpoint: string,
  options: { doer?: Doer } = {},
): RequestBuilder {
  let _doer = options.doer;
  let _endpointError: Error | undefined;
  let _url = new URL('about:blank');
  const _headers = new Headers();
  let _body: RawBody | undefined;
  let _pending: PendingBody | undefined;
  let _override: RequestOverride | undefined;

  try {
    _url = new URL(endpoint);
  } catch (caught) {
    _endpointError = toError(
      {
        type: 'invalid-endpoint',
        message: `unable to parse endpoint url "${endpoint}": ${messageOf(caught)}`,
      },
      caught,
    );
  }

  function updateQuery(mutate: (query: URLSearchParams) => void) {
    const query = new URLSearchParams(_url.search);
    mutate(query);
    query.sort();
    _url.search = query.toString();
  }

  function serialize(): BodyInit | undefined {
    if (!_pending) return _body instanceof Uint8Array ? new Uint8Array(_body) : _body;

    if (_body !== undefined)
      throw toError({
        type: 'body-conflict',
        message: 'body to serialize is set but body is already set',
      });

    const { value, serializer } = _pending;
    if (!serializer)
      throw toError({
        type: 'serializer-missing',
        message: 'body to serialize is set but body serializer is unset',
      });

    try {
      const serialized = serializer(value);
      return typeof serialized === 'string' ? serialized : new Uint8Array(serialized);
    } catch (caught) {
      throw toError(
        {
          type: 'serialization-failed',
          message: `unable to serialize body: ${messageOf(caught)}`,
        },
        caught,
      );
    }
  }

  async function build(signal?: AbortSignal): Promise<Request> {
    if (_endpointError) throw _endpointError;

    const body = serialize();
    const target = withoutCredentials(_url).href;

    let request: Request;
    try {
      const headers = new Headers(_headers);
      const authorization = basicAuthorization(_url);
      if (authorization && !headers.has('authorization'))
        headers.set('authorization', authorization);

      const init: RequestInitWithDuplex = {
        method,
        headers,
        body,
        signal,
      };
      if (body instanceof ReadableStream) init.duplex = 'half';
      request = new Request(target, init);
    } catch (caught) {
      throw toError(
        {
          type: 'request-construction',
          message: `unable to create request ${method} ${target}: ${messageOf(caught)}`,
        },
        caught,
      );
    }

    if (!_override) return request;

    try {
      return await _override(request);
    } catch (caught) {
      throw toError(
        {
          type: 'override-failed',
          message: `unable to override request ${request.method} ${request.url}: ${messageOf(caught)}`,
        },
        caught,
      );
    }
  }

  async function exchange(signal?: AbortSignal): Promise<ExchangeResult> {
    const target = _endpointError ? endpoint : withoutCredentials(_url).href;

    let request: Request;
    try {
      request = await build(signal);
    } catch (caught) {
      const message = `unable to build request: ${messageOf(caught)}`;
      return {
        ok: false,
        error: toError({ type: 'build-failed', message }, caught),
        method,
        url: target,
      };
    }

    try {
      const doer = _doer ?? fetchDoer();
      const response = await doer(request);
      return { ok: true, request, response };
    } catch (caught) {
      const message = `unable to execute ${request.method} ${request.url} request: ${messageOf(caught)}`;
      return {
        ok: false,
        error: toError(
          {
            type: 'execution-failed',
            message,
            method: request.method,
            url: request.url,
          },
          caught,
        ),
        method: request.method,
        url: request.url,
      };
    }
  }

  const self: RequestBuilder = {
    client(doer) {
      _doer = doer;
      return self;
    },

    setHeader(key, value, ...values) {
      _headers.delete(key);
      for (const v of [value, ...values]) _headers.append(key, v);
      return self;
    },

    setHeaders(headers) {
      for (const [key, values] of entriesOf(headers)) {
        _headers.delete(key);
        for (const v of values) _headers.append(key, v);
      }
      return self;
    },

    addHeader(key, value, ...values) {
      for (const v of [value, ...values]) _headers.append(key, v);
      return self;
    },

    addHeaders(headers) {
      for (const [key, values] of entriesOf(headers)) {
        for (const v of values) _headers.append(key, v);
      }
      return self;
    },

    setQueryParam(key, value, ...values) {
      updateQuery((query) => {
        query.delete(key);
        for (const v of [value, ...values]) query.append(key, v);
      });
      return self;
    },

    setQueryParams(params) {
      updateQuery((query) => {
        for (const [key, values] of entriesOf(params)) {
          query.delete(key);
          for (const v of values) query.append(key, v);
        }
      });
      return self;
    },

    addQueryParam(key, value, ...values) {
      updateQuery((query) => {
        for (const v of [value, ...values]) query.append(key, v);
      });
      return self;
    },

    addQueryParams(params) {
      updateQuery((query) => {
        for (const [key, values] of entriesOf(params)) {
          for (const v of values) query.append(key, v);
        }
      });
      return self;
    },

    pathReplacer(pattern, replaceWith) {
      _url.pathname = _url.pathname
        .replaceAll(pattern, replaceWith)
        .replaceAll(encodeURI(pattern), replaceWith);
      return self;
    },

    sendForm(values) {
      _body = toSearchParams(values).toString();
      return self.setHeader('Content-Type', 'application/x-www-form-urlencoded');
    },

    sendJSON(value) {
      _pending = { value, serializer: JSON.stringify };
      return self.setHeader('Content-Type', 'application/json');
    },

    send(body) {
      _body = body;
      return self.setHeader('Content-Type', 'application/octet-stream');
    },

    serializeWith(value, serializer) {
      _pending = { value, serializer };
      return self;
    },

    override(hook) {
      _override = hook;
      return self;
    },

    request: build,

    execute(signal) {
      return createResponse(exchange(signal));
    },
  };

  return self;
}
