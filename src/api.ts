import type {
  Api,
  ApiConfig,
  RequestBuilder,
  ResponseBuilder,
} from './entity/http-client.interfaces.js';
import { DEFAULT_BODY_SIZE_READ_LIMIT } from './functions/http-client.functions.js';
import { createRequest } from './request-builder.js';

function joinPath(base: string, endpoint: string): string {
  if (base.endsWith('/') && endpoint.startsWith('/'))
    return base + endpoint.slice(1);
  if (!base.endsWith('/') && !endpoint.startsWith('/') && endpoint !== '')
    return `${base}/${endpoint}`;
  return base + endpoint;
}

/**
 * Creates an API façade holding what requests to one server have in common.
 *
 * Configuration is meant to happen once; request-producing methods then only
 * read it and create fresh builders, so one façade can serve concurrent calls.
 *
 * @example
 * ```ts
 * const api = createApi({ baseUrl: 'https://api.example.com/v1' })
 *   .withRequestHeaders({ Authorization: `Bearer ${token}` })
 *   .withResponseHandler(401, () => ErrUnauthorized);
 *
 * let user: unknown;
 * const error = await api
 *   .do(api.get('/users/{userID}').pathReplacer('{userID}', id))
 *   .receiveJSON(200, (value) => { user = value; })
 *   .resolve();
 * ```
 */
export function createApi(config: ApiConfig): Api {
  const baseUrl = new URL(config.baseUrl);
  const headers: Record<string, string[]> = {};
  const handlers = new Map(
    Object.entries(config.handlers ?? {}).map(([status, handler]) => [
      Number(status),
      handler,
    ]),
  );
  let readLimit = config.bodySizeReadLimit ?? DEFAULT_BODY_SIZE_READ_LIMIT;
  let override = config.override;

  function mergeHeaders(next: Record<string, string | string[]>) {
    for (const [key, value] of Object.entries(next)) {
      headers[key] = Array.isArray(value) ? [...value] : [value];
    }
  }

  mergeHeaders(config.headers ?? {});

  function snapshot(): ApiConfig {
    return {
      ...config,
      baseUrl: new URL(baseUrl.href),
      headers: Object.fromEntries(
        Object.entries(headers).map(([key, values]) => [key, [...values]]),
      ),
      handlers: Object.fromEntries(handlers),
      bodySizeReadLimit: readLimit,
      override,
    };
  }

  function requestFor(method: string, endpoint: string): RequestBuilder {
    const builder = createRequest(method, self.url(endpoint).href, {
      doer: config.doer,
    }).setHeaders(headers);
    return override ? builder.override(override) : builder;
  }

  function respond(response: ResponseBuilder): ResponseBuilder {
    response.bodySizeReadLimit(readLimit);
    for (const [status, handler] of handlers) response.onStatus(status, handler);
    if (config.onSpan) response.onSpan(config.onSpan);
    return response;
  }

  const self: Api = {
    withRequestHeaders(next) {
      mergeHeaders(next);
      return self;
    },

    withResponseHandler(status, handler) {
      handlers.set(status, handler);
      return self;
    },

    withResponseBodySizeReadLimit(limit) {
      readLimit = limit;
      return self;
    },

    withRequestOverride(hook) {
      override = hook;
      return self;
    },

    clone() {
      return createApi(snapshot());
    },

    configure(next) {
      const current = snapshot();
      return createApi({
        ...current,
        ...next,
        headers: { ...current.headers, ...next.headers },
        handlers: { ...current.handlers, ...next.handlers },
      });
    },

    url(endpoint) {
      const url = new URL(baseUrl.href);
      url.pathname = joinPath(url.pathname, endpoint);
      return url;
    },

    head: (endpoint) => requestFor('HEAD', endpoint),
    get: (endpoint) => requestFor('GET', endpoint),
    post: (endpoint) => requestFor('POST', endpoint),
    put: (endpoint) => requestFor('PUT', endpoint),
    patch: (endpoint) => requestFor('PATCH', endpoint),
    delete: (endpoint) => requestFor('DELETE', endpoint),

    do(request, signal) {
      return respond(request.execute(signal));
    },

    execute(request, signal) {
      return self.do(request, signal).resolve();
    },
  };

  return self;
}
