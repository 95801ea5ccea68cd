import type { Doer } from '../entity/http-client.interfaces.js';

/**
 * Fake API server simulator for e2e tests.
 *
 * Routes requests through an in-memory handler registry. Each handler
 * receives the request with its decoded body and describes the response,
 * just like a real server would.
 */

type RouteHandler = (request: {
  url: URL;
  method: string;
  headers: Headers;
  body: unknown;
}) => {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
};

type Route = {
  method: string;
  path: string;
  handler: RouteHandler;
};

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

async function decodeBody(request: Request): Promise<unknown> {
  const text = await request.text();
  if (text === '') return undefined;
  const isJSON = (request.headers.get('content-type') ?? '').startsWith('application/json');
  return isJSON ? JSON.parse(text) : text;
}

function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): Response {
  if (NULL_BODY_STATUSES.has(status) || body === undefined)
    return new Response(null, { status, headers });

  const encoded = new TextEncoder().encode(JSON.stringify(body));
  return new Response(encoded, {
    status,
    headers: {
      'content-type': 'application/json',
      'content-length': String(encoded.byteLength),
      ...headers,
    },
  });
}

/**
 * Creates a fake API server answering through a `Doer`.
 * Routes are matched on method and path; the query is ignored.
 *
 * @example
 * ```ts
 * const server = createFakeApi();
 * server.get('/api/users', () => ({ status: 200, body: [{ id: '1', name: 'Alice' }] }));
 *
 * const api = createApi({ baseUrl: 'http://fake.api', doer: server.doer });
 * ```
 */
export function createFakeApi() {
  const routes: Route[] = [];

  function addRoute(method: string, path: string, handler: RouteHandler) {
    routes.push({ method: method.toUpperCase(), path, handler });
  }

  const doer: Doer = async (request) => {
    const url = new URL(request.url);
    const route = routes.find(
      (r) => r.method === request.method && r.path === url.pathname,
    );

    if (!route) return jsonResponse(404, { error: 'Not Found' });

    const body = await decodeBody(request);
    const result = route.handler({
      url,
      method: request.method,
      headers: request.headers,
      body,
    });

    return jsonResponse(result.status, result.body, result.headers);
  };

  return {
    doer,
    get: (path: string, handler: RouteHandler) => addRoute('GET', path, handler),
    post: (path: string, handler: RouteHandler) => addRoute('POST', path, handler),
    put: (path: string, handler: RouteHandler) => addRoute('PUT', path, handler),
    patch: (path: string, handler: RouteHandler) => addRoute('PATCH', path, handler),
    delete: (path: string, handler: RouteHandler) => addRoute('DELETE', path, handler),
  };
}

/**
 * Creates a doer that simulates a network failure.
 */
export function createFailingDoer(): Doer {
  return async () => {
    throw new TypeError('fetch failed');
  };
}

/**
 * Creates a doer that fails N times then delegates to `doer`.
 */
export function createIntermittentDoer(doer: Doer, failCount: number): Doer {
  let failures = 0;
  return async (request) => {
    if (failures < failCount) {
      failures++;
      throw new TypeError('fetch failed');
    }
    return doer(request);
  };
}
