import type {
  ExchangeResult,
  ResponseBuilder,
  ResponseHandler,
  SpanHandler,
  StandardSchema,
} from './entity/http-client.interfaces.js';
import {
  asError,
  declaredContentLength,
  messageOf,
  encodeBase64,
  formatResponseError,
  openBody,
  resolveReadLimit,
  toError,
} from './functions/http-client.functions.js';

function receiveJSONHandler(
  schema: StandardSchema | undefined,
  assign: (value: unknown) => void,
): ResponseHandler {
  return async (response, request) => {
    const prefix = formatResponseError(request.method, request.url, response.status);
    const fail = (detail: string, issues: string[], cause?: unknown) =>
      toError(
        {
          type: 'json-decode',
          message: `${prefix}: unable to parse JSON response body: ${detail}`,
          method: request.method,
          url: request.url,
          status: response.status,
          issues,
        },
        cause,
      );

    let data: unknown;
    try {
      data = JSON.parse(await response.text());
    } catch (caught) {
      return fail(messageOf(caught), [], caught);
    }

    if (!schema) {
      assign(data);
      return undefined;
    }

    const result = await schema['~standard'].validate(data);
    if (result.issues) {
      const issues = result.issues.map((i) => i.message);
      return fail(issues.join(', '), issues);
    }

    assign(result.value);
    return undefined;
  };
}

/**
 * Creates the response side of an exchange from a captured outcome.
 *
 * Failures captured while building or sending the request are returned
 * first by `resolve()`; otherwise the read limit is applied and the
 * handler registered for the response status decides the result.
 *
 * A builder models a single response: `resolve()` runs once and later
 * calls return the same result.
 */
export function createResponse(
  outcome: ExchangeResult | Promise<ExchangeResult>,
): ResponseBuilder {
  const start = performance.now();
  const handlers = new Map<number, ResponseHandler>();
  let _readLimit = 0;
  let _onSpan: SpanHandler | undefined;
  let resolved: Promise<Error | undefined> | undefined;

  async function dispatch(
    request: Request,
    response: Response,
  ): Promise<Error | undefined> {
    const body = response.body ? openBody(response.body) : undefined;

    try {
      const limit = resolveReadLimit(_readLimit, declaredContentLength(response));

      if (limit.type === 'exceeded') {
        const prefix = formatResponseError(request.method, request.url, response.status);
        return toError({
          type: 'body-too-large',
          message: `${prefix}: content length ${limit.contentLength} is above read limit ${limit.readLimit}`,
          method: request.method,
          url: request.url,
          status: response.status,
          contentLength: limit.contentLength,
          readLimit: limit.readLimit,
        });
      }

      const limited = body
        ? new Response(
            body.capped(limit.type === 'capped' ? limit.bytes : Infinity),
            {
              status: response.status,
              statusText: response.statusText,
              headers: response.headers,
            },
          )
        : response;

      const handler = handlers.get(response.status);
      if (handler) {
        try {
          const result = await handler(limited, request);
          return result instanceof Error ? result : undefined;
        } catch (caught) {
          return asError(caught);
        }
      }

      // an unreadable body is reported as empty
      const drained = new Uint8Array(
        await limited.arrayBuffer().catch(() => new ArrayBuffer(0)),
      );
      const prefix = formatResponseError(request.method, request.url, response.status);
      const encoded = drained.byteLength > 0 ? encodeBase64(drained) : undefined;

      return toError({
        type: 'unhandled-status',
        message: `${prefix}: unhandled status${encoded ? ` with b64 body ${encoded}` : ''}`,
        method: request.method,
        url: request.url,
        status: response.status,
        body: encoded,
      });
    } finally {
      await body?.close();
    }
  }

  async function settle(): Promise<Error | undefined> {
    const captured = await outcome;
    const error = captured.ok
      ? await dispatch(captured.request, captured.response)
      : captured.error;

    _onSpan?.({
      method: captured.ok ? captured.request.method : captured.method,
      url: captured.ok ? captured.request.url : captured.url,
      status: captured.ok ? captured.response.status : undefined,
      durationMs: Math.round(performance.now() - start),
      ok: error === undefined,
      error,
    });

    return error;
  }

  const self: ResponseBuilder = {
    bodySizeReadLimit(limit) {
      _readLimit = limit;
      return self;
    },

    onStatus(status, handler) {
      handlers.set(status, handler);
      return self;
    },

    onStatuses(statuses, handler) {
      for (const status of statuses) self.onStatus(status, handler);
      return self;
    },

    successOnStatus(...statuses) {
      return self.onStatuses(statuses, () => undefined);
    },

    errorOnStatus(status, error) {
      return self.onStatus(status, () => error);
    },

    receiveJSON(
      status: number,
      schemaOrAssign: StandardSchema | ((value: unknown) => void),
      assign?: (value: unknown) => void,
    ) {
      const handler =
        typeof schemaOrAssign === 'function'
          ? receiveJSONHandler(undefined, schemaOrAssign)
          : receiveJSONHandler(schemaOrAssign, assign ?? (() => undefined));
      return self.onStatus(status, handler);
    },

    onSpan(handler) {
      _onSpan = handler;
      return self;
    },

    resolve() {
      resolved ??= settle();
      return resolved;
    },

    async resolveOrThrow() {
      const error = await self.resolve();
      if (error) throw error;
    },
  };

  return self;
}
