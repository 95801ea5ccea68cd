import type {
  ClientError,
  ClientErrorType,
  ClientFailure,
  HeaderValues,
  QueryValues,
} from '../entity/http-client.interfaces.js';

/** Default response read limit of an API façade (64 KiB). */
export const DEFAULT_BODY_SIZE_READ_LIMIT = 1 << 16;

/**
 * Converts a `ClientFailure` into a throwable `Error` with
 * the failure attached as `.clientError` and the underlying error as `.cause`.
 */
export function toError<F extends ClientFailure>(
  failure: F,
  cause?: unknown,
): ClientError<F> {
  const err =
    cause === undefined
      ? new Error(failure.message)
      : new Error(failure.message, { cause });
  return Object.assign(err, {
    name: `HttpClientError.${failure.type}`,
    clientError: failure,
  });
}

/** Narrows an unknown value to a client error, optionally of a given type. */
export function isClientError<T extends ClientErrorType>(
  err: unknown,
  type?: T,
): err is ClientError<Extract<ClientFailure, { type: T }>> {
  if (!(err instanceof Error)) return false;
  if (!('clientError' in err)) return false;
  const failure = err.clientError;
  if (typeof failure !== 'object' || failure === null) return false;
  if (!('type' in failure)) return false;
  return type === undefined || failure.type === type;
}

/**
 * Returns `true` when `target` is `err` or is found by following
 * the `cause` chain (and `AggregateError` members) of `err`.
 */
export function isErrorOf(err: unknown, target: Error): boolean {
  const seen = new Set<Error>();
  let current = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current === target) return true;
    if (current instanceof AggregateError) {
      const members: unknown[] = current.errors;
      if (members.some((member) => isErrorOf(member, target))) return true;
    }
    seen.add(current);
    current = current.cause;
  }

  return false;
}

/** Message of an unknown thrown value. */
export function messageOf(caught: unknown): string {
  return caught instanceof Error ? caught.message : String(caught);
}

/** Normalizes an unknown thrown value into an `Error`. */
export function asError(caught: unknown): Error {
  return caught instanceof Error ? caught : new Error(String(caught));
}

/** Diagnostic prefix shared by every response-time error. */
export function formatResponseError(
  method: string,
  url: string,
  status: number,
): string {
  return `request ${method} ${url} failed with status ${status}`;
}

/**
 * Declared content length of a response, `-1` when unknown.
 * Encoded bodies count as unknown: `fetch` decodes them, so the header gives
 * the size on the wire, not the size read.
 */
export function declaredContentLength(response: Response): number {
  const encoding = response.headers.get('content-encoding');
  if (encoding !== null && encoding.trim().toLowerCase() !== 'identity') return -1;

  const raw = response.headers.get('content-length');
  if (raw === null || !/^\d+$/.test(raw.trim())) return -1;
  return Number(raw.trim());
}

export type ReadLimit =
  | { type: 'unlimited' }
  | { type: 'capped'; bytes: number }
  | { type: 'exceeded'; contentLength: number; readLimit: number };

/**
 * Resolves the effective read limit from the configured one and the
 * declared content length.
 *
 * - negative limit: no cap
 * - unknown length: cap at the limit
 * - zero limit: cap at the declared length
 * - limit above the declared length: cap at the declared length
 * - limit below the declared length: exceeded
 */
export function resolveReadLimit(
  readLimit: number,
  contentLength: number,
): ReadLimit {
  if (readLimit < 0) return { type: 'unlimited' };
  if (contentLength < 0) return { type: 'capped', bytes: readLimit };
  if (readLimit === 0 || readLimit > contentLength)
    return { type: 'capped', bytes: contentLength };
  if (readLimit < contentLength)
    return { type: 'exceeded', contentLength, readLimit };
  return { type: 'capped', bytes: readLimit };
}

/** A response body acquired for the duration of one resolution. */
export type BodyHandle = {
  /** Stream yielding at most `maxBytes` bytes of the body. */
  capped(maxBytes: number): ReadableStream<Uint8Array>;
  /** Releases the underlying body. Only the first call has an effect. */
  close(): Promise<void>;
};

/** Locks `body` and hands out a capped view over it. */
export function openBody(body: ReadableStream<Uint8Array>): BodyHandle {
  const reader = body.getReader();
  let closed = false;

  async function close(): Promise<void> {
    if (closed) return;
    closed = true;
    // release errors are irrelevant once the body is no longer needed
    await reader.cancel().catch(() => undefined);
  }

  function capped(maxBytes: number): ReadableStream<Uint8Array> {
    let remaining = maxBytes;

    return new ReadableStream<Uint8Array>({
      async pull(controller) {
        if (remaining <= 0) {
          controller.close();
          return;
        }

        const { done, value } = await reader.read();
        if (done) {
          controller.close();
          return;
        }

        const chunk =
          value.byteLength > remaining ? value.subarray(0, remaining) : value;
        remaining -= chunk.byteLength;
        controller.enqueue(chunk);
      },
      cancel() {
        return close();
      },
    });
  }

  return { capped, close };
}

/** Base64 (with padding) of raw bytes. */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/** Groups header or query input into key → values pairs. */
export function entriesOf(
  input: HeaderValues | QueryValues,
): Array<[string, string[]]> {
  const grouped = new Map<string, string[]>();
  const push = (value: string, key: string) => {
    grouped.set(key, [...(grouped.get(key) ?? []), value]);
  };

  if (input instanceof Headers) {
    input.forEach(push);
  } else if (input instanceof URLSearchParams) {
    input.forEach(push);
  } else {
    for (const [key, value] of Object.entries(input)) {
      grouped.set(key, Array.isArray(value) ? [...value] : [value]);
    }
  }

  return [...grouped];
}

/** Builds sorted search params, the way query strings are materialized. */
export function toSearchParams(values: QueryValues): URLSearchParams {
  const params = new URLSearchParams();
  for (const [key, list] of entriesOf(values)) {
    for (const value of list) params.append(key, value);
  }
  params.sort();
  return params;
}

function unescapeFormComponent(component: string): string {
  try {
    return decodeURIComponent(component.replaceAll('+', ' '));
  } catch {
    throw new Error(`invalid URL escape in "${component}"`);
  }
}

/**
 * Parses `application/x-www-form-urlencoded` content.
 * Unlike `URLSearchParams`, malformed escapes and `;` separators are errors.
 */
export function parseFormValues(raw: string): URLSearchParams {
  const values = new URLSearchParams();

  for (const pair of raw.split('&')) {
    if (pair === '') continue;
    if (pair.includes(';'))
      throw new Error('invalid semicolon separator in query');

    const separator = pair.indexOf('=');
    const key = separator === -1 ? pair : pair.slice(0, separator);
    const value = separator === -1 ? '' : pair.slice(separator + 1);
    values.append(unescapeFormComponent(key), unescapeFormComponent(value));
  }

  return values;
}
