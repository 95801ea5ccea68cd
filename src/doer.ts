import type { Doer } from './entity/http-client.interfaces.js';
import { messageOf, encodeBase64 } from './functions/http-client.functions.js';

/** Adapts a fetch implementation into a `Doer`. Defaults to the global `fetch`. */
export function fetchDoer(fetchFn?: typeof fetch): Doer {
  return (request) => {
    if (fetchFn) return fetchFn(request);
    if (typeof globalThis.fetch === 'function') return globalThis.fetch(request);
    return Promise.reject(
      new Error('No fetch function available. Pass fetchFn to fetchDoer.'),
    );
  };
}

function headerLines(headers: Headers): string {
  let lines = '';
  headers.forEach((value, key) => {
    lines += `${key}: ${value}\r\n`;
  });
  return lines;
}

async function bodyText(message: Request | Response): Promise<string> {
  if (message.body === null) return '';
  return message.clone().text();
}

/**
 * HTTP/1.1 textual form of a request: request line, headers, blank line, body.
 * The body is read from a clone.
 */
export async function dumpRequest(request: Request): Promise<string> {
  const url = new URL(request.url);
  const target = `${url.pathname}${url.search}`;
  const headers = new Headers(request.headers);
  if (!headers.has('host')) headers.set('host', url.host);
  return `${request.method} ${target} HTTP/1.1\r\n${headerLines(headers)}\r\n${await bodyText(request)}`;
}

/** HTTP/1.1 textual form of a response: status line, headers, blank line, body. */
export async function dumpResponse(response: Response): Promise<string> {
  const statusText = response.statusText ? ` ${response.statusText}` : '';
  return `HTTP/1.1 ${response.status}${statusText}\r\n${headerLines(response.headers)}\r\n${await bodyText(response)}`;
}

async function dumpBase64(
  dump: () => Promise<string>,
  failure: string,
): Promise<string> {
  let text: string;
  try {
    text = await dump();
  } catch (caught) {
    text = `${failure}: ${messageOf(caught)}`;
  }
  return encodeBase64(new TextEncoder().encode(text));
}

/**
 * Wraps `doer` so every exchange is reported to `dump` as base64 encoded
 * HTTP/1.1 dumps of the request and the response. A missing response
 * (the doer rejected) is reported as an empty string.
 *
 * @example
 * ```ts
 * const doer = wrapDoerDumpBase64(fetchDoer(), (req, res) => {
 *   console.debug({ req, res });
 * });
 * ```
 */
export function wrapDoerDumpBase64(
  doer: Doer,
  dump: (requestB64: string, responseB64: string) => void = () => {},
): Doer {
  return async (request) => {
    const requestB64 = await dumpBase64(
      () => dumpRequest(request),
      'unable to dump request',
    );

    let response: Response;
    try {
      response = await doer(request);
    } catch (caught) {
      dump(requestB64, '');
      throw caught;
    }

    const responseB64 = await dumpBase64(
      () => dumpResponse(response),
      'unable to dump response',
    );
    dump(requestB64, responseB64);
    return response;
  };
}
