import { messageOf, parseFormValues } from './functions/http-client.functions.js';

const parsed = new WeakMap<Request, URLSearchParams>();

const FORM_METHODS = new Set(['POST', 'PUT', 'PATCH']);

/**
 * Parses the body of `request` as url-encoded form values.
 *
 * POST, PUT and PATCH bodies are only parsed when their content type is
 * `application/x-www-form-urlencoded`; any other method (DELETE, GET with a
 * body...) always has its body parsed. Results are cached per request, so
 * later calls return the same values without reading the body again.
 * The body is read from a clone and stays readable.
 */
export async function parsePostForm(request: Request): Promise<URLSearchParams> {
  const cached = parsed.get(request);
  if (cached) return cached;

  const contentType = request.headers.get('content-type') ?? '';
  const isForm = contentType
    .split(';')[0]
    .trim()
    .toLowerCase() === 'application/x-www-form-urlencoded';

  let values = new URLSearchParams();

  if (!FORM_METHODS.has(request.method) || isForm) {
    let raw: string;
    try {
      raw = await request.clone().text();
    } catch (caught) {
      throw new Error(`unable to read body: ${messageOf(caught)}`, {
        cause: caught,
      });
    }

    try {
      values = parseFormValues(raw);
    } catch (caught) {
      throw new Error(
        `unable to parse form values from body: ${messageOf(caught)}`,
        { cause: caught },
      );
    }
  }

  parsed.set(request, values);
  return values;
}
