// Main entry point: re-exports everything consumers need.

export { createApi } from './api.js';
export { createRequest } from './request-builder.js';
export { createResponse } from './response-builder.js';
export { fetchDoer, wrapDoerDumpBase64, dumpRequest, dumpResponse } from './doer.js';
export { parsePostForm } from './form.js';

export {
  DEFAULT_BODY_SIZE_READ_LIMIT,
  toError,
  isClientError,
  isErrorOf,
  formatResponseError,
  resolveReadLimit,
} from './functions/http-client.functions.js';

export type { ReadLimit } from './functions/http-client.functions.js';

export type {
  Api,
  ApiConfig,
  BodySerializer,
  BodyTooLargeFailure,
  BuildFailure,
  ClientError,
  ClientErrorType,
  ClientFailure,
  Doer,
  ExchangeResult,
  ExecutionFailure,
  HeaderValues,
  InferOutput,
  JsonDecodeFailure,
  QueryValues,
  RawBody,
  RequestBuilder,
  RequestOverride,
  ResponseBuilder,
  ResponseHandler,
  ResponseStatusHandlers,
  SpanEvent,
  SpanHandler,
  StandardResult,
  StandardSchema,
  UnhandledStatusFailure,
} from './entity/http-client.interfaces.js';
