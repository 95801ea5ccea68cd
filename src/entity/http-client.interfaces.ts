/**
 * Standard Schema v1 interface.
 * Compatible with Zod, Valibot, ArkType, and any library
 * implementing the Standard Schema specification.
 *
 * @see https://github.com/standard-schema/standard-schema
 */
export type StandardSchema<T = unknown> = {
  readonly '~standard': {
    readonly version: 1;
    readonly validate: (
      value: unknown,
    ) => StandardResult<T> | Promise<StandardResult<T>>;
  };
};

export type StandardResult<T> =
  | { readonly value: T; readonly issues?: undefined }
  | { readonly issues: ReadonlyArray<{ readonly message: string }> };

/** Extracts the output type from a Standard Schema. */
export type InferOutput<S extends StandardSchema> =
  S extends StandardSchema<infer T> ? T : never;

/**
 * Performs one HTTP request. The global `fetch` satisfies this contract,
 * as does any test double from the `testing` entry point.
 */
export type Doer = (request: Request) => Promise<Response>;

/** Outcome captured by `execute()` and surfaced by `resolve()`. */
export type ExchangeResult =
  | { ok: true; request: Request; response: Response }
  | { ok: false; error: Error; method: string; url: string };

/**
 * Handles a response for a given status code. Returning (or throwing)
 * an error makes it the result of `resolve()`.
 */
export type ResponseHandler = (
  response: Response,
  request: Request,
) => Error | undefined | void | Promise<Error | undefined | void>;

/** Status code to handler table. */
export type ResponseStatusHandlers = Record<number, ResponseHandler>;

/** Replaces a finalized request, e.g. to sign it. */
export type RequestOverride = (request: Request) => Request | Promise<Request>;

/** Turns a pending body value into bytes or text. */
export type BodySerializer = (value: unknown) => string | Uint8Array;

/** Raw request bodies accepted by `send()`. */
export type RawBody =
  | string
  | Uint8Array
  | ArrayBuffer
  | Blob
  | URLSearchParams
  | ReadableStream<Uint8Array>;

/** Header input: one value or several values per key. */
export type HeaderValues = Headers | Record<string, string | string[]>;

/** Query parameter input: one value or several values per key. */
export type QueryValues = URLSearchParams | Record<string, string | string[]>;

/** Every way a request/response cycle can fail inside the client. */
export type ClientErrorType =
  | 'invalid-endpoint'
  | 'body-conflict'
  | 'serializer-missing'
  | 'serialization-failed'
  | 'request-construction'
  | 'override-failed'
  | 'build-failed'
  | 'execution-failed'
  | 'body-too-large'
  | 'unhandled-status'
  | 'json-decode';

/** Failure while turning builder state into a `Request`. */
export type BuildFailure = {
  type:
    | 'invalid-endpoint'
    | 'body-conflict'
    | 'serializer-missing'
    | 'serialization-failed'
    | 'request-construction'
    | 'override-failed'
    | 'build-failed';
  message: string;
};

/** The doer rejected. */
export type ExecutionFailure = {
  type: 'execution-failed';
  message: string;
  method: string;
  url: string;
};

/** Declared content length exceeds the configured read limit. */
export type BodyTooLargeFailure = {
  type: 'body-too-large';
  message: string;
  method: string;
  url: string;
  status: number;
  contentLength: number;
  readLimit: number;
};

/** No handler was registered for the response status. */
export type UnhandledStatusFailure = {
  type: 'unhandled-status';
  message: string;
  method: string;
  url: string;
  status: number;
  /** Base64 of the response body, when it was not empty. */
  body?: string;
};

/** A `receiveJSON` handler could not decode or validate the body. */
export type JsonDecodeFailure = {
  type: 'json-decode';
  message: string;
  method: string;
  url: string;
  status: number;
  issues: string[];
};

/** Discriminated union of all client failures. */
export type ClientFailure =
  | BuildFailure
  | ExecutionFailure
  | BodyTooLargeFailure
  | UnhandledStatusFailure
  | JsonDecodeFailure;

/** Throwable form of a `ClientFailure`. */
export type ClientError<F extends ClientFailure = ClientFailure> = Error & {
  clientError: F;
};

/** Observability event emitted once per resolved response. */
export type SpanEvent = {
  method: string;
  url: string;
  status?: number;
  durationMs: number;
  ok: boolean;
  error?: Error;
};

/** Observability callback. */
export type SpanHandler = (event: SpanEvent) => void;

/** Fluent builder accumulating everything needed to create one request. */
export type RequestBuilder = {
  /** Use the provided doer instead of the global `fetch`. */
  client(doer: Doer): RequestBuilder;
  /** Replace the values of a header. */
  setHeader(key: string, value: string, ...values: string[]): RequestBuilder;
  /** Replace the values of each provided header, keeping the others. */
  setHeaders(headers: HeaderValues): RequestBuilder;
  /** Append values to a header. */
  addHeader(key: string, value: string, ...values: string[]): RequestBuilder;
  /** Append values to each provided header. */
  addHeaders(headers: HeaderValues): RequestBuilder;
  /** Replace the values of a query parameter. */
  setQueryParam(key: string, value: string, ...values: string[]): RequestBuilder;
  /** Replace the values of each provided query parameter, keeping the others. */
  setQueryParams(params: QueryValues): RequestBuilder;
  /** Append values to a query parameter. */
  addQueryParam(key: string, value: string, ...values: string[]): RequestBuilder;
  /** Append values to each provided query parameter. */
  addQueryParams(params: QueryValues): RequestBuilder;
  /**
   * Replace every occurrence of `pattern` in the URL path.
   * Keeps endpoints readable: `createRequest('GET', 'https://x/users/{id}').pathReplacer('{id}', id)`.
   */
  pathReplacer(pattern: string, replaceWith: string): RequestBuilder;
  /** Send url-encoded form values. */
  sendForm(values: QueryValues): RequestBuilder;
  /** Send a value serialized as JSON when the request is built. */
  sendJSON(value: unknown): RequestBuilder;
  /** Send a raw body as `application/octet-stream`. */
  send(body: RawBody): RequestBuilder;
  /**
   * Send a value serialized by `serializer` when the request is built.
   * Building fails when no serializer is given.
   */
  serializeWith(value: unknown, serializer?: BodySerializer): RequestBuilder;
  /** Hook invoked last with the finalized request; its result is sent instead. */
  override(hook: RequestOverride): RequestBuilder;
  /** Build the request. Rejects with a `ClientError`. */
  request(signal?: AbortSignal): Promise<Request>;
  /** Build and send the request; failures are surfaced by `resolve()`. */
  execute(signal?: AbortSignal): ResponseBuilder;
};

/** Fluent builder describing how to handle one response. */
export type ResponseBuilder = {
  /**
   * Maximum number of body bytes handlers may read.
   *
   * - Positive: a larger declared content length fails before reading.
   * - Zero: the declared content length is the limit.
   * - Negative: no limit.
   *
   * Without a declared content length, reading stops at the limit.
   */
  bodySizeReadLimit(limit: number): ResponseBuilder;
  /** Register the handler for a status code (last registration wins). */
  onStatus(status: number, handler: ResponseHandler): ResponseBuilder;
  /** Register one handler for several status codes. */
  onStatuses(statuses: number[], handler: ResponseHandler): ResponseBuilder;
  /** Resolve without error for these status codes. */
  successOnStatus(...statuses: number[]): ResponseBuilder;
  /** Resolve with `error` for this status code. */
  errorOnStatus(status: number, error: Error): ResponseBuilder;
  /** Decode the body as JSON for this status code and pass it to `assign`. */
  receiveJSON(status: number, assign: (value: unknown) => void): ResponseBuilder;
  /** Decode and validate the body for this status code. */
  receiveJSON<S extends StandardSchema>(
    status: number,
    schema: S,
    assign: (value: InferOutput<S>) => void,
  ): ResponseBuilder;
  /** Observe the outcome of `resolve()`. */
  onSpan(handler: SpanHandler): ResponseBuilder;
  /** Apply the read limit and dispatch on status. Memoized. */
  resolve(): Promise<Error | undefined>;
  /** Like `resolve()` but throws the error. */
  resolveOrThrow(): Promise<void>;
};

/** Configuration for an API façade. */
export type ApiConfig = {
  /** Base address: scheme, host, optional userinfo and path prefix. */
  baseUrl: string | URL;
  /** Executes requests. Defaults to the global `fetch`. */
  doer?: Doer;
  /** Headers set on every request. */
  headers?: Record<string, string | string[]>;
  /** Handlers applied to every response, before per-call registrations. */
  handlers?: ResponseStatusHandlers;
  /** Default response read limit. Defaults to 64 KiB. */
  bodySizeReadLimit?: number;
  /** Override hook set on every request. */
  override?: RequestOverride;
  /** Observability callback invoked for every resolved response. */
  onSpan?: SpanHandler;
};

/** Return type of `createApi`. */
export type Api = {
  withRequestHeaders(headers: Record<string, string | string[]>): Api;
  withResponseHandler(status: number, handler: ResponseHandler): Api;
  withResponseBodySizeReadLimit(limit: number): Api;
  withRequestOverride(hook: RequestOverride): Api;
  /** Deep copy of the façade. */
  clone(): Api;
  /** New façade with merged configuration. */
  configure(next: Partial<ApiConfig>): Api;
  /** Absolute URL of an endpoint. */
  url(endpoint: string): URL;
  head(endpoint: string): RequestBuilder;
  get(endpoint: string): RequestBuilder;
  post(endpoint: string): RequestBuilder;
  put(endpoint: string): RequestBuilder;
  patch(endpoint: string): RequestBuilder;
  delete(endpoint: string): RequestBuilder;
  /** Execute with the default read limit and handlers applied. */
  do(request: RequestBuilder, signal?: AbortSignal): ResponseBuilder;
  /** `do(request).resolve()`. */
  execute(request: RequestBuilder, signal?: AbortSignal): Promise<Error | undefined>;
};
