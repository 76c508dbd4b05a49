import type { ParameterNotFoundError } from './errors';

/**
 * Logging levels used by the internal mock logger.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger contract used for internal diagnostics.
 */
export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
}

export const httpMethods = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'HEAD',
  'OPTIONS',
  'TRACE',
  'CONNECT',
] as const;

export type HttpMethod = (typeof httpMethods)[number];

/**
 * Method an expectation answers. `ANY` is used by template-string mocks
 * registered without a method.
 */
export type ExpectedMethod = HttpMethod | 'ANY';

/**
 * Send operation a generated client picks for an endpoint.
 */
export type ResponseKind = 'object' | 'collection' | 'primitive' | 'no-content';

/**
 * How an expectation compares its template against a request.
 *
 * `suffix` and `token` are accepted for older callers and behave as
 * `structural`.
 */
export type MatchStrategy = 'structural' | 'builder' | 'suffix' | 'token';

export type ParameterMap = Readonly<Record<string, unknown>>;

export type HeaderMap = Readonly<Record<string, string | string[]>>;

/**
 * Immutable snapshot of a simulated request.
 */
export interface RequestDescriptor {
  /**
   * HTTP method, uppercased.
   */
  readonly method: HttpMethod;
  /**
   * Raw URL template as produced by the generator, for example
   * `{+baseurl}/api/funds/{fund%2Did}{?select}`. Empty when the request
   * carries none.
   */
  readonly urlTemplate: string;
  /**
   * Path parameters keyed by generator-chosen names.
   */
  readonly pathParameters: ParameterMap;
  /**
   * Query parameters keyed by generator-chosen names.
   */
  readonly queryParameters: ParameterMap;
  readonly headers: HeaderMap;
  /**
   * Opaque request body marker, when the request has one.
   */
  readonly body?: unknown;
}

/**
 * Input accepted by `createRequestDescriptor`.
 */
export interface RequestDescriptorInit {
  method: string;
  urlTemplate?: string | null;
  pathParameters?: Record<string, unknown>;
  queryParameters?: Record<string, unknown>;
  headers?: Record<string, string | string[]>;
  body?: unknown;
}

export type ExpectationOutcome<T = unknown> =
  | { type: 'value'; value: T }
  | { type: 'error'; error: Error };

/**
 * Template and path parameters captured from a request builder when an
 * expectation was registered against it.
 */
export interface BuilderSnapshot {
  urlTemplate: string;
  pathParameters: ParameterMap;
}

export type MismatchReason = 'method' | 'kind' | 'template' | 'path-parameter' | 'predicate';

export type MatchResult =
  | { matched: true }
  | {
      matched: false;
      reason: MismatchReason;
      /**
       * Human-readable description of what was compared.
       */
      detail: string;
      /**
       * Parameters the extra predicate looked for and the request lacks.
       */
      missingParameters?: readonly ParameterNotFoundError[];
    };
