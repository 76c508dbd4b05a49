import { MockRequestAdapter, type RequestAdapter } from '../adapter/adapter';
import {
  getMockAdapter,
  type MockableRequestBuilder,
  type RequestAdapterSource,
} from '../builder/builder';
import {
  MockSetupError,
  allOf,
  normalizeUrlTemplate,
  pathParameterEquals,
  queryParameterEquals,
  type Expectation,
  type ExpectationOutcome,
  type ExpectedMethod,
  type MockConfig,
  type PredicateInput,
  type RequestPredicate,
  type ResponseKind,
} from '../core/index';

export type ClientConstructor<C> = new (requestAdapter: RequestAdapter) => C;

export interface ClientMockOptions {
  /**
   * HTTP method the expectation answers. Defaults to `ANY`.
   */
  method?: ExpectedMethod;
  /**
   * Extra condition on the request, evaluated after the parameter checks.
   */
  where?: PredicateInput;
  /**
   * Expected path parameter values, keyed by logical name. Each name is
   * looked up under all of its naming variations.
   */
  pathParameters?: Record<string, unknown>;
  queryParameters?: Record<string, unknown>;
  /**
   * `suffix` and `token` are deprecated and behave as `structural`.
   */
  strategy?: 'structural' | 'suffix' | 'token';
}

/**
 * Creates a generated client wired to a fresh {@link MockRequestAdapter}.
 *
 * @example
 * const client = createMockableClient(FundsClient);
 * mockClientResponse(client, '/api/funds/{id}', { id: 'abc' }, { method: 'GET' });
 */
export function createMockableClient<C>(ClientClass: ClientConstructor<C>, config?: MockConfig): C {
  const adapter = new MockRequestAdapter(config);
  try {
    return new ClientClass(adapter);
  } catch (err) {
    throw new MockSetupError(
      'CLIENT_CONSTRUCTION_FAILED',
      `could not construct ${ClientClass.name || 'client'} with a mock request adapter`,
      { cause: err },
    );
  }
}

/**
 * Normalized template of a request builder, ready to pass to the
 * `mockClient*` functions. The base URL marker comes from the builder's
 * adapter when it is a {@link MockRequestAdapter}.
 */
export function getUrlTemplate(
  builder: Pick<MockableRequestBuilder, 'urlTemplate' | 'requestAdapter'>,
): string {
  const adapter = builder.requestAdapter();
  const baseUrlMarker =
    adapter instanceof MockRequestAdapter ? adapter.config.template.baseUrlMarker : undefined;
  return normalizeUrlTemplate(builder.urlTemplate(), { baseUrlMarker });
}

export function mockClientResponse<T>(
  client: RequestAdapterSource,
  template: string,
  response: T,
  options?: ClientMockOptions,
): Expectation<T> {
  return register(client, template, 'object', { type: 'value', value: response }, options);
}

export function mockClientResponseError(
  client: RequestAdapterSource,
  template: string,
  error: Error,
  options?: ClientMockOptions,
): Expectation {
  return register(client, template, 'object', { type: 'error', error }, options);
}

export function mockClientCollectionResponse<T>(
  client: RequestAdapterSource,
  template: string,
  response: readonly T[],
  options?: ClientMockOptions,
): Expectation<readonly T[]> {
  return register(client, template, 'collection', { type: 'value', value: response }, options);
}

export function mockClientCollectionResponseError(
  client: RequestAdapterSource,
  template: string,
  error: Error,
  options?: ClientMockOptions,
): Expectation {
  return register(client, template, 'collection', { type: 'error', error }, options);
}

export function mockClientPrimitiveResponse<T>(
  client: RequestAdapterSource,
  template: string,
  response: T,
  options?: ClientMockOptions,
): Expectation<T> {
  return register(client, template, 'primitive', { type: 'value', value: response }, options);
}

export function mockClientPrimitiveResponseError(
  client: RequestAdapterSource,
  template: string,
  error: Error,
  options?: ClientMockOptions,
): Expectation {
  return register(client, template, 'primitive', { type: 'error', error }, options);
}

export function mockClientNoContentResponse(
  client: RequestAdapterSource,
  template: string,
  options?: ClientMockOptions,
): Expectation<undefined> {
  return register(client, template, 'no-content', { type: 'value', value: undefined }, options);
}

export function mockClientNoContentResponseError(
  client: RequestAdapterSource,
  template: string,
  error: Error,
  options?: ClientMockOptions,
): Expectation {
  return register(client, template, 'no-content', { type: 'error', error }, options);
}

function register<T>(
  client: RequestAdapterSource,
  template: string,
  kind: ResponseKind,
  outcome: ExpectationOutcome<T>,
  options: ClientMockOptions | undefined,
): Expectation<T> {
  const predicate = buildPredicate(options);
  return getMockAdapter(client).expect({
    method: options?.method ?? 'ANY',
    kind,
    template,
    outcome,
    strategy: options?.strategy ?? 'structural',
    ...(predicate ? { predicate } : {}),
  });
}

function buildPredicate(options: ClientMockOptions | undefined): RequestPredicate | undefined {
  const parts: PredicateInput[] = [
    ...Object.entries(options?.pathParameters ?? {}).map(([name, value]) =>
      pathParameterEquals(name, value),
    ),
    ...Object.entries(options?.queryParameters ?? {}).map(([name, value]) =>
      queryParameterEquals(name, value),
    ),
  ];
  if (options?.where) {
    parts.push(options.where);
  }
  return parts.length > 0 ? allOf(...parts) : undefined;
}
