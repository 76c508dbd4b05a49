import { MockRequestAdapter, type RequestAdapter } from '../adapter/adapter';
import {
  MockSetupError,
  type BuilderSnapshot,
  type ExpectationOutcome,
  type HttpMethod,
  type PredicateInput,
  type ResponseKind,
} from '../core/index';

/**
 * What a generated request builder must expose to be mocked by identity.
 * Builders produced by the client generator already carry these values; a
 * thin wrapper is enough for clients that keep them private.
 */
export interface MockableRequestBuilder {
  urlTemplate(): string;
  pathParameters(): Record<string, unknown>;
  requestAdapter(): RequestAdapter;
}

/**
 * Anything that hands out its request adapter: a generated client or one of
 * its builders.
 */
export interface RequestAdapterSource {
  requestAdapter(): RequestAdapter;
}

export function getBuilderInfo(builder: MockableRequestBuilder): BuilderSnapshot {
  const urlTemplate = builder.urlTemplate();
  if (!urlTemplate) {
    throw new MockSetupError(
      'BUILDER_TEMPLATE_MISSING',
      'request builder returned an empty URL template',
    );
  }
  return Object.freeze({
    urlTemplate,
    pathParameters: Object.freeze({ ...builder.pathParameters() }),
  });
}

export function getMockAdapter(target: RequestAdapterSource): MockRequestAdapter {
  const adapter = target.requestAdapter();
  if (!(adapter instanceof MockRequestAdapter)) {
    throw new MockSetupError(
      'ADAPTER_NOT_MOCKABLE',
      'client was not created with a MockRequestAdapter; use createMockableClient',
    );
  }
  return adapter;
}

export function mockGet<B extends MockableRequestBuilder, T>(
  builder: B,
  response: T | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'GET', 'object', outcomeOf(response), where);
}

export function mockGetCollection<B extends MockableRequestBuilder, T>(
  builder: B,
  response: readonly T[] | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'GET', 'collection', outcomeOf(response), where);
}

/**
 * Mocks a GET whose response body is a primitive such as a string or number.
 */
export function mockGetPrimitive<B extends MockableRequestBuilder, T>(
  builder: B,
  response: T | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'GET', 'primitive', outcomeOf(response), where);
}

export function mockPost<B extends MockableRequestBuilder, T>(
  builder: B,
  response: T | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'POST', 'object', outcomeOf(response), where);
}

export function mockPostCollection<B extends MockableRequestBuilder, T>(
  builder: B,
  response: readonly T[] | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'POST', 'collection', outcomeOf(response), where);
}

export function mockPut<B extends MockableRequestBuilder, T>(
  builder: B,
  response: T | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'PUT', 'object', outcomeOf(response), where);
}

export function mockPatch<B extends MockableRequestBuilder, T>(
  builder: B,
  response: T | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'PATCH', 'object', outcomeOf(response), where);
}

/**
 * Mocks a DELETE with no response body. Without `error` the call resolves;
 * with it the call rejects.
 */
export function mockDelete<B extends MockableRequestBuilder>(
  builder: B,
  error?: Error,
  where?: PredicateInput,
): B {
  const outcome: ExpectationOutcome<undefined> = error
    ? { type: 'error', error }
    : { type: 'value', value: undefined };
  return register(builder, 'DELETE', 'no-content', outcome, where);
}

export function mockDeleteWithResponse<B extends MockableRequestBuilder, T>(
  builder: B,
  response: T | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'DELETE', 'object', outcomeOf(response), where);
}

export function mockDeleteCollection<B extends MockableRequestBuilder, T>(
  builder: B,
  response: readonly T[] | Error,
  where?: PredicateInput,
): B {
  return register(builder, 'DELETE', 'collection', outcomeOf(response), where);
}

/**
 * @deprecated Pass the error to {@link mockGet}.
 */
export function mockGetError<B extends MockableRequestBuilder>(
  builder: B,
  error: Error,
  where?: PredicateInput,
): B {
  return mockGet(builder, error, where);
}

/**
 * @deprecated Pass the error to {@link mockGetCollection}.
 */
export function mockGetCollectionError<B extends MockableRequestBuilder>(
  builder: B,
  error: Error,
  where?: PredicateInput,
): B {
  return mockGetCollection(builder, error, where);
}

/**
 * @deprecated Pass the error to {@link mockDelete}.
 */
export function mockDeleteError<B extends MockableRequestBuilder>(
  builder: B,
  error: Error,
  where?: PredicateInput,
): B {
  return mockDelete(builder, error, where);
}

function register<B extends MockableRequestBuilder, T>(
  builder: B,
  method: HttpMethod,
  kind: ResponseKind,
  outcome: ExpectationOutcome<T>,
  where: PredicateInput | undefined,
): B {
  const info = getBuilderInfo(builder);
  getMockAdapter(builder).expect({
    method,
    kind,
    template: info.urlTemplate,
    builder: info,
    outcome,
    ...(where ? { predicate: where } : {}),
  });
  return builder;
}

function outcomeOf<T>(response: T | Error): ExpectationOutcome<T> {
  if (response instanceof Error) {
    return { type: 'error', error: response };
  }
  return { type: 'value', value: response };
}
