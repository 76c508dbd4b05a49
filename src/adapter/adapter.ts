import {
  ExpectationRegistry,
  MockSetupError,
  UnconfiguredRequestError,
  isDeprecatedStrategy,
  logWithLevel,
  matchExpectation,
  normalizeConfig,
  normalizeRequestTemplate,
  normalizeUrlTemplate,
  resolveStrategy,
  templatesEqual,
  toPredicate,
  type BuilderSnapshot,
  type Expectation,
  type ExpectationOutcome,
  type ExpectedMethod,
  type HttpMethod,
  type MatchOptions,
  type MatchResult,
  type MatchStrategy,
  type MockConfig,
  type ParameterNotFoundError,
  type PredicateInput,
  type RequestDescriptor,
  type ResolvedMockConfig,
  type ResponseKind,
} from '../core/index';

/**
 * Turns a canned payload into the model type a client expects. Generated
 * clients pass one per endpoint, the way they pass a parsable factory to a
 * real adapter.
 */
export type ResponseFactory<T> = (payload: unknown) => T;

/**
 * The single send surface a generated client talks to.
 */
export interface RequestAdapter {
  readonly baseUrl: string;
  send<T>(request: RequestDescriptor, factory: ResponseFactory<T>): Promise<T | undefined>;
  sendCollection<T>(
    request: RequestDescriptor,
    factory: ResponseFactory<T>,
  ): Promise<T[] | undefined>;
  sendPrimitive<T>(request: RequestDescriptor, factory: ResponseFactory<T>): Promise<T | undefined>;
  sendNoResponseContent(request: RequestDescriptor): Promise<void>;
}

export interface ExpectationInit<T = unknown> {
  method: ExpectedMethod;
  kind: ResponseKind;
  template: string;
  outcome: ExpectationOutcome<T>;
  strategy?: MatchStrategy;
  builder?: BuilderSnapshot;
  predicate?: PredicateInput;
}

export interface ExpectationReport {
  expectation: Expectation;
  result: MatchResult;
}

/**
 * In-memory request adapter. Requests are answered from registered
 * expectations; nothing leaves the process.
 */
export class MockRequestAdapter implements RequestAdapter {
  readonly config: ResolvedMockConfig;
  private readonly registry: ExpectationRegistry;
  private readonly history: RequestDescriptor[] = [];

  constructor(config?: MockConfig) {
    this.config = normalizeConfig(config);
    this.registry = new ExpectationRegistry({ ignoreCase: this.config.template.ignoreCase });
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  /**
   * Every request the adapter has received, in order.
   */
  get received(): readonly RequestDescriptor[] {
    return [...this.history];
  }

  expect<T>(init: ExpectationInit<T>): Expectation<T> {
    const requested = init.strategy ?? (init.builder ? 'builder' : 'structural');
    if (isDeprecatedStrategy(requested)) {
      this.log(
        'warn',
        `template-mock: match strategy "${requested}" is deprecated, using structural`,
        { template: init.template },
      );
    }
    const strategy = resolveStrategy(requested);
    const template = init.builder?.urlTemplate ?? init.template;

    const expectation = this.registry.register<T>({
      method: init.method,
      kind: init.kind,
      strategy,
      template,
      normalizedTemplate: normalizeUrlTemplate(template, {
        baseUrlMarker: this.config.template.baseUrlMarker,
      }),
      outcome: init.outcome,
      ...(init.builder ? { builder: init.builder } : {}),
      ...(init.predicate ? { predicate: toPredicate(init.predicate) } : {}),
    });

    this.log('debug', 'template-mock: expectation registered', {
      id: expectation.id,
      method: expectation.method,
      kind: expectation.kind,
      strategy: expectation.strategy,
      template: expectation.template,
      normalizedTemplate: expectation.normalizedTemplate,
    });
    return expectation;
  }

  expectations(): Expectation[] {
    return this.registry.all();
  }

  /**
   * First registered expectation of `kind` that matches `request`.
   */
  findMatch(kind: ResponseKind, request: RequestDescriptor): Expectation | undefined {
    const normalized = this.normalizeRequest(request);
    if (!normalized) {
      return undefined;
    }
    const options = this.matchOptions(kind, normalized);
    return this.registry
      .candidatesFor(request.method, normalized)
      .find((candidate) => matchExpectation(candidate, request, options).matched);
  }

  /**
   * Match result of every registered expectation against `request`, for
   * diagnosing why a request went unanswered.
   */
  explain(kind: ResponseKind, request: RequestDescriptor): ExpectationReport[] {
    const options = this.matchOptions(kind, this.normalizeRequest(request));
    return this.registry.all().map((expectation) => ({
      expectation,
      result: matchExpectation(expectation, request, options),
    }));
  }

  receivedFor(method: HttpMethod, template: string): RequestDescriptor[] {
    const wanted = normalizeUrlTemplate(template, {
      baseUrlMarker: this.config.template.baseUrlMarker,
    });
    return this.history.filter(
      (request) =>
        request.method === method &&
        templatesEqual(this.normalizeRequest(request), wanted, {
          ignoreCase: this.config.template.ignoreCase,
        }),
    );
  }

  reset(): void {
    this.registry.clear();
    this.history.length = 0;
  }

  async send<T>(request: RequestDescriptor, factory: ResponseFactory<T>): Promise<T | undefined> {
    const payload = this.dispatch('object', request);
    return payload === undefined || payload === null ? undefined : factory(payload);
  }

  async sendCollection<T>(
    request: RequestDescriptor,
    factory: ResponseFactory<T>,
  ): Promise<T[] | undefined> {
    const payload = this.dispatch('collection', request);
    if (payload === undefined || payload === null) {
      return undefined;
    }
    if (!Array.isArray(payload)) {
      throw new MockSetupError(
        'INVALID_RESPONSE',
        `collection mock for ${request.method} ${request.urlTemplate} returned a non-array payload`,
      );
    }
    return payload.map((item: unknown) => factory(item));
  }

  async sendPrimitive<T>(
    request: RequestDescriptor,
    factory: ResponseFactory<T>,
  ): Promise<T | undefined> {
    const payload = this.dispatch('primitive', request);
    return payload === undefined || payload === null ? undefined : factory(payload);
  }

  async sendNoResponseContent(request: RequestDescriptor): Promise<void> {
    this.dispatch('no-content', request);
  }

  private dispatch(kind: ResponseKind, request: RequestDescriptor): unknown {
    this.history.push(request);

    const expectation = this.findMatch(kind, request);
    if (!expectation) {
      return this.unmatched(kind, request);
    }

    this.log('debug', 'template-mock: request matched', {
      id: expectation.id,
      method: request.method,
      kind,
      urlTemplate: request.urlTemplate,
    });

    if (expectation.outcome.type === 'error') {
      throw expectation.outcome.error;
    }
    return expectation.outcome.value;
  }

  private unmatched(kind: ResponseKind, request: RequestDescriptor): undefined {
    const normalized = this.normalizeRequest(request);
    const missing = this.missingParameters(kind, request, normalized);
    const fields = {
      method: request.method,
      kind,
      urlTemplate: request.urlTemplate,
      normalizedTemplate: normalized,
      registered: this.registry.size,
      ...(missing.length > 0
        ? { missingParameters: missing.map((err) => `${err.kind}.${err.parameterName}`) }
        : {}),
    };

    if (this.config.onUnmatched === 'throw') {
      this.log('warn', 'template-mock: no expectation matched request', fields);
      throw new UnconfiguredRequestError(request, normalized, this.registry.size, missing);
    }

    this.log('debug', 'template-mock: no expectation matched request', fields);
    return undefined;
  }

  /**
   * Lookup failures collected from the candidates for the request's template.
   */
  private missingParameters(
    kind: ResponseKind,
    request: RequestDescriptor,
    normalized: string,
  ): ParameterNotFoundError[] {
    if (!normalized) {
      return [];
    }
    const options = this.matchOptions(kind, normalized);
    return this.registry.candidatesFor(request.method, normalized).flatMap((candidate) => {
      const result = matchExpectation(candidate, request, options);
      return result.matched ? [] : [...(result.missingParameters ?? [])];
    });
  }

  private normalizeRequest(request: RequestDescriptor): string {
    return normalizeRequestTemplate(request, {
      baseUrlMarker: this.config.template.baseUrlMarker,
    });
  }

  private matchOptions(kind: ResponseKind, normalized: string): MatchOptions {
    return {
      kind,
      ignoreCase: this.config.template.ignoreCase,
      baseUrlMarker: this.config.template.baseUrlMarker,
      normalizedRequestTemplate: normalized,
    };
  }

  private log(
    level: ResolvedMockConfig['logLevel'],
    message: string,
    fields?: Record<string, unknown>,
  ): void {
    logWithLevel(this.config.logger, level, this.config.logLevel, message, fields);
  }
}

/**
 * Response factory for endpoints returning a string.
 */
export function parseString(payload: unknown): string {
  if (typeof payload !== 'string') {
    throw new TypeError(`expected a string payload, got ${typeof payload}`);
  }
  return payload;
}

export function parseNumber(payload: unknown): number {
  if (typeof payload !== 'number') {
    throw new TypeError(`expected a number payload, got ${typeof payload}`);
  }
  return payload;
}

export function parseBoolean(payload: unknown): boolean {
  if (typeof payload !== 'boolean') {
    throw new TypeError(`expected a boolean payload, got ${typeof payload}`);
  }
  return payload;
}
