import type { RequestDescriptor } from './types';

export type ParameterKind = 'path' | 'query';

export interface ParameterNotFoundDetails {
  parameterName: string;
  kind: ParameterKind;
  attemptedVariations: readonly string[];
  template: string;
  normalizedTemplate: string;
  availableKeys: readonly string[];
}

/**
 * Raised when a logical parameter name matches none of the keys the generator
 * actually used. The message lists every spelling tried and the keys that were
 * present.
 */
export class ParameterNotFoundError extends Error {
  readonly parameterName: string;
  readonly kind: ParameterKind;
  readonly attemptedVariations: readonly string[];
  readonly template: string;
  readonly normalizedTemplate: string;
  readonly availableKeys: readonly string[];

  constructor(details: ParameterNotFoundDetails) {
    super(formatParameterNotFound(details));
    this.name = 'ParameterNotFoundError';
    this.parameterName = details.parameterName;
    this.kind = details.kind;
    this.attemptedVariations = details.attemptedVariations;
    this.template = details.template;
    this.normalizedTemplate = details.normalizedTemplate;
    this.availableKeys = details.availableKeys;
  }
}

function formatParameterNotFound(details: ParameterNotFoundDetails): string {
  const template = details.template || '(none)';
  const available =
    details.availableKeys.length > 0 ? details.availableKeys.map(describeKey).join(', ') : '(none)';
  return [
    `${details.kind === 'path' ? 'Path' : 'Query'} parameter "${details.parameterName}" was not found.`,
    `Tried: ${details.attemptedVariations.join(', ')}.`,
    `Template: ${template} (normalized: ${details.normalizedTemplate || '(none)'}).`,
    `Available keys: ${available}.`,
  ].join(' ');
}

function describeKey(key: string): string {
  const decoded = safeDecode(key);
  return decoded === key ? key : `${key} (${decoded})`;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Raised by the mock adapter when `onUnmatched` is `throw` and no expectation
 * answers a request. `missingParameters` holds the lookups that failed while
 * expectations on the same template were checked.
 */
export class UnconfiguredRequestError extends Error {
  readonly request: RequestDescriptor;
  readonly normalizedTemplate: string;
  readonly registeredExpectations: number;
  readonly missingParameters: readonly ParameterNotFoundError[];

  constructor(
    request: RequestDescriptor,
    normalizedTemplate: string,
    registeredExpectations: number,
    missingParameters: readonly ParameterNotFoundError[] = [],
  ) {
    const summary =
      `No mock configured for ${request.method} ${request.urlTemplate || '(no template)'} ` +
      `(normalized: ${normalizedTemplate || '(none)'}; ${registeredExpectations} expectation(s) registered)`;
    super(
      missingParameters.length > 0
        ? `${summary} ${missingParameters.map((err) => err.message).join(' ')}`
        : summary,
    );
    this.name = 'UnconfiguredRequestError';
    this.request = request;
    this.normalizedTemplate = normalizedTemplate;
    this.registeredExpectations = registeredExpectations;
    this.missingParameters = missingParameters;
  }
}

export class MockSetupError extends Error {
  code:
    | 'ADAPTER_NOT_MOCKABLE'
    | 'BUILDER_TEMPLATE_MISSING'
    | 'CLIENT_CONSTRUCTION_FAILED'
    | 'INVALID_RESPONSE';

  constructor(code: MockSetupError['code'], message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MockSetupError';
    this.code = code;
  }
}
