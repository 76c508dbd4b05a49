import { ParameterNotFoundError } from './errors';
import { evaluatePredicate, missingParameters, type RequestPredicate } from './predicate';
import type { Expectation } from './registry';
import { normalizeRequestTemplate, stringifyParameterValue } from './request';
import { templatesEqual } from './template';
import type {
  BuilderSnapshot,
  MatchResult,
  MatchStrategy,
  MismatchReason,
  RequestDescriptor,
  ResponseKind,
} from './types';

export interface MatchOptions {
  baseUrlMarker?: string;
  ignoreCase?: boolean;
  /**
   * Send operation the request arrived through. When set, expectations of
   * another kind are rejected right after the method check.
   */
  kind?: ResponseKind;
  /**
   * Precomputed `normalizeRequestTemplate(request)`.
   */
  normalizedRequestTemplate?: string;
}

const matched: MatchResult = { matched: true };

/**
 * Decides whether `expectation` answers `request`. Checks run in order and
 * stop at the first failure: method, kind, template (structural or builder
 * identity), then the extra predicate.
 *
 * A parameter the predicate needs but the request lacks fails the predicate
 * stage, and the lookup error is kept in `missingParameters`. Any other error
 * thrown by the predicate is not caught.
 */
export function matchExpectation(
  expectation: Expectation,
  request: RequestDescriptor,
  options?: MatchOptions,
): MatchResult {
  if (expectation.method !== 'ANY' && expectation.method !== request.method) {
    return mismatch('method', `expected ${expectation.method}, got ${request.method}`);
  }

  if (options?.kind && options.kind !== expectation.kind) {
    return mismatch('kind', `expected ${expectation.kind} response, got ${options.kind}`);
  }

  const ignoreCase = options?.ignoreCase ?? true;
  if (expectation.strategy === 'builder' && expectation.builder) {
    const builderResult = matchBuilder(expectation.builder, request, ignoreCase);
    if (!builderResult.matched) {
      return builderResult;
    }
  } else {
    const normalized =
      options?.normalizedRequestTemplate ??
      normalizeRequestTemplate(request, { baseUrlMarker: options?.baseUrlMarker });
    const equal =
      normalized !== '' &&
      templatesEqual(normalized, expectation.normalizedTemplate, { ignoreCase });
    if (!equal) {
      return mismatch(
        'template',
        `expected ${expectation.normalizedTemplate}, got ${normalized || '(no template)'}`,
      );
    }
  }

  if (expectation.predicate) {
    return matchPredicate(expectation.predicate, request, options?.baseUrlMarker);
  }

  return matched;
}

export function matches(
  expectation: Expectation,
  request: RequestDescriptor,
  options?: MatchOptions,
): boolean {
  return matchExpectation(expectation, request, options).matched;
}

/**
 * Identity check against the builder an expectation was registered on: the
 * raw templates must be equal and every builder path parameter except
 * `baseurl` must be present in the request under the same key with the same
 * string value. Both sides come from the same generator, so keys are compared
 * directly.
 */
export function matchBuilder(
  builder: BuilderSnapshot,
  request: RequestDescriptor,
  ignoreCase = true,
): MatchResult {
  if (!request.urlTemplate) {
    return mismatch('template', `expected ${builder.urlTemplate}, got (no template)`);
  }
  if (!templatesEqual(request.urlTemplate, builder.urlTemplate, { ignoreCase })) {
    return mismatch('template', `expected ${builder.urlTemplate}, got ${request.urlTemplate}`);
  }

  for (const [key, expected] of Object.entries(builder.pathParameters)) {
    if (key === 'baseurl') {
      continue;
    }
    if (!Object.prototype.hasOwnProperty.call(request.pathParameters, key)) {
      return mismatch('path-parameter', `request has no path parameter "${key}"`);
    }
    const want = stringifyParameterValue(expected);
    const got = stringifyParameterValue(request.pathParameters[key]);
    if (want !== got) {
      return mismatch('path-parameter', `${key}: expected "${want}", got "${got}"`);
    }
  }

  return matched;
}

/**
 * Maps older strategy names onto the supported ones. `suffix` matching could
 * match an unrelated nested path and `token` was an earlier spelling of the
 * positional form; both now resolve to `structural`.
 */
export function resolveStrategy(strategy: MatchStrategy): 'structural' | 'builder' {
  return strategy === 'builder' ? 'builder' : 'structural';
}

export function isDeprecatedStrategy(strategy: MatchStrategy): boolean {
  return strategy === 'suffix' || strategy === 'token';
}

function matchPredicate(
  node: RequestPredicate,
  request: RequestDescriptor,
  baseUrlMarker: string | undefined,
): MatchResult {
  let holds: boolean;
  try {
    holds = evaluatePredicate(node, request);
  } catch (err) {
    if (err instanceof ParameterNotFoundError) {
      return mismatch('predicate', `extra predicate failed: ${err.message}`, [err]);
    }
    throw err;
  }
  if (holds) {
    return matched;
  }
  const missing = missingParameters(node, request, { baseUrlMarker });
  return mismatch('predicate', 'extra predicate returned false', missing);
}

function mismatch(
  reason: MismatchReason,
  detail: string,
  missing: readonly ParameterNotFoundError[] = [],
): MatchResult {
  return missing.length > 0
    ? { matched: false, reason, detail, missingParameters: missing }
    : { matched: false, reason, detail };
}
