import type { ParameterKind, ParameterNotFoundError } from './errors';
import { findParameter } from './naming';
import { findMissingParameter, getHeader, stringifyParameterValue } from './request';
import type { NormalizeOptions } from './template';
import type { RequestDescriptor } from './types';

export type RequestTest = (request: RequestDescriptor) => boolean;

/**
 * Predicate over a request, kept as a tree so it can be displayed, walked, or
 * compiled into whatever matcher form a mocking backend wants.
 */
export type RequestPredicate =
  | { readonly kind: 'always' }
  | {
      readonly kind: 'test';
      readonly description: string;
      readonly test: RequestTest;
      /**
       * Parameter the test reads, when it reads one.
       */
      readonly parameter?: ParameterReference;
    }
  | { readonly kind: 'and'; readonly left: RequestPredicate; readonly right: RequestPredicate };

export interface ParameterReference {
  readonly kind: ParameterKind;
  readonly name: string;
}

export type PredicateInput = RequestPredicate | RequestTest;

const alwaysNode: RequestPredicate = { kind: 'always' };

export function always(): RequestPredicate {
  return alwaysNode;
}

export function predicate(test: RequestTest, description?: string): RequestPredicate {
  const node: RequestPredicate = {
    kind: 'test',
    description: description ?? (test.name || 'predicate'),
    test,
  };
  return Object.freeze(node);
}

/**
 * Conjunction node. `left` is evaluated first and `right` only when `left`
 * holds.
 */
export function and(left: PredicateInput, right: PredicateInput): RequestPredicate {
  const node: RequestPredicate = {
    kind: 'and',
    left: toPredicate(left),
    right: toPredicate(right),
  };
  return Object.freeze(node);
}

/**
 * Folds the given predicates into a left-leaning conjunction, skipping
 * `undefined` entries.
 */
export function allOf(...inputs: Array<PredicateInput | undefined>): RequestPredicate {
  const present = inputs.filter((input): input is PredicateInput => input !== undefined);
  if (present.length === 0) {
    return always();
  }
  return present.slice(1).reduce<RequestPredicate>(
    (acc, input) => and(acc, input),
    toPredicate(present[0] ?? alwaysNode),
  );
}

export function toPredicate(input: PredicateInput): RequestPredicate {
  return typeof input === 'function' ? predicate(input) : input;
}

export function isRequestPredicate(value: unknown): value is RequestPredicate {
  if (!value || typeof value !== 'object' || !('kind' in value)) {
    return false;
  }
  return value.kind === 'always' || value.kind === 'test' || value.kind === 'and';
}

export function evaluatePredicate(node: RequestPredicate, request: RequestDescriptor): boolean {
  switch (node.kind) {
    case 'always':
      return true;
    case 'test':
      return node.test(request);
    case 'and':
      return evaluatePredicate(node.left, request) && evaluatePredicate(node.right, request);
  }
}

export function compilePredicate(input: PredicateInput): RequestTest {
  const node = toPredicate(input);
  return (request) => evaluatePredicate(node, request);
}

export function describePredicate(input: PredicateInput): string {
  const node = toPredicate(input);
  switch (node.kind) {
    case 'always':
      return 'true';
    case 'test':
      return node.description;
    case 'and':
      return `(${describePredicate(node.left)} && ${describePredicate(node.right)})`;
  }
}

/**
 * Lookup failures for every parameter the tree reads that `request` does not
 * carry, in tree order.
 */
export function missingParameters(
  input: PredicateInput,
  request: RequestDescriptor,
  options?: NormalizeOptions,
): ParameterNotFoundError[] {
  const node = toPredicate(input);
  switch (node.kind) {
    case 'always':
      return [];
    case 'test': {
      const missing = node.parameter
        ? findMissingParameter(request, node.parameter.kind, node.parameter.name, options)
        : undefined;
      return missing ? [missing] : [];
    }
    case 'and':
      return [
        ...missingParameters(node.left, request, options),
        ...missingParameters(node.right, request, options),
      ];
  }
}

/**
 * Path parameter `name`, under any of its naming variations, equals `expected`
 * once both are stringified. False when the request has no such parameter;
 * {@link missingParameters} reports why.
 */
export function pathParameterEquals(name: string, expected: unknown): RequestPredicate {
  return parameterEquals('path', name, expected);
}

export function queryParameterEquals(name: string, expected: unknown): RequestPredicate {
  return parameterEquals('query', name, expected);
}

function parameterEquals(kind: ParameterKind, name: string, expected: unknown): RequestPredicate {
  const want = stringifyParameterValue(expected);
  const node: RequestPredicate = {
    kind: 'test',
    description: `${kind}.${name} == "${want}"`,
    test: (request) => {
      const parameters = kind === 'path' ? request.pathParameters : request.queryParameters;
      const found = findParameter(parameters, name, kind);
      return found !== undefined && stringifyParameterValue(found.value) === want;
    },
    parameter: { kind, name },
  };
  return Object.freeze(node);
}

export function hasHeader(name: string): RequestPredicate {
  return predicate((request) => getHeader(request, name) !== undefined, `header.${name} present`);
}
