import { ParameterNotFoundError, type ParameterKind } from './errors';
import type { ParameterMap } from './types';

const textEncoder = new TextEncoder();

/**
 * Candidate spellings a generator may have used for a logical path parameter
 * name, in lookup order: original, kebab-case, percent-encoded kebab-case,
 * PascalCase.
 *
 * @example
 * variationsFor('fundId'); // ['fundId', 'fund-id', 'fund%2Did', 'FundId']
 */
export function variationsFor(name: string): string[] {
  const kebab = toKebabCase(name);
  return unique([name, kebab, percentEncode(kebab), toPascalCase(name)]);
}

/**
 * Path variations followed by the OData-style `$name` and `%24name` spellings
 * query templates commonly use (`$select`, `$filter`).
 */
export function queryVariationsFor(name: string): string[] {
  return unique([...variationsFor(name), `$${name}`, `%24${name}`]);
}

export function toKebabCase(name: string): string {
  let out = '';
  for (let i = 0; i < name.length; i++) {
    const ch = name.charAt(i);
    if (i > 0 && isUpperCase(ch)) {
      out += '-';
    }
    out += ch;
  }
  return out.toLowerCase();
}

export function toPascalCase(name: string): string {
  if (!name) {
    return name;
  }
  return name.charAt(0).toUpperCase() + name.slice(1);
}

/**
 * Percent-encodes every character that is not an ASCII letter or digit, using
 * uppercase hex over the UTF-8 bytes (`fund-id` -> `fund%2Did`).
 */
export function percentEncode(value: string): string {
  let out = '';
  for (const ch of value) {
    if (/^[A-Za-z0-9]$/.test(ch)) {
      out += ch;
      continue;
    }
    for (const byte of textEncoder.encode(ch)) {
      out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return out;
}

export interface ResolveContext {
  kind: ParameterKind;
  template: string;
  normalizedTemplate: string;
}

export interface ResolvedParameter {
  /**
   * Key found in the map.
   */
  key: string;
  value: unknown;
}

/**
 * Looks a logical name up in a parameter map, trying each naming variation in
 * order. Returns `undefined` when none is present.
 */
export function findParameter(
  parameters: ParameterMap,
  name: string,
  kind: ParameterKind = 'path',
): ResolvedParameter | undefined {
  for (const candidate of candidatesFor(name, kind)) {
    if (Object.prototype.hasOwnProperty.call(parameters, candidate)) {
      return { key: candidate, value: parameters[candidate] };
    }
  }
  return undefined;
}

/**
 * Same as {@link findParameter} but throws a {@link ParameterNotFoundError}
 * listing the attempted spellings and the available keys.
 */
export function resolveParameter(
  parameters: ParameterMap,
  name: string,
  context: ResolveContext,
): ResolvedParameter {
  const found = findParameter(parameters, name, context.kind);
  if (found) {
    return found;
  }
  throw parameterNotFound(parameters, name, context);
}

/**
 * Error describing a failed lookup of `name` in `parameters`, without
 * throwing it.
 */
export function parameterNotFound(
  parameters: ParameterMap,
  name: string,
  context: ResolveContext,
): ParameterNotFoundError {
  return new ParameterNotFoundError({
    parameterName: name,
    kind: context.kind,
    attemptedVariations: candidatesFor(name, context.kind),
    template: context.template,
    normalizedTemplate: context.normalizedTemplate,
    availableKeys: Object.keys(parameters),
  });
}

function candidatesFor(name: string, kind: ParameterKind): string[] {
  return kind === 'query' ? queryVariationsFor(name) : variationsFor(name);
}

function isUpperCase(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
