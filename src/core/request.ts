import { MockConfigError } from './config';
import type { ParameterKind, ParameterNotFoundError } from './errors';
import { findParameter, parameterNotFound, resolveParameter } from './naming';
import { normalizeUrlTemplate, type NormalizeOptions } from './template';
import {
  httpMethods,
  type HttpMethod,
  type RequestDescriptor,
  type RequestDescriptorInit,
} from './types';

export function createRequestDescriptor(init: RequestDescriptorInit): RequestDescriptor {
  const method = parseHttpMethod(init.method);
  if (!method) {
    throw new MockConfigError('INVALID_REQUEST', `unsupported HTTP method "${init.method}"`);
  }

  const descriptor: RequestDescriptor = {
    method,
    urlTemplate: init.urlTemplate ?? '',
    pathParameters: Object.freeze({ ...init.pathParameters }),
    queryParameters: Object.freeze({ ...init.queryParameters }),
    headers: Object.freeze({ ...init.headers }),
    ...(init.body !== undefined ? { body: init.body } : {}),
  };
  return Object.freeze(descriptor);
}

export function parseHttpMethod(value: string): HttpMethod | undefined {
  const upper = value.trim().toUpperCase();
  return httpMethods.find((method) => method === upper);
}

/**
 * Normalized template of a request, or an empty string when the request
 * carries no template (such a request never matches an expectation).
 */
export function normalizeRequestTemplate(
  request: RequestDescriptor,
  options?: NormalizeOptions,
): string {
  if (!request.urlTemplate) {
    return '';
  }
  return normalizeUrlTemplate(request.urlTemplate, options);
}

/**
 * Path parameter value under any naming variation of `name`
 * (`fundId`, `fund-id`, `fund%2Did`, `FundId`).
 *
 * @throws ParameterNotFoundError when no variation is present.
 */
export function getPathParameter(
  request: RequestDescriptor,
  name: string,
  options?: NormalizeOptions,
): unknown {
  return resolveParameter(request.pathParameters, name, {
    kind: 'path',
    template: request.urlTemplate,
    normalizedTemplate: normalizeRequestTemplate(request, options),
  }).value;
}

/**
 * Query parameter value under any naming variation of `name`, including the
 * `$name` and `%24name` spellings.
 *
 * @throws ParameterNotFoundError when no variation is present.
 */
export function getQueryParameter(
  request: RequestDescriptor,
  name: string,
  options?: NormalizeOptions,
): unknown {
  return resolveParameter(request.queryParameters, name, {
    kind: 'query',
    template: request.urlTemplate,
    normalizedTemplate: normalizeRequestTemplate(request, options),
  }).value;
}

export function tryGetPathParameter(request: RequestDescriptor, name: string): unknown {
  return findParameter(request.pathParameters, name, 'path')?.value;
}

export function tryGetQueryParameter(request: RequestDescriptor, name: string): unknown {
  return findParameter(request.queryParameters, name, 'query')?.value;
}

/**
 * The error `getPathParameter` or `getQueryParameter` would throw for `name`,
 * or `undefined` when the request carries the parameter.
 */
export function findMissingParameter(
  request: RequestDescriptor,
  kind: ParameterKind,
  name: string,
  options?: NormalizeOptions,
): ParameterNotFoundError | undefined {
  const parameters = kind === 'path' ? request.pathParameters : request.queryParameters;
  if (findParameter(parameters, name, kind)) {
    return undefined;
  }
  return parameterNotFound(parameters, name, {
    kind,
    template: request.urlTemplate,
    normalizedTemplate: normalizeRequestTemplate(request, options),
  });
}

export function getHeader(request: RequestDescriptor, name: string): string | undefined {
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(request.headers)) {
    if (key.toLowerCase() !== target) {
      continue;
    }
    return Array.isArray(value) ? value.join(', ') : value;
  }
  return undefined;
}

/**
 * String form used whenever parameter values are compared.
 */
export function stringifyParameterValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}
