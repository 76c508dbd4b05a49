export type {
  BuilderSnapshot,
  ExpectationOutcome,
  ExpectedMethod,
  HeaderMap,
  HttpMethod,
  LogLevel,
  Logger,
  MatchResult,
  MatchStrategy,
  MismatchReason,
  ParameterMap,
  RequestDescriptor,
  RequestDescriptorInit,
  ResponseKind,
} from './types';
export { httpMethods } from './types';
export type { MockConfig, ResolvedMockConfig, TemplateConfig, UnmatchedPolicy } from './config';
export { DEFAULT_BASE_URL_MARKER, MockConfigError, normalizeConfig } from './config';
export type { ParameterKind, ParameterNotFoundDetails } from './errors';
export { MockSetupError, ParameterNotFoundError, UnconfiguredRequestError } from './errors';
export { logWithLevel } from './logger';
export type { ResolveContext, ResolvedParameter } from './naming';
export {
  findParameter,
  parameterNotFound,
  percentEncode,
  queryVariationsFor,
  resolveParameter,
  toKebabCase,
  toPascalCase,
  variationsFor,
} from './naming';
export type { NormalizeOptions } from './template';
export { normalizeUrlTemplate, templatesEqual } from './template';
export {
  createRequestDescriptor,
  findMissingParameter,
  getHeader,
  getPathParameter,
  getQueryParameter,
  normalizeRequestTemplate,
  parseHttpMethod,
  stringifyParameterValue,
  tryGetPathParameter,
  tryGetQueryParameter,
} from './request';
export type {
  ParameterReference,
  PredicateInput,
  RequestPredicate,
  RequestTest,
} from './predicate';
export {
  allOf,
  always,
  and,
  compilePredicate,
  describePredicate,
  evaluatePredicate,
  hasHeader,
  isRequestPredicate,
  missingParameters,
  pathParameterEquals,
  predicate,
  queryParameterEquals,
  toPredicate,
} from './predicate';
export type { Expectation, NewExpectation } from './registry';
export { ExpectationRegistry } from './registry';
export type { MatchOptions } from './matcher';
export {
  isDeprecatedStrategy,
  matchBuilder,
  matchExpectation,
  matches,
  resolveStrategy,
} from './matcher';
