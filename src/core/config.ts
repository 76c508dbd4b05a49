import { isLogLevel } from './logger';
import type { Logger, LogLevel } from './types';

export const DEFAULT_BASE_URL_MARKER = '{+baseurl}';

export interface TemplateConfig {
  /**
   * Literal prefix generated clients put in front of every template. Removed
   * during normalization when it is the exact prefix.
   */
  baseUrlMarker: string;
  /**
   * Compare templates without regard to case.
   */
  ignoreCase: boolean;
}

export type UnmatchedPolicy = 'return-undefined' | 'throw';

export interface MockConfig {
  logger?: Logger;
  logLevel?: LogLevel;
  template?: Partial<TemplateConfig>;
  /**
   * What a send operation does when no expectation matches the request.
   * Defaults to resolving `undefined`, like an unconfigured call on a mock.
   */
  onUnmatched?: UnmatchedPolicy;
  /**
   * Value exposed as `baseUrl` on the mock adapter.
   */
  baseUrl?: string;
}

export interface ResolvedMockConfig {
  logger: Logger;
  logLevel: LogLevel;
  template: TemplateConfig;
  onUnmatched: UnmatchedPolicy;
  baseUrl: string;
}

const defaultTemplate: TemplateConfig = {
  baseUrlMarker: DEFAULT_BASE_URL_MARKER,
  ignoreCase: true,
};

const logLevelEnvKey = 'CLIENT_TEMPLATE_MOCK_LOG_LEVEL';

export class MockConfigError extends Error {
  code: 'INVALID_CONFIG' | 'INVALID_REQUEST';

  constructor(code: MockConfigError['code'], message: string) {
    super(message);
    this.name = 'MockConfigError';
    this.code = code;
  }
}

export function normalizeConfig(config?: MockConfig): ResolvedMockConfig {
  const logger = config?.logger ?? console;
  const logLevel = normalizeLogLevel(config?.logLevel);
  const template = normalizeTemplate(config?.template);
  const onUnmatched = config?.onUnmatched ?? 'return-undefined';

  if (onUnmatched !== 'return-undefined' && onUnmatched !== 'throw') {
    throw new MockConfigError('INVALID_CONFIG', 'onUnmatched must be return-undefined or throw');
  }

  return {
    logger,
    logLevel,
    template,
    onUnmatched,
    baseUrl: config?.baseUrl?.trim() ?? '',
  };
}

function normalizeLogLevel(level: LogLevel | undefined): LogLevel {
  if (level !== undefined) {
    if (!isLogLevel(level)) {
      throw new MockConfigError('INVALID_CONFIG', 'logLevel must be debug, info, warn, or error');
    }
    return level;
  }

  const envLevel =
    typeof process !== 'undefined' ? process.env?.[logLevelEnvKey]?.trim().toLowerCase() : undefined;
  if (!envLevel) {
    return 'warn';
  }
  if (!isLogLevel(envLevel)) {
    throw new MockConfigError(
      'INVALID_CONFIG',
      `${logLevelEnvKey} must be debug, info, warn, or error (got "${envLevel}")`,
    );
  }
  return envLevel;
}

function normalizeTemplate(cfg?: Partial<TemplateConfig>): TemplateConfig {
  const template: TemplateConfig = {
    ...defaultTemplate,
    ...cfg,
  };

  if (typeof template.baseUrlMarker !== 'string') {
    throw new MockConfigError('INVALID_CONFIG', 'template.baseUrlMarker must be a string');
  }
  if (typeof template.ignoreCase !== 'boolean') {
    throw new MockConfigError('INVALID_CONFIG', 'template.ignoreCase must be a boolean');
  }

  return template;
}
