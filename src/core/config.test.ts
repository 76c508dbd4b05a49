import assert from 'node:assert/strict';
import test from 'node:test';
import { MockConfigError, normalizeConfig, type MockConfig } from './config';

const envKeys = ['CLIENT_TEMPLATE_MOCK_LOG_LEVEL'] as const;

function withEnv(vars: Partial<Record<(typeof envKeys)[number], string>>, fn: () => void): void {
  const previous: Partial<Record<(typeof envKeys)[number], string | undefined>> = {};
  for (const key of envKeys) {
    previous[key] = process.env[key];
    const next = vars[key];
    if (next === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = next;
    }
  }

  try {
    fn();
  } finally {
    for (const key of envKeys) {
      const value = previous[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

test('normalizeConfig applies defaults', () => {
  withEnv({}, () => {
    const cfg = normalizeConfig();
    assert.equal(cfg.logger, console);
    assert.equal(cfg.logLevel, 'warn');
    assert.deepEqual(cfg.template, { baseUrlMarker: '{+baseurl}', ignoreCase: true });
    assert.equal(cfg.onUnmatched, 'return-undefined');
    assert.equal(cfg.baseUrl, '');
  });
});

test('normalizeConfig uses CLIENT_TEMPLATE_MOCK_LOG_LEVEL env var as fallback', () => {
  withEnv({ CLIENT_TEMPLATE_MOCK_LOG_LEVEL: ' DEBUG ' }, () => {
    assert.equal(normalizeConfig().logLevel, 'debug');
  });
});

test('normalizeConfig prefers explicit logLevel over CLIENT_TEMPLATE_MOCK_LOG_LEVEL', () => {
  withEnv({ CLIENT_TEMPLATE_MOCK_LOG_LEVEL: 'debug' }, () => {
    assert.equal(normalizeConfig({ logLevel: 'error' }).logLevel, 'error');
  });
});

test('normalizeConfig rejects an unknown env log level', () => {
  withEnv({ CLIENT_TEMPLATE_MOCK_LOG_LEVEL: 'verbose' }, () => {
    assert.throws(
      () => normalizeConfig(),
      /CLIENT_TEMPLATE_MOCK_LOG_LEVEL must be debug, info, warn, or error \(got "verbose"\)/,
    );
  });
});

test('normalizeConfig merges partial template options', () => {
  withEnv({}, () => {
    const cfg = normalizeConfig({ template: { ignoreCase: false }, baseUrl: ' http://localhost ' });
    assert.deepEqual(cfg.template, { baseUrlMarker: '{+baseurl}', ignoreCase: false });
    assert.equal(cfg.baseUrl, 'http://localhost');
  });
});

test('normalizeConfig rejects invalid values from untyped sources', () => {
  withEnv({}, () => {
    const fromJson: MockConfig = JSON.parse('{"onUnmatched":"explode"}');
    assert.throws(
      () => normalizeConfig(fromJson),
      (err: unknown) => err instanceof MockConfigError && err.code === 'INVALID_CONFIG',
    );

    const badTemplate: MockConfig = JSON.parse('{"template":{"ignoreCase":"yes"}}');
    assert.throws(() => normalizeConfig(badTemplate), /template.ignoreCase must be a boolean/);
  });
});
