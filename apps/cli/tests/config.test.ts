import assert from 'node:assert/strict';
import { test } from 'node:test';
import { resolveReportConfig } from '../src/config';
import { ConfigError } from '../src/errors';

test('applies defaults around the token', () => {
  const config = resolveReportConfig({}, { GITLAB_TOKEN: ' test-token ' });

  assert.deepEqual(config, {
    token: 'test-token',
    baseUrl: 'https://gitlab.com',
    format: 'table',
    workers: 100,
    pageSize: 50,
    httpTimeoutMs: 30000,
    logLevel: 'warn'
  });
});

test('flags win over the environment', () => {
  const config = resolveReportConfig(
    {
      token: 'flag-token',
      baseUrl: 'https://gitlab.example.test',
      workers: '8',
      pageSize: '20',
      format: 'csv',
      debug: true
    },
    {
      GITLAB_TOKEN: 'env-token',
      GITLAB_BASE_URL: 'https://other.example.test',
      GLREPORTER_WORKERS: '16',
      GLREPORTER_PAGE_SIZE: '40',
      GLREPORTER_HTTP_TIMEOUT_MS: '5000',
      GLREPORTER_LOG_LEVEL: 'info'
    }
  );

  assert.deepEqual(config, {
    token: 'flag-token',
    baseUrl: 'https://gitlab.example.test',
    format: 'csv',
    workers: 8,
    pageSize: 20,
    httpTimeoutMs: 5000,
    logLevel: 'debug'
  });
});

test('reads the log level from the environment', () => {
  const config = resolveReportConfig({}, { GITLAB_TOKEN: 'test-token', GLREPORTER_LOG_LEVEL: 'info' });
  assert.equal(config.logLevel, 'info');
});

test('rejects out-of-range and malformed numbers', () => {
  assert.throws(
    () => resolveReportConfig({ pageSize: '500' }, { GITLAB_TOKEN: 'test-token' }),
    (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.equal(err.message, 'Invalid configuration\n  - GLREPORTER_PAGE_SIZE: page size must be <= 100');
      return true;
    }
  );
  assert.throws(
    () => resolveReportConfig({}, { GITLAB_TOKEN: 'test-token', GLREPORTER_WORKERS: 'many' }),
    /GLREPORTER_WORKERS: Expected worker count to be an integer/
  );
  assert.throws(
    () => resolveReportConfig({ workers: '0' }, { GITLAB_TOKEN: 'test-token' }),
    /worker count must be >= 1/
  );
});

test('rejects a malformed base URL and unknown log level', () => {
  assert.throws(() => resolveReportConfig({ baseUrl: 'not a url' }, { GITLAB_TOKEN: 'test-token' }), /GITLAB_BASE_URL/);
  assert.throws(
    () => resolveReportConfig({}, { GITLAB_TOKEN: 'test-token', GLREPORTER_LOG_LEVEL: 'loud' }),
    /GLREPORTER_LOG_LEVEL/
  );
});

test('requires a token and a known format', () => {
  assert.throws(() => resolveReportConfig({}, { GITLAB_TOKEN: '   ' }), {
    name: 'ConfigError',
    message: 'GitLab token is required: pass --token or set GITLAB_TOKEN'
  });
  assert.throws(() => resolveReportConfig({ format: 'xml' }, { GITLAB_TOKEN: 'test-token' }), /unsupported format: xml/);
});
