import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { loadConfig } from '../src/config.js';

test('applies defaults for an empty environment', () => {
  const config = loadConfig({});
  assert.equal(config.environment, 'development');
  assert.equal(config.port, 3333);
  assert.equal(config.host, '0.0.0.0');
  assert.equal(config.logLevel, 'info');
  assert.equal(config.sqliteFile, path.resolve('data', 'course_sources.db'));
  assert.equal(config.masterCacheTtlMs, 3_600_000);
});

test('reads fallback variable names', () => {
  const config = loadConfig({
    PORT: '8080',
    HOST: '127.0.0.1',
    SQLITE_PATH: '/tmp/sources.db',
    MASTER_CACHE_TTL_SECONDS: '0',
  });
  assert.equal(config.port, 8080);
  assert.equal(config.host, '127.0.0.1');
  assert.equal(config.sqliteFile, '/tmp/sources.db');
  assert.equal(config.masterCacheTtlMs, 0);
});

test('rejects invalid values', () => {
  assert.throws(() => loadConfig({ LOG_LEVEL: 'verbose' }));
  assert.throws(() => loadConfig({ MASTER_CACHE_TTL_SECONDS: '-5' }));
});
