import test from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_SCAN_CONFIG, createScanConfig } from '../config/scanConfig.js';
import { loadScanConfig } from '../core/env.js';
import { ErrorCode, ValidationError } from '../core/errors.js';

test('createScanConfig without overrides returns the defaults', () => {
  assert.deepEqual(createScanConfig(), { ...DEFAULT_SCAN_CONFIG });
  assert.equal(DEFAULT_SCAN_CONFIG.threshold, 0.6);
  assert.equal(DEFAULT_SCAN_CONFIG.candidateCap, 50);
  assert.equal(DEFAULT_SCAN_CONFIG.strategy, 'local');
});

test('createScanConfig names every out-of-range field', () => {
  assert.throws(
    () => createScanConfig({ threshold: 0.3 }),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.code === ErrorCode.VALIDATION_INVALID_OPTION &&
      err.message === 'Invalid scan configuration: threshold'
  );
  assert.throws(
    () => createScanConfig({ threshold: 0.99, concurrency: 0 }),
    { message: 'Invalid scan configuration: threshold, concurrency' }
  );
});

test('createScanConfig accepts the threshold bounds', () => {
  assert.equal(createScanConfig({ threshold: 0.4 }).threshold, 0.4);
  assert.equal(createScanConfig({ threshold: 0.95 }).threshold, 0.95);
});

test('loadScanConfig falls back to defaults for an empty environment', () => {
  assert.deepEqual(loadScanConfig({}), { ...DEFAULT_SCAN_CONFIG });
});

test('loadScanConfig clamps numeric values', () => {
  const config = loadScanConfig({
    SIMILARITY_THRESHOLD: '0.99',
    CANDIDATE_CAP: '9999',
    SCAN_CONCURRENCY: '0',
    FETCH_READ_TIMEOUT_MS: 'soon',
  });

  assert.equal(config.threshold, 0.95);
  assert.equal(config.candidateCap, 500);
  assert.equal(config.concurrency, 1);
  assert.equal(config.readTimeoutMs, DEFAULT_SCAN_CONFIG.readTimeoutMs);
});

test('loadScanConfig reads strategy and paths', () => {
  const config = loadScanConfig({
    SCAN_STRATEGY: ' ORACLE ',
    CANDIDATE_CAP: '12.7',
    ORACLE_COMMAND: '/usr/local/bin/dnstwist',
    HISTORY_FILE: '/tmp/lookalikes.csv',
  });

  assert.equal(config.strategy, 'oracle');
  assert.equal(config.candidateCap, 12);
  assert.equal(config.oracleCommand, '/usr/local/bin/dnstwist');
  assert.equal(config.historyFile, '/tmp/lookalikes.csv');
  assert.equal(loadScanConfig({ SCAN_STRATEGY: 'bogus' }).strategy, 'local');
});
