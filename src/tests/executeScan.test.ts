import test from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createScanConfig } from '../config/scanConfig.js';
import { ErrorCode, ValidationError } from '../core/errors.js';
import { HistoryStore } from '../core/historyStore.js';
import type { FetchedPage, PageFetcher } from '../net/httpClient.js';
import { createScanner, executeScan } from '../scan/executeScan.js';

const PAGES: Record<string, string> = {
  'https://bank.test': '<h1>Sign in to Bank</h1>',
  'https://mybank.test': '<h1>Sign in to Bank</h1>',
  'https://shop.test': '<h1>Shop</h1>',
};

const fetcher: PageFetcher = {
  async fetchPage(url: string): Promise<FetchedPage | null> {
    const text = PAGES[url];
    return text === undefined ? null : { url, status: 200, contentType: 'text/html', text };
  },
};

async function scannerWithHistory() {
  const dir = await fs.mkdtemp(join(tmpdir(), 'execute-scan-'));
  const config = createScanConfig({ historyFile: join(dir, 'history.csv'), candidateCap: 500 });
  return createScanner(config, { fetcher, now: () => 1_700_000_000 });
}

test('scans every target and appends the findings once', async () => {
  const scanner = await scannerWithHistory();

  const result = await executeScan(scanner, { domains: 'https://Bank.test/\n# skip\nshop.test\nbank.test' });

  assert.match(result.scanId, /^scan-/);
  assert.equal(result.status, 'completed');
  assert.deepEqual(result.targets, ['bank.test', 'shop.test']);
  assert.deepEqual(result.outcomes.map(o => o.status), ['completed', 'completed']);
  assert.deepEqual(result.findings.map(f => [f.target, f.suspectDomain, f.similarity]), [
    ['bank.test', 'mybank.test', 1],
  ]);
  assert.equal(result.outcomes[0]?.candidatesChecked, 52);
  assert.deepEqual(await scanner.history.loadAll(), result.findings);
});

test('rejects an empty target list without touching history', async () => {
  const scanner = await scannerWithHistory();

  await assert.rejects(
    executeScan(scanner, { domains: '\n  \n' }),
    (err: unknown) => err instanceof ValidationError && err.code === ErrorCode.VALIDATION_EMPTY_TARGETS
  );
  await assert.rejects(fs.access(scanner.history.path));
});

test('rejects malformed targets before scanning', async () => {
  const calls: string[] = [];
  const scanner = createScanner(createScanConfig(), {
    fetcher: {
      async fetchPage(url) {
        calls.push(url);
        return null;
      },
    },
    history: new HistoryStore(join(tmpdir(), 'never-written.csv')),
  });

  await assert.rejects(
    executeScan(scanner, { domains: ['bank.test', 'bank .test'] }),
    (err: unknown) => err instanceof ValidationError && err.code === ErrorCode.VALIDATION_INVALID_DOMAIN
  );
  assert.deepEqual(calls, []);
});

test('an aborted request is reported as cancelled', async () => {
  const scanner = await scannerWithHistory();
  const controller = new AbortController();
  controller.abort();

  const result = await executeScan(scanner, { domains: ['bank.test'], signal: controller.signal });

  assert.equal(result.status, 'cancelled');
  assert.deepEqual(result.findings, []);
});
