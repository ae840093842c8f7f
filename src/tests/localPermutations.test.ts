import test from 'node:test';
import assert from 'node:assert/strict';
import { createCandidateSource } from '../modules/candidateSource.js';
import { RegistrationOracleSource } from '../modules/dnsTwist.js';
import { LocalPermutationSource, permute } from '../modules/localPermutations.js';
import { DEFAULT_SCAN_CONFIG } from '../config/scanConfig.js';

const domains = async (source: LocalPermutationSource, target: string) =>
  (await source.generate(target)).map(c => c.domain);

test('bank.com with cap 5 yields the first five prefix variants', async () => {
  const result = await domains(new LocalPermutationSource(5), 'bank.com');
  assert.deepEqual(result, ['mybank.com', 'my-bank.com', 'securebank.com', 'secure-bank.com', 'loginbank.com']);
});

test('candidates are unique, capped and never the target', async () => {
  for (const cap of [1, 10, 40, 500]) {
    const result = await domains(new LocalPermutationSource(cap), 'bank.com');
    assert.ok(result.length <= cap);
    assert.equal(new Set(result).size, result.length);
    assert.equal(result.includes('bank.com'), false);
  }
});

test('every rule contributes and duplicates collapse', async () => {
  const result = await domains(new LocalPermutationSource(500), 'bank.com');
  // 16 prefix + 16 suffix + 6 subdomain + 9 alternate suffix + 4 new compounds
  assert.equal(result.length, 51);
  assert.ok(result.includes('bank-online.com'));
  assert.ok(result.includes('login.bank.com'));
  assert.ok(result.includes('bank.net'));
  assert.ok(result.includes('secure-bank-login.com'));
  assert.equal(permute('bank.com').filter(d => d === 'bank-login.com').length, 2);
});

test('the original suffix is not offered as an alternate', async () => {
  const result = await domains(new LocalPermutationSource(500), 'bank.org');
  assert.equal(result.includes('bank.org'), false);
  assert.ok(result.includes('bank.com'));
});

test('input without a suffix falls back to .com', async () => {
  const result = await domains(new LocalPermutationSource(500), 'bank');
  assert.ok(result.includes('mybank.com'));
  assert.ok(result.includes('bank.net'));
  assert.equal(result.includes('bank.com'), false);
});

test('empty name produces no candidates', async () => {
  assert.deepEqual(await domains(new LocalPermutationSource(50), '.com'), []);
  assert.deepEqual(await domains(new LocalPermutationSource(50), ''), []);
});

test('local candidates carry no DNS metadata', async () => {
  const [first] = await new LocalPermutationSource(1).generate('bank.com');
  assert.deepEqual(first, { domain: 'mybank.com' });
});

test('createCandidateSource follows the configured strategy', () => {
  const local = createCandidateSource({ ...DEFAULT_SCAN_CONFIG, strategy: 'local' });
  const oracle = createCandidateSource({ ...DEFAULT_SCAN_CONFIG, strategy: 'oracle' });
  assert.ok(local instanceof LocalPermutationSource);
  assert.equal(local.strategy, 'local');
  assert.ok(oracle instanceof RegistrationOracleSource);
  assert.equal(oracle.strategy, 'oracle');
});
