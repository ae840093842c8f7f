import test from 'node:test';
import assert from 'node:assert/strict';
import { Readable } from 'node:stream';
import { MockAgent } from 'undici';
import {
  HttpPageFetcher,
  collapseWhitespace,
  fetchWithFallback,
  isTextContentType,
  readLimitedText,
} from '../net/httpClient.js';

const USER_AGENT = 'TestAgent/1.0';

function mockFetcher() {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const fetcher = new HttpPageFetcher({ userAgent: USER_AGENT, readTimeoutMs: 1_000, dispatcher: agent });
  return { agent, fetcher };
}

test('collapseWhitespace joins every whitespace run with one space', () => {
  assert.equal(collapseWhitespace('  <p>Hello \n\t world</p>\r\n '), '<p>Hello world</p>');
  assert.equal(collapseWhitespace(' \n '), '');
});

test('isTextContentType accepts any text type', () => {
  assert.equal(isTextContentType('text/html; charset=utf-8'), true);
  assert.equal(isTextContentType('TEXT/PLAIN'), true);
  assert.equal(isTextContentType('application/json'), false);
  assert.equal(isTextContentType(''), false);
});

test('fetches a text page with the configured user agent', async () => {
  const { agent, fetcher } = mockFetcher();
  agent
    .get('https://bank.test')
    .intercept({ path: '/', method: 'GET', headers: { 'user-agent': USER_AGENT } })
    .reply(200, '<html>\n  <body>Hello   world</body>\n</html>', { headers: { 'content-type': 'text/html; charset=utf-8' } });

  const page = await fetcher.fetchPage('https://bank.test');

  assert.deepEqual(page, {
    url: 'https://bank.test',
    status: 200,
    contentType: 'text/html; charset=utf-8',
    text: '<html> <body>Hello world</body> </html>',
  });
  await fetcher.close();
});

test('non-text responses are not pages', async () => {
  const { agent, fetcher } = mockFetcher();
  agent
    .get('https://api.test')
    .intercept({ path: '/', method: 'GET' })
    .reply(200, '{"ok":true}', { headers: { 'content-type': 'application/json' } });

  assert.equal(await fetcher.fetchPage('https://api.test'), null);
  await fetcher.close();
});

test('error statuses are not pages', async () => {
  const { agent, fetcher } = mockFetcher();
  agent
    .get('https://gone.test')
    .intercept({ path: '/', method: 'GET' })
    .reply(404, '<h1>Not found</h1>', { headers: { 'content-type': 'text/html' } });

  assert.equal(await fetcher.fetchPage('https://gone.test'), null);
  await fetcher.close();
});

test('transport errors resolve null', async () => {
  const { agent, fetcher } = mockFetcher();
  agent
    .get('https://down.test')
    .intercept({ path: '/', method: 'GET' })
    .replyWithError(new Error('connect ECONNREFUSED'));

  assert.equal(await fetcher.fetchPage('https://down.test'), null);
  await fetcher.close();
});

test('an aborted signal skips the request', async () => {
  const { fetcher } = mockFetcher();
  const controller = new AbortController();
  controller.abort();

  assert.equal(await fetcher.fetchPage('https://bank.test', controller.signal), null);
  await fetcher.close();
});

test('fetchWithFallback retries over plain http', async () => {
  const { agent, fetcher } = mockFetcher();
  agent
    .get('https://legacy.test')
    .intercept({ path: '/', method: 'GET' })
    .replyWithError(new Error('certificate has expired'));
  agent
    .get('http://legacy.test')
    .intercept({ path: '/', method: 'GET' })
    .reply(200, 'plain page', { headers: { 'content-type': 'text/plain' } });

  const page = await fetchWithFallback(fetcher, 'legacy.test');

  assert.equal(page?.url, 'http://legacy.test');
  assert.equal(page?.text, 'plain page');
  await fetcher.close();
});

test('fetchWithFallback prefers https', async () => {
  const { agent, fetcher } = mockFetcher();
  agent
    .get('https://bank.test')
    .intercept({ path: '/', method: 'GET' })
    .reply(200, 'secure page', { headers: { 'content-type': 'text/html' } });

  const page = await fetchWithFallback(fetcher, 'bank.test');

  assert.equal(page?.url, 'https://bank.test');
  await fetcher.close();
});

test('bodies past the size limit are cut off', async () => {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const fetcher = new HttpPageFetcher({ userAgent: USER_AGENT, maxBodyBytes: 16, dispatcher: agent });
  agent
    .get('https://huge.test')
    .intercept({ path: '/', method: 'GET' })
    .reply(200, `<html>${'a'.repeat(4096)}</html>`, { headers: { 'content-type': 'text/html' } });

  const page = await fetcher.fetchPage('https://huge.test');

  assert.equal(page?.text, `<html>${'a'.repeat(10)}`);
  await fetcher.close();
});

test('readLimitedText stops reading and destroys the stream', async () => {
  const body = Readable.from([Buffer.from('abcdef'), Buffer.from('ghijkl'), Buffer.from('mnopqr')]);

  assert.equal(await readLimitedText(body, 8), 'abcdefgh');
  assert.equal(body.destroyed, true);
});

test('readLimitedText returns short bodies whole', async () => {
  const body = Readable.from([Buffer.from('<p>hi</p>')]);
  assert.equal(await readLimitedText(body, 1024), '<p>hi</p>');
});

test('redirects are followed and the requested URL is kept', async () => {
  const { agent, fetcher } = mockFetcher();
  agent
    .get('https://bank.test')
    .intercept({ path: '/', method: 'GET' })
    .reply(301, '', { headers: { location: 'https://www.bank.test/' } });
  agent
    .get('https://www.bank.test')
    .intercept({ path: '/', method: 'GET' })
    .reply(200, '<h1>Bank</h1>', { headers: { 'content-type': 'text/html' } });

  const page = await fetcher.fetchPage('https://bank.test');

  assert.equal(page?.status, 200);
  assert.equal(page?.text, '<h1>Bank</h1>');
  assert.equal(page?.url, 'https://bank.test');
  await fetcher.close();
});
