/**
 * HTTP Client - page fetcher with separate connect and read timeouts
 */

import type { Readable } from 'node:stream';
import { Agent, Dispatcher, request } from 'undici';
import { DEFAULT_USER_AGENT } from '../config/scanConfig.js';
import { createModuleLogger } from '../core/logger.js';

const log = createModuleLogger('httpClient');

export interface FetchedPage {
  /** URL requested (before redirects) */
  url: string;
  status: number;
  contentType: string;
  /** Body, cut at the size limit, with every whitespace run collapsed to one space */
  text: string;
}

/**
 * Fetches one URL. Resolves null for anything that is not a usable text page;
 * implementations never reject.
 */
export interface PageFetcher {
  fetchPage(url: string, signal?: AbortSignal): Promise<FetchedPage | null>;
}

export interface HttpPageFetcherOptions {
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  userAgent?: string;
  maxRedirects?: number;
  /** Bytes of body read before the rest is discarded */
  maxBodyBytes?: number;
  /** Defaults to a dedicated undici Agent carrying the connect timeout */
  dispatcher?: Dispatcher;
}

const DEFAULT_CONNECT_TIMEOUT = 5_000;
const DEFAULT_READ_TIMEOUT = 10_000;
const DEFAULT_MAX_REDIRECTS = 5;
const DEFAULT_MAX_BODY_BYTES = 5 * 1024 * 1024;

export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

export function isTextContentType(contentType: string): boolean {
  return contentType.toLowerCase().includes('text/');
}

/**
 * Read at most `maxBytes` of a response body, then destroy the stream so a server that
 * keeps sending cannot hold the fetch open.
 */
export async function readLimitedText(body: Readable, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let bytesRead = 0;

  for await (const chunk of body) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    const remaining = maxBytes - bytesRead;
    chunks.push(bytes.length > remaining ? bytes.subarray(0, remaining) : bytes);
    bytesRead += Math.min(bytes.length, remaining);
    if (bytesRead >= maxBytes) break;
  }

  if (!body.destroyed) body.destroy();
  return Buffer.concat(chunks).toString('utf8');
}

function headerValue(value: string | string[] | undefined): string {
  if (Array.isArray(value)) return value.join(', ');
  return value ?? '';
}

export class HttpPageFetcher implements PageFetcher {
  private readonly dispatcher: Dispatcher;
  private readonly readTimeoutMs: number;
  private readonly userAgent: string;
  private readonly maxRedirects: number;
  private readonly maxBodyBytes: number;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.dispatcher = options.dispatcher ?? new Agent({
      connect: { timeout: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT },
    });
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<FetchedPage | null> {
    if (signal?.aborted) return null;

    try {
      const { statusCode, headers, body } = await request(url, {
        method: 'GET',
        dispatcher: this.dispatcher,
        headers: { 'user-agent': this.userAgent },
        maxRedirections: this.maxRedirects,
        headersTimeout: this.readTimeoutMs,
        bodyTimeout: this.readTimeoutMs,
        signal,
      });

      const contentType = headerValue(headers['content-type']);
      if (statusCode < 200 || statusCode >= 300 || !isTextContentType(contentType)) {
        await body.dump();
        log.debug({ url, statusCode, contentType }, 'Skipping non-text or error response');
        return null;
      }

      const text = collapseWhitespace(await readLimitedText(body, this.maxBodyBytes));
      return { url, status: statusCode, contentType, text };
    } catch (err) {
      log.debug({ url, err }, 'Fetch failed');
      return null;
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

/**
 * Fetch `https://domain`, falling back to `http://domain`. Each attempt gets its own
 * full timeout budget; no fallback is attempted once the signal has fired.
 */
export async function fetchWithFallback(
  fetcher: PageFetcher,
  domain: string,
  signal?: AbortSignal
): Promise<FetchedPage | null> {
  const secure = await fetcher.fetchPage(`https://${domain}`, signal);
  if (secure) return secure;
  if (signal?.aborted) return null;
  return fetcher.fetchPage(`http://${domain}`, signal);
}
