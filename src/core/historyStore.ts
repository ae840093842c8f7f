import { promises as fs } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { Mutex } from 'async-mutex';
import { ErrorCode, StoreError } from './errors.js';
import { createModuleLogger } from './logger.js';
import { DnsRecords, Finding, HistoryRecord } from './types.js';
import { parseCsv, toCsv } from '../util/csv.js';

const log = createModuleLogger('historyStore');

export const HISTORY_COLUMNS = [
  'timestamp',
  'target',
  'suspect_domain',
  'similarity',
  'url',
  'ip',
  'ns',
  'mx',
  'notes',
] as const;

type HistoryColumn = (typeof HISTORY_COLUMNS)[number];

const REQUIRED_COLUMNS: readonly HistoryColumn[] = ['timestamp', 'target', 'suspect_domain', 'similarity', 'url'];

const LIST_SEPARATOR = ', ';

// One writer per file, shared by every store instance pointing at it
const fileLocks = new Map<string, Mutex>();

function lockFor(path: string): Mutex {
  let mutex = fileLocks.get(path);
  if (!mutex) {
    mutex = new Mutex();
    fileLocks.set(path, mutex);
  }
  return mutex;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function joinList(values: readonly string[] | undefined): string {
  return values && values.length > 0 ? values.join(LIST_SEPARATOR) : '';
}

function splitList(cell: string | undefined): string[] {
  if (!cell) return [];
  return cell.split(',').map(v => v.trim()).filter(Boolean);
}

// Empty cells are NaN, not 0
function toNumber(cell: string | undefined): number {
  return cell?.trim() ? Number(cell) : NaN;
}

export function toHistoryRow(record: HistoryRecord): Record<HistoryColumn, string | number> {
  return {
    timestamp: record.timestamp,
    target: record.target,
    suspect_domain: record.suspectDomain,
    similarity: record.similarity,
    url: record.url,
    ip: joinList(record.dns?.a),
    ns: joinList(record.dns?.ns),
    mx: joinList(record.dns?.mx),
    notes: record.notes,
  };
}

/**
 * Serialize records with the history header, as stored on disk and offered for download.
 */
export function recordsToCsv(records: readonly HistoryRecord[]): string {
  return toCsv(HISTORY_COLUMNS, records.map(toHistoryRow));
}

/**
 * Parse history CSV text. Returns null when the text is not a readable history file.
 */
export function parseHistoryCsv(text: string): HistoryRecord[] | null {
  let rows: string[][];
  try {
    rows = parseCsv(text);
  } catch (err) {
    log.debug({ err }, 'History file is not valid CSV');
    return null;
  }

  const [header, ...body] = rows;
  if (!header) return [];

  const index = new Map<string, number>(header.map((name, i) => [name.trim(), i]));
  if (REQUIRED_COLUMNS.some(column => !index.has(column))) {
    return null;
  }

  const cell = (row: string[], column: HistoryColumn): string | undefined => {
    const i = index.get(column);
    return i === undefined ? undefined : row[i];
  };

  const records: HistoryRecord[] = [];
  for (const row of body) {
    if (row.length === 1 && row[0] === '') continue;
    if (row.length !== header.length) return null;

    const timestamp = toNumber(cell(row, 'timestamp'));
    const similarity = toNumber(cell(row, 'similarity'));
    const target = cell(row, 'target') ?? '';
    const suspectDomain = cell(row, 'suspect_domain') ?? '';
    if (!Number.isFinite(timestamp) || !Number.isFinite(similarity) || !target || !suspectDomain) {
      return null;
    }

    const dns: DnsRecords = {
      a: splitList(cell(row, 'ip')),
      ns: splitList(cell(row, 'ns')),
      mx: splitList(cell(row, 'mx')),
    };
    const hasDns = dns.a.length > 0 || dns.ns.length > 0 || dns.mx.length > 0;

    records.push(Object.freeze({
      timestamp,
      target,
      suspectDomain,
      similarity,
      url: cell(row, 'url') ?? '',
      ...(hasDns ? { dns } : {}),
      notes: cell(row, 'notes') ?? '',
    }));
  }

  return records;
}

/**
 * Append-only history of Findings kept in a CSV file.
 *
 * `append` and `clear` are the only mutation paths and run one at a time per file: the
 * whole sequence is read, extended and written to a temporary file that is renamed over
 * the original. Readers never take the lock; the rename means they see either the old
 * or the new file.
 */
export class HistoryStore {
  readonly path: string;
  private readonly mutex: Mutex;

  constructor(path: string) {
    this.path = resolve(path);
    this.mutex = lockFor(this.path);
  }

  /**
   * Every persisted record in append order. A missing or unreadable file reads as empty.
   */
  async loadAll(): Promise<HistoryRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(this.path, 'utf8');
    } catch (err) {
      if (!isMissingFile(err)) {
        log.warn({ err, path: this.path }, 'History file unreadable, treating as empty');
      }
      return [];
    }

    const records = parseHistoryCsv(text);
    if (records === null) {
      log.warn({ path: this.path }, 'History file is corrupt, treating as empty');
      return [];
    }
    return records;
  }

  /**
   * Records newest first. Records sharing a timestamp keep their append order.
   */
  async loadRecent(): Promise<HistoryRecord[]> {
    const records = await this.loadAll();
    return records
      .map((record, position) => ({ record, position }))
      .sort((x, y) => y.record.timestamp - x.record.timestamp || x.position - y.position)
      .map(({ record }) => record);
  }

  /**
   * Append findings in the given order.
   *
   * @throws StoreError when the new file cannot be written; the previous file is kept
   */
  async append(findings: readonly Finding[]): Promise<void> {
    if (findings.length === 0) return;

    await this.mutex.runExclusive(async () => {
      const existing = await this.loadAll();
      const next = [...existing, ...findings];
      await this.replace(recordsToCsv(next));
      log.info({ path: this.path, appended: findings.length, total: next.length }, 'History updated');
    });
  }

  /**
   * Remove every record. Clearing a missing file is a no-op.
   *
   * @throws StoreError when the file exists but cannot be removed
   */
  async clear(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      try {
        await fs.rm(this.path, { force: true });
      } catch (err) {
        throw new StoreError(ErrorCode.STORE_CLEAR_FAILED, `Could not clear history at ${this.path}`, err);
      }
      log.info({ path: this.path }, 'History cleared');
    });
  }

  private async replace(contents: string): Promise<void> {
    const tmpPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(dirname(this.path), { recursive: true });
      await fs.writeFile(tmpPath, contents, 'utf8');
      await fs.rename(tmpPath, this.path);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        log.debug({ err: cleanupErr, tmpPath }, 'Could not remove temporary history file');
      });
      throw new StoreError(ErrorCode.STORE_WRITE_FAILED, `Could not write history to ${this.path}`, err);
    }
  }
}
