import fs from 'node:fs/promises';
import path from 'node:path';
import type { RunRecord } from '../types/ledger.js';
import { EPOCH_FLOOR, parseIsoTimestamp } from '../utils/date.js';
import { logger } from '../utils/logger.js';

export const LEDGER_DELIMITER = ' | ';

export interface RunLedgerOptions {
  path: string;
  /** Command line recorded with each entry; defaults to the current process's */
  invocation?: string;
  now?: () => Date;
}

export function describeInvocation(argv: readonly string[] = process.argv): string {
  const [runtime, script, ...args] = argv;
  const parts = [runtime ? path.basename(runtime) : 'node'];
  if (script) parts.push(path.relative(process.cwd(), script) || script);
  return [...parts, ...args].join(' ');
}

function parseLine(line: string): RunRecord | null {
  const [timestampField, message = '', ...rest] = line.split(LEDGER_DELIMITER);
  if (timestampField === undefined) return null;
  const timestamp = parseIsoTimestamp(timestampField);
  if (!timestamp) return null;
  return { timestamp, message, invocation: rest.join(LEDGER_DELIMITER) };
}

/**
 * Append-only run history. The timestamp of the last line is the cutoff for
 * the next incremental run. Single writer; no locking.
 */
export class RunLedger {
  readonly path: string;
  private readonly invocation: string;
  private readonly now: () => Date;

  constructor(options: RunLedgerOptions) {
    this.path = options.path;
    this.invocation = options.invocation ?? describeInvocation();
    this.now = options.now ?? (() => new Date());
  }

  private async readLines(): Promise<string[] | null> {
    let text: string;
    try {
      text = await fs.readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    return text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async lastRunTime(): Promise<Date> {
    const lines = await this.readLines();
    if (lines === null) {
      logger.warn({ path: this.path }, 'Run ledger not found, using fallback date');
      return EPOCH_FLOOR;
    }

    const lastLine = lines.at(-1);
    if (lastLine === undefined) {
      logger.warn({ path: this.path }, 'Run ledger is empty, using fallback date');
      return EPOCH_FLOOR;
    }

    const record = parseLine(lastLine);
    if (!record) {
      logger.warn({ path: this.path, line: lastLine }, 'Could not parse timestamp from run ledger, using fallback date');
      return EPOCH_FLOOR;
    }
    return record.timestamp;
  }

  async readRecords(): Promise<RunRecord[]> {
    const lines = (await this.readLines()) ?? [];
    const records: RunRecord[] = [];
    for (const line of lines) {
      const record = parseLine(line);
      if (record) records.push(record);
    }
    return records;
  }

  async append(message: string): Promise<RunRecord> {
    const record: RunRecord = { timestamp: this.now(), message, invocation: this.invocation };
    const line = [record.timestamp.toISOString(), record.message, record.invocation].join(LEDGER_DELIMITER);

    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, `${line}\n`, 'utf-8');
    return record;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
