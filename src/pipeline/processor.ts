import fs from 'node:fs/promises';
import path from 'node:path';
import { csvFormatRow, csvParseRows } from 'd3-dsv';
import type { DatasetEntry } from '../types/catalog.js';
import type { ProcessOutcome } from '../types/run.js';
import { fetchBytes } from '../workers/http-client.js';
import { logger } from '../utils/logger.js';
import { normalizeHeader, type HeaderNormalizer } from './header-normalizer.js';

export interface ProcessOptions {
  outputDir: string;
  normalize?: HeaderNormalizer;
}

/** Last non-empty path segment of the download URL, or null when there is none. */
export function targetFilename(downloadUrl: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(downloadUrl).pathname;
  } catch {
    pathname = downloadUrl.split(/[?#]/)[0] ?? '';
  }

  const segment = pathname.split('/').filter((part) => part.length > 0).at(-1);
  if (!segment) return null;

  let name: string;
  try {
    name = decodeURIComponent(segment);
  } catch {
    name = segment;
  }
  // A decoded %2F must not escape the output directory
  name = path.basename(name);
  return name === '.' || name === '..' ? null : name;
}

const QUOTE = 0x22;
const LF = 0x0a;
const CR = 0x0d;

/** Strict UTF-8 decode; a leading BOM is dropped. Throws a TypeError on invalid bytes. */
export function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/**
 * Offset of the line terminator that ends the first CSV record, or the text
 * length when the header is the only line. Newlines inside quotes do not count.
 */
export function headerRecordEnd(text: string): number {
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code === QUOTE) {
      quoted = !quoted;
    } else if (!quoted && (code === LF || code === CR)) {
      return i;
    }
  }
  return text.length;
}

/**
 * Replaces the header record with its normalized form. Everything after it,
 * line terminators and data quoting included, is kept byte for byte.
 */
export function rewriteHeader(text: string, normalize: HeaderNormalizer = normalizeHeader): string {
  const end = headerRecordEnd(text);
  const header = csvParseRows(text.slice(0, end))[0] ?? [];
  return csvFormatRow(header.map((column) => normalize(column))) + text.slice(end);
}

/**
 * Downloads one dataset's CSV, normalizes its header row and writes it to
 * `outputDir`. Download failures, undecodable bytes and empty payloads
 * resolve as skips; filesystem errors reject.
 */
export async function processEntry(entry: DatasetEntry, options: ProcessOptions): Promise<ProcessOutcome> {
  const log = logger.child({ dataset: entry.identifier, url: entry.downloadUrl });

  const filename = targetFilename(entry.downloadUrl);
  if (!filename) {
    log.warn('Download URL has no file name, skipping');
    return { status: 'skipped', reason: 'no-filename' };
  }

  log.info({ filename }, 'Downloading');

  let bytes: Uint8Array;
  try {
    ({ body: bytes } = await fetchBytes(entry.downloadUrl));
  } catch (err) {
    log.error({ err, filename }, 'Failed to download');
    return {
      status: 'skipped',
      reason: 'download-failed',
      error: err instanceof Error ? err : new Error(String(err)),
    };
  }

  let text: string;
  try {
    text = decodeUtf8(bytes);
  } catch (err) {
    log.error({ err, filename }, 'Download is not valid UTF-8, skipping');
    return {
      status: 'skipped',
      reason: 'decode-failed',
      error: err instanceof Error ? err : new Error(String(err)),
    };
  }

  const rows = csvParseRows(text).length;
  if (rows === 0) {
    log.warn({ filename }, 'Empty CSV, skipping');
    return { status: 'skipped', reason: 'empty' };
  }

  const savePath = path.join(options.outputDir, filename);

  await fs.mkdir(options.outputDir, { recursive: true });
  await fs.writeFile(savePath, rewriteHeader(text, options.normalize), 'utf-8');

  log.info({ path: savePath, rows }, 'Saved');
  return { status: 'saved', path: savePath, rows };
}
