import fs from 'node:fs/promises';
import type { DatasetEntry, MetadataResult } from '../types/catalog.js';
import { fetchHttp } from '../workers/http-client.js';
import { logger } from '../utils/logger.js';
import { extractCatalogItems, toDatasetEntry } from './schema.js';

export interface CatalogSourceOptions {
  url: string;
  fallbackPath: string;
  timeoutMs: number;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function decodeEntries(payload: unknown, origin: string): DatasetEntry[] {
  const entries: DatasetEntry[] = [];
  for (const item of extractCatalogItems(payload)) {
    const decoded = toDatasetEntry(item);
    if (decoded.ok) {
      entries.push(decoded.entry);
    } else {
      logger.warn({ origin, dataset: decoded.label, reason: decoded.reason }, 'Dropping catalog entry');
    }
  }
  return entries;
}

async function fetchRemote(options: CatalogSourceOptions): Promise<DatasetEntry[]> {
  const { body } = await fetchHttp(options.url, {
    timeoutMs: options.timeoutMs,
    accept: 'application/json',
  });
  return decodeEntries(JSON.parse(body), options.url);
}

async function readFallback(fallbackPath: string): Promise<DatasetEntry[]> {
  const text = await fs.readFile(fallbackPath, 'utf-8');
  return decodeEntries(JSON.parse(text), fallbackPath);
}

/**
 * Loads the dataset catalog from the metadata endpoint, falling back to the
 * local snapshot when the endpoint fails. Never rejects.
 */
export async function loadCatalog(options: CatalogSourceOptions): Promise<MetadataResult> {
  logger.info({ url: options.url }, 'Fetching catalog metadata');

  let error: Error;
  try {
    const entries = await fetchRemote(options);
    logger.info({ count: entries.length }, 'Catalog metadata fetched');
    return { kind: 'fetched', entries };
  } catch (err) {
    error = toError(err);
    logger.warn({ err: error, url: options.url }, 'Failed to fetch catalog metadata, falling back to local file');
  }

  try {
    const entries = await readFallback(options.fallbackPath);
    logger.info({ count: entries.length, path: options.fallbackPath }, 'Loaded fallback catalog metadata');
    return { kind: 'fallback', entries, error };
  } catch (err) {
    const fallbackError = toError(err);
    logger.warn({ err: fallbackError, path: options.fallbackPath }, 'Failed to load fallback metadata');
    return { kind: 'unavailable', entries: [], error, fallbackError };
  }
}
