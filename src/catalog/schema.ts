import { z } from 'zod';
import type { DatasetEntry } from '../types/catalog.js';

const distributionSchema = z
  .object({
    downloadURL: z.string().optional(),
  })
  .passthrough();

// Only a malformed theme or distribution loses the entry
const rawCatalogEntrySchema = z
  .object({
    identifier: z.string().optional().catch(undefined),
    title: z.string().optional().catch(undefined),
    theme: z.array(z.string()).optional(),
    modified: z.string().optional().catch(undefined),
    distribution: z.array(distributionSchema).optional(),
  })
  .passthrough();

const catalogListSchema = z.array(z.unknown());
const catalogEnvelopeSchema = z.object({ dataset: catalogListSchema }).passthrough();

export class CatalogFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogFormatError';
  }
}

/**
 * Accepts either a bare list of entries or `{ dataset: [...] }`.
 * Items inside the list are returned undecoded; see {@link toDatasetEntry}.
 */
export function extractCatalogItems(payload: unknown): unknown[] {
  const bare = catalogListSchema.safeParse(payload);
  if (bare.success) return bare.data;

  const envelope = catalogEnvelopeSchema.safeParse(payload);
  if (envelope.success) return envelope.data.dataset;

  throw new CatalogFormatError('Unexpected metadata format: expected a list or an object with a "dataset" list');
}

export type EntryDecodeResult =
  | { ok: true; entry: DatasetEntry }
  | { ok: false; reason: string; label: string };

export function toDatasetEntry(item: unknown): EntryDecodeResult {
  const parsed = rawCatalogEntrySchema.safeParse(item);
  if (!parsed.success) {
    return { ok: false, reason: 'not a catalog entry object', label: 'unknown' };
  }

  const raw = parsed.data;
  const downloadUrl = raw.distribution?.[0]?.downloadURL;
  const label = raw.identifier ?? raw.title ?? 'unknown';

  if (!downloadUrl) {
    return { ok: false, reason: 'missing distribution[0].downloadURL', label };
  }
  return {
    ok: true,
    entry: {
      identifier: raw.identifier ?? raw.title ?? downloadUrl,
      title: raw.title ?? '',
      themes: raw.theme ?? [],
      modified: raw.modified ?? '',
      downloadUrl,
    },
  };
}
