import type { DatasetEntry } from '../types/catalog.js';
import { parseIsoTimestamp } from '../utils/date.js';
import { logger } from '../utils/logger.js';

/**
 * Entries tagged with `theme` whose `modified` is strictly after `cutoff`.
 * An entry with an unparsable `modified` is left out; the rest still select.
 */
export function selectChanged(
  entries: readonly DatasetEntry[],
  theme: string,
  cutoff: Date,
): DatasetEntry[] {
  const cutoffMs = cutoff.getTime();
  const selected: DatasetEntry[] = [];

  for (const entry of entries) {
    if (!entry.themes.includes(theme)) continue;

    const modifiedAt = parseIsoTimestamp(entry.modified);
    if (!modifiedAt) {
      logger.warn(
        { dataset: entry.identifier, modified: entry.modified },
        'Unparsable modified timestamp, skipping dataset',
      );
      continue;
    }

    if (modifiedAt.getTime() > cutoffMs) selected.push(entry);
  }

  return selected;
}
