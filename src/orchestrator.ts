import type { RefreshConfig } from './config.js';
import type { DatasetEntry } from './types/catalog.js';
import type { ProcessOutcome, RunSummary } from './types/run.js';
import { loadCatalog } from './catalog/metadata-source.js';
import { RunLedger } from './ledger/run-ledger.js';
import { selectChanged } from './pipeline/selector.js';
import { processEntry } from './pipeline/processor.js';
import type { HeaderNormalizer } from './pipeline/header-normalizer.js';
import { runBounded } from './workers/pool.js';
import { EPOCH_FLOOR } from './utils/date.js';
import { logger } from './utils/logger.js';

export interface RunOptions {
  forceRefresh: boolean;
  /** Overrides the ledger built from `config.ledgerPath` */
  ledger?: RunLedger;
  normalize?: HeaderNormalizer;
}

export const NOTHING_TO_UPDATE = 'Nothing to update';

export function downloadedMessage(count: number): string {
  return `Downloaded ${count} file(s)`;
}

async function processIsolated(
  entry: DatasetEntry,
  config: RefreshConfig,
  normalize: HeaderNormalizer | undefined,
): Promise<ProcessOutcome> {
  try {
    return await processEntry(entry, { outputDir: config.outputDir, normalize });
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error({ err: error, dataset: entry.identifier }, 'Failed to process dataset');
    return { status: 'skipped', reason: 'failed', error };
  }
}

/**
 * One refresh run: cutoff from the ledger (or the epoch floor when forced),
 * catalog load, theme/cutoff selection, bounded download of the selection,
 * and a ledger append once every download has settled.
 */
export async function runRefresh(config: RefreshConfig, options: RunOptions): Promise<RunSummary> {
  const ledger = options.ledger ?? new RunLedger({ path: config.ledgerPath });

  logger.info({ forceRefresh: options.forceRefresh }, 'Begin processing');

  const cutoff = options.forceRefresh ? EPOCH_FLOOR : await ledger.lastRunTime();

  const catalog = await loadCatalog({
    url: config.metadataUrl,
    fallbackPath: config.fallbackPath,
    timeoutMs: config.metadataTimeoutMs,
  });

  const selected = selectChanged(catalog.entries, config.theme, cutoff);

  if (selected.length === 0) {
    logger.info({ theme: config.theme }, 'No new or updated datasets found');
    logger.info('To force a data refresh, pass --force-refresh');
    await ledger.append(NOTHING_TO_UPDATE);
    logger.info('Complete processing');
    return {
      cutoff,
      source: catalog.kind,
      selected: 0,
      saved: 0,
      skipped: 0,
      ledgerMessage: NOTHING_TO_UPDATE,
    };
  }

  logger.info({ theme: config.theme, count: selected.length }, 'Found datasets to process');

  const outcomes = await runBounded(selected, config.workerCount, (entry) =>
    processIsolated(entry, config, options.normalize),
  );

  const saved = outcomes.filter((outcome) => outcome.status === 'saved').length;
  const ledgerMessage = downloadedMessage(selected.length);
  await ledger.append(ledgerMessage);

  logger.info({ attempted: selected.length, saved, skipped: selected.length - saved }, 'Complete processing');

  return {
    cutoff,
    source: catalog.kind,
    selected: selected.length,
    saved,
    skipped: selected.length - saved,
    ledgerMessage,
  };
}
