import type { MetadataSourceKind } from './catalog.js';

export type SkipReason = 'no-filename' | 'download-failed' | 'decode-failed' | 'empty' | 'failed';

export type ProcessOutcome =
  | { status: 'saved'; path: string; rows: number }
  | { status: 'skipped'; reason: SkipReason; error?: Error };

export interface RunSummary {
  cutoff: Date;
  source: MetadataSourceKind;
  selected: number;
  saved: number;
  skipped: number;
  ledgerMessage: string;
}
