export interface DatasetEntry {
  /** Catalog identifier; only used to label log lines */
  identifier: string;
  title: string;
  themes: string[];
  /** Raw ISO-8601 `modified` value, parsed at selection time */
  modified: string;
  downloadUrl: string;
}

export type MetadataResult =
  | { kind: 'fetched'; entries: DatasetEntry[] }
  | { kind: 'fallback'; entries: DatasetEntry[]; error: Error }
  | { kind: 'unavailable'; entries: DatasetEntry[]; error: Error; fallbackError: Error };

export type MetadataSourceKind = MetadataResult['kind'];
