import { z } from 'zod';

export const DEFAULT_METADATA_URL =
  'https://data.cms.gov/provider-data/api/1/metastore/schemas/dataset/items';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  METADATA_URL: z.string().url().default(DEFAULT_METADATA_URL),
  METADATA_FALLBACK_FILE: z.string().default('./CMS_BU_DATA.json'),
  METADATA_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  OUTPUT_DIR: z.string().default('./hospital_download_data'),
  RUN_LEDGER_FILE: z.string().default('./run_log.txt'),
  DATASET_THEME: z.string().min(1).default('Hospitals'),
  WORKER_COUNT: z.coerce.number().int().positive().default(5),
});

export type Config = z.infer<typeof envSchema>;

/** Everything a refresh run needs; built from the environment or directly in tests. */
export interface RefreshConfig {
  metadataUrl: string;
  fallbackPath: string;
  metadataTimeoutMs: number;
  outputDir: string;
  ledgerPath: string;
  theme: string;
  workerCount: number;
}

export function parseEnv(env: NodeJS.ProcessEnv): Config {
  return envSchema.parse(env);
}

export function loadRefreshConfig(env: Config): RefreshConfig {
  return {
    metadataUrl: env.METADATA_URL,
    fallbackPath: env.METADATA_FALLBACK_FILE,
    metadataTimeoutMs: env.METADATA_TIMEOUT_MS,
    outputDir: env.OUTPUT_DIR,
    ledgerPath: env.RUN_LEDGER_FILE,
    theme: env.DATASET_THEME,
    workerCount: env.WORKER_COUNT,
  };
}

export const config = parseEnv(process.env);
