#!/usr/bin/env node
import { USAGE, parseCliArgs } from './cli.js';
import { config, loadRefreshConfig } from './config.js';
import { RunLedger } from './ledger/run-ledger.js';
import { runRefresh } from './orchestrator.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const { options } = parsed;
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const refreshConfig = loadRefreshConfig(config);
  const ledger = new RunLedger({ path: refreshConfig.ledgerPath });

  if (options.history) {
    const records = await ledger.readRecords();
    for (const record of records) {
      console.log(`${record.timestamp.toISOString()}  ${record.message}  (${record.invocation})`);
    }
    console.log(`${records.length} run(s) recorded in ${ledger.path}`);
    return;
  }

  const summary = await runRefresh(refreshConfig, { forceRefresh: options.forceRefresh, ledger });
  logger.info(summary, 'Run summary');
}

main().catch((err) => {
  logger.fatal(err, 'Refresh failed');
  process.exitCode = 1;
});
