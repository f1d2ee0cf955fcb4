export interface CliOptions {
  forceRefresh: boolean;
  history: boolean;
  help: boolean;
}

export type CliParseResult = { ok: true; options: CliOptions } | { ok: false; error: string };

export const USAGE = `Usage: dataset-refresh [--force-refresh] [--history] [--help]

Downloads catalog datasets for the configured theme that changed since the last run.

  --force-refresh  download every dataset of the theme, ignoring the run ledger
  --history        print the run ledger and exit
  --help           show this message`;

export function parseCliArgs(argv: readonly string[]): CliParseResult {
  const options: CliOptions = { forceRefresh: false, history: false, help: false };

  for (const arg of argv) {
    if (arg === '--force-refresh') {
      options.forceRefresh = true;
      continue;
    }
    if (arg === '--history') {
      options.history = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  return { ok: true, options };
}
