import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RunLedger, describeInvocation } from '../../src/ledger/run-ledger.js';
import { EPOCH_FLOOR } from '../../src/utils/date.js';
import { makeTempDir } from '../helpers/fixture-loader.js';

function clock(...instants: string[]): () => Date {
  let index = 0;
  return () => new Date(instants[Math.min(index++, instants.length - 1)] ?? 0);
}

describe('RunLedger', () => {
  let dir: string;
  let ledgerPath: string;

  beforeEach(() => {
    dir = makeTempDir();
    ledgerPath = path.join(dir, 'run_log.txt');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('lastRunTime', () => {
    it('should fall back to the epoch floor when the file is missing', async () => {
      const ledger = new RunLedger({ path: ledgerPath });
      expect(await ledger.lastRunTime()).toBe(EPOCH_FLOOR);
    });

    it('should fall back to the epoch floor when the file has only blank lines', async () => {
      fs.writeFileSync(ledgerPath, '\n   \n\n');
      const ledger = new RunLedger({ path: ledgerPath });
      expect(await ledger.lastRunTime()).toBe(EPOCH_FLOOR);
    });

    it('should read the timestamp of the last line', async () => {
      fs.writeFileSync(
        ledgerPath,
        [
          '2025-01-10T08:00:00.000Z | Downloaded 4 file(s) | node src/index.ts --force-refresh',
          '2025-03-01T00:00:00+00:00 | Nothing to update | node src/index.ts',
          '',
        ].join('\n'),
      );
      const ledger = new RunLedger({ path: ledgerPath });
      expect((await ledger.lastRunTime()).toISOString()).toBe('2025-03-01T00:00:00.000Z');
    });

    it('should not look past a corrupt last line', async () => {
      fs.writeFileSync(
        ledgerPath,
        '2025-01-10T08:00:00.000Z | Downloaded 4 file(s) | node src/index.ts\ngarbage without delimiter\n',
      );
      const ledger = new RunLedger({ path: ledgerPath });
      expect(await ledger.lastRunTime()).toBe(EPOCH_FLOOR);
    });
  });

  describe('append', () => {
    it('should write one delimited line', async () => {
      const ledger = new RunLedger({
        path: ledgerPath,
        invocation: 'node src/index.ts --force-refresh',
        now: clock('2025-06-23T03:19:12.400Z'),
      });

      await ledger.append('Downloaded 3 file(s)');

      expect(fs.readFileSync(ledgerPath, 'utf-8')).toBe(
        '2025-06-23T03:19:12.400Z | Downloaded 3 file(s) | node src/index.ts --force-refresh\n',
      );
    });

    it('should keep existing lines and create missing directories', async () => {
      const nested = path.join(dir, 'state', 'run_log.txt');
      fs.mkdirSync(path.dirname(nested));
      fs.writeFileSync(nested, 'first line\n');

      const ledger = new RunLedger({ path: nested, invocation: 'node cli', now: clock('2025-07-01T00:00:00.000Z') });
      await ledger.append('Nothing to update');

      expect(fs.readFileSync(nested, 'utf-8')).toBe(
        'first line\n2025-07-01T00:00:00.000Z | Nothing to update | node cli\n',
      );

      const fresh = new RunLedger({
        path: path.join(dir, 'a', 'b', 'run_log.txt'),
        invocation: 'node cli',
        now: clock('2025-07-02T00:00:00.000Z'),
      });
      await fresh.append('Nothing to update');
      expect(fs.existsSync(path.join(dir, 'a', 'b', 'run_log.txt'))).toBe(true);
    });

    it('should grow by one entry per run with non-decreasing timestamps', async () => {
      const ledger = new RunLedger({
        path: ledgerPath,
        invocation: 'node cli',
        now: clock(
          '2025-07-01T00:00:00.000Z',
          '2025-07-01T00:00:00.000Z',
          '2025-07-02T06:00:00.000Z',
          '2025-07-03T06:00:00.000Z',
        ),
      });

      for (let run = 0; run < 4; run++) {
        await ledger.append(run % 2 === 0 ? 'Downloaded 2 file(s)' : 'Nothing to update');
      }

      const records = await ledger.readRecords();
      expect(records).toHaveLength(4);
      for (let i = 1; i < records.length; i++) {
        expect(records[i]!.timestamp.getTime()).toBeGreaterThanOrEqual(records[i - 1]!.timestamp.getTime());
      }
      expect(records[3]).toEqual({
        timestamp: new Date('2025-07-03T06:00:00.000Z'),
        message: 'Nothing to update',
        invocation: 'node cli',
      });
      expect((await ledger.lastRunTime()).toISOString()).toBe('2025-07-03T06:00:00.000Z');
    });

    it('should reject when the ledger cannot be written', async () => {
      const ledger = new RunLedger({ path: dir, invocation: 'node cli' });
      await expect(ledger.append('Nothing to update')).rejects.toThrow();
    });
  });

  describe('readRecords', () => {
    it('should return an empty list for a missing ledger', async () => {
      expect(await new RunLedger({ path: ledgerPath }).readRecords()).toEqual([]);
    });

    it('should skip lines without a valid timestamp', async () => {
      fs.writeFileSync(
        ledgerPath,
        'not a record\n2025-02-02T00:00:00.000Z | Downloaded 1 file(s) | node cli | extra\n',
      );
      const records = await new RunLedger({ path: ledgerPath }).readRecords();
      expect(records).toEqual([
        {
          timestamp: new Date('2025-02-02T00:00:00.000Z'),
          message: 'Downloaded 1 file(s)',
          invocation: 'node cli | extra',
        },
      ]);
    });
  });
});

describe('describeInvocation', () => {
  it('should rebuild the command line relative to the working directory', () => {
    const script = path.join(process.cwd(), 'src', 'index.ts');
    expect(describeInvocation(['/usr/local/bin/node', script, '--force-refresh'])).toBe(
      'node src/index.ts --force-refresh',
    );
  });

  it('should fall back to node when argv is empty', () => {
    expect(describeInvocation([])).toBe('node');
  });
});
