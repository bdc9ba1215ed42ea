import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runCli } from '../cli/run.js';
import type { CliIo } from '../cli/run.js';
import { USAGE } from '../cli/args.js';
import { resetConfigCache } from '../lib/config.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

interface CapturedIo extends CliIo {
  out: string[];
  err: string[];
  files: Map<string, string>;
}

function createIo(options: { failWrites?: string } = {}): CapturedIo {
  const out: string[] = [];
  const err: string[] = [];
  const files = new Map<string, string>();
  return {
    out,
    err,
    files,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
    writeFile: async (path, contents) => {
      if (options.failWrites) {
        throw new Error(options.failWrites);
      }
      files.set(path, contents);
    },
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('runCli', () => {
  beforeEach(() => {
    resetConfigCache();
  });

  afterEach(() => {
    resetConfigCache();
  });

  describe('allocation table', () => {
    it('prints the table for the given hours and percentages', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '2', '7.5', '--percent', '0.6', '0.4'], io, {});

      expect(code).toBe(0);
      expect(io.err).toEqual([]);
      expect(io.out.join('')).toBe(
        [
          'Day        Input  60 %  40 %',
          '----------------------------',
          'monday       2.0   1.0   1.0',
          'tuesday      7.5   4.5   3.0',
          '',
        ].join('\n')
      );
    });

    it('uses explicit day names', async () => {
      const io = createIo();
      await runCli(['--days', 'thu', 'fri', '--hours', '2', '7.5', '-p', '0.6', '0.4'], io, {});

      const lines = io.out.join('').split('\n');
      expect(lines[2]?.startsWith('thursday ')).toBe(true);
      expect(lines[3]?.startsWith('friday ')).toBe(true);
    });

    it('falls back to percentages from the environment', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '4'], io, { HOUR_SPLIT_PERCENT: '0.5,0.5' });

      expect(code).toBe(0);
      expect(io.out.join('').split('\n')[2]).toBe('monday      4.0   2.0   2.0');
    });

    it('shows the unallocated hours with --show-remainder', async () => {
      const io = createIo();
      const code = await runCli(
        ['--hours', '1', '-p', '0.4', '0.3', '0.3', '-r', '1', '--show-remainder'],
        io,
        {}
      );

      expect(code).toBe(0);
      expect(io.out.join('')).toBe(
        [
          'Day          Input  40 %  30 %  30 %',
          '------------------------------------',
          'monday           1     0     0     0',
          'Remainder        1                  ',
          '',
        ].join('\n')
      );
    });
  });

  describe('exports', () => {
    it('writes a CSV file with normalized percentages', async () => {
      const io = createIo();
      const code = await runCli(
        ['--hours', '9', '--percent', '0.5', '0.3', '0.1', '--normalize', '--csv', 'out.csv'],
        io,
        {}
      );

      expect(code).toBe(0);
      expect(io.files.get('out.csv')).toBe('Day,Total,55 %,33 %,11 %\nmonday,9.00,5.00,3.00,1.00\n');
    });

    it('writes a JSON file describing the allocation', async () => {
      const io = createIo();
      const code = await runCli(
        ['--hours', '8', '8', '-p', '0.5', '0.5', '-a', 'sequential', '--json', 'out.json'],
        io,
        {}
      );

      expect(code).toBe(0);
      const payload: unknown = JSON.parse(io.files.get('out.json') ?? 'null');
      expect(payload).toMatchObject({
        days: ['monday', 'tuesday'],
        algorithm: 'sequential',
        normalized: false,
        allocations: {
          monday: { total: 8, categories: [8, 0] },
          tuesday: { total: 8, categories: [0, 8] },
        },
        targets: [8, 8],
      });
    });

    it('exits 1 when an export cannot be written', async () => {
      const io = createIo({ failWrites: 'disk full' });
      const code = await runCli(['--hours', '8', '--csv', 'out.csv'], io, {});

      expect(code).toBe(1);
      expect(io.out).toHaveLength(1);
      expect(io.err).toEqual(["error: CSV export to 'out.csv' failed: disk full\n"]);
    });
  });

  describe('validation failures', () => {
    it('exits 2 when percentages do not sum to 1.0', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '8', '--percent', '0.5', '0.3'], io, {});

      expect(code).toBe(2);
      expect(io.out).toEqual([]);
      expect(io.err).toEqual([
        'error: Percentages must sum to 1.0 (got 0.8); use --normalize to rescale them\n',
      ]);
    });

    it('exits 2 when hours are missing', async () => {
      const io = createIo();
      const code = await runCli(['--sum'], io, {});

      expect(code).toBe(2);
      expect(io.err).toEqual(['error: invalid options\n  - hours: at least one daily total is required\n']);
    });

    it('exits 2 for a negative daily total', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '-1'], io, {});

      expect(code).toBe(2);
      expect(io.err).toEqual(['error: Daily total #1 must be a non-negative number (got -1)\n']);
    });

    it('exits 2 for a resolution that does not divide an hour', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '8', '-r', '0.3'], io, {});

      expect(code).toBe(2);
      expect(io.err).toEqual(['error: Resolution must evenly divide 1.0 (e.g. 1, 0.5, 0.25, 0.2)\n']);
    });

    it('exits 2 for an unknown algorithm', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '8', '-a', 'fastest'], io, {});

      expect(code).toBe(2);
      expect(io.err.join('')).toMatch(/^error: invalid options\n {2}- algorithm: /);
    });

    it('exits 2 for a non-numeric hour value', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '8', 'eight'], io, {});

      expect(code).toBe(2);
      expect(io.err.join('')).toMatch(/^error: invalid options\n {2}- hours\.1: /);
    });

    it('exits 2 for empty or hexadecimal hour values', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '', '0x8', '-p', '0.5', '0.5'], io, {});

      expect(code).toBe(2);
      expect(io.out).toEqual([]);
      expect(io.err).toEqual([
        'error: invalid options\n  - hours.0: must be a decimal number\n  - hours.1: must be a decimal number\n',
      ]);
    });

    it('exits 2 for a non-numeric resolution', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '8', '-r', 'Infinity'], io, {});

      expect(code).toBe(2);
      expect(io.err).toEqual(['error: invalid options\n  - resolution: must be a decimal number\n']);
    });

    it('exits 2 for a day list that does not match the hours', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '1', '2', '--days', 'mon'], io, {});

      expect(code).toBe(2);
      expect(io.err).toEqual(['error: Number of days (1) must match number of hours (2)\n']);
    });

    it('exits 2 for an unknown option', async () => {
      const io = createIo();
      const code = await runCli(['--hours', '8', '--fill-remainder'], io, {});

      expect(code).toBe(2);
      expect(io.err).toEqual(['error: Unknown option: --fill-remainder\n']);
    });
  });

  it('prints usage for --help', async () => {
    const io = createIo();
    const code = await runCli(['--help'], io, {});

    expect(code).toBe(0);
    expect(io.out).toEqual([USAGE]);
  });
});
