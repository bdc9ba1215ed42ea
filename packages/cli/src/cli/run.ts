import { runAllocation } from '../engine/allocation/index.js';
import { loadConfig } from '../lib/config.js';
import { handleCliError } from '../lib/error-handler.js';
import type { ErrorSink } from '../lib/error-handler.js';
import { ExportError } from '../lib/errors.js';
import { logger, setLogLevel } from '../lib/logger.js';
import { resolveDayLabels } from '../planning/days.js';
import { renderCsv } from '../report/csv.js';
import { renderJson } from '../report/json.js';
import { renderTable } from '../report/table.js';
import { allocateOptionsSchema } from '../schemas/allocate.schema.js';
import type { AllocateOptions } from '../schemas/allocate.schema.js';
import { USAGE, tokenize } from './args.js';
import type { RawArgs } from './args.js';

export interface CliIo extends ErrorSink {
  stdout(text: string): void;
  writeFile(path: string, contents: string): Promise<void>;
}

function toOptions(raw: RawArgs, env: NodeJS.ProcessEnv): AllocateOptions {
  const config = loadConfig(env);
  setLogLevel(config.logLevel);

  return allocateOptionsSchema.parse({
    hours: raw.lists.hours ?? [],
    days: raw.lists.days,
    percentages: raw.lists.percentages ?? config.percentages.map(String),
    algorithm: raw.values.algorithm ?? config.algorithm,
    resolution: raw.values.resolution ?? String(config.resolution),
    normalize: raw.flags.has('normalize'),
    sum: raw.flags.has('sum'),
    showActualPercent: raw.flags.has('showActualPercent'),
    showRemainder: raw.flags.has('showRemainder'),
    csv: raw.values.csv,
    json: raw.values.json,
  });
}

async function exportTo(
  format: 'CSV' | 'JSON',
  path: string,
  contents: string,
  io: CliIo
): Promise<void> {
  try {
    await io.writeFile(path, contents);
  } catch (err) {
    throw new ExportError(format, path, err);
  }
  logger.child({ module: 'cli' }).info({ path }, `${format} export written`);
}

/**
 * Run one invocation of the command. Returns the exit code rather than
 * exiting so the whole flow can be driven from tests.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const raw = tokenize(argv);
    if (raw.flags.has('help')) {
      io.stdout(USAGE);
      return 0;
    }

    const options = toOptions(raw, env);
    const days = resolveDayLabels(options.hours.length, options.days);
    const result = runAllocation({
      hours: options.hours,
      weights: options.percentages,
      resolution: options.resolution,
      normalize: options.normalize,
      algorithm: options.algorithm,
      days,
    });

    const display = {
      sum: options.sum,
      showActualPercent: options.showActualPercent,
      showRemainder: options.showRemainder,
    };
    io.stdout(`${renderTable(result, display)}\n`);

    if (options.csv) {
      await exportTo('CSV', options.csv, renderCsv(result, display), io);
    }
    if (options.json) {
      await exportTo('JSON', options.json, renderJson(result, options.normalize), io);
    }
    return 0;
  } catch (error) {
    return handleCliError(error, io);
  }
}
