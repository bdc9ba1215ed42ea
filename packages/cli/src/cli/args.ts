import { ValidationError } from '../lib/errors.js';
import { DECIMAL_PATTERN } from '../schemas/number.schema.js';

type FlagKind = 'list' | 'value' | 'boolean';

type OptionKey =
  | 'hours'
  | 'days'
  | 'percentages'
  | 'algorithm'
  | 'resolution'
  | 'normalize'
  | 'sum'
  | 'showActualPercent'
  | 'showRemainder'
  | 'csv'
  | 'json'
  | 'help';

interface FlagSpec {
  key: OptionKey;
  kind: FlagKind;
}

const FLAGS: Record<string, FlagSpec> = {
  '--hours': { key: 'hours', kind: 'list' },
  '-hr': { key: 'hours', kind: 'list' },
  '--days': { key: 'days', kind: 'list' },
  '-d': { key: 'days', kind: 'list' },
  '--percent': { key: 'percentages', kind: 'list' },
  '-p': { key: 'percentages', kind: 'list' },
  '--algorithm': { key: 'algorithm', kind: 'value' },
  '-a': { key: 'algorithm', kind: 'value' },
  '--resolution': { key: 'resolution', kind: 'value' },
  '-r': { key: 'resolution', kind: 'value' },
  '--normalize': { key: 'normalize', kind: 'boolean' },
  '--sum': { key: 'sum', kind: 'boolean' },
  '-s': { key: 'sum', kind: 'boolean' },
  '--show-actual-percent': { key: 'showActualPercent', kind: 'boolean' },
  '--show-remainder': { key: 'showRemainder', kind: 'boolean' },
  '--csv': { key: 'csv', kind: 'value' },
  '--json': { key: 'json', kind: 'value' },
  '--help': { key: 'help', kind: 'boolean' },
  '-h': { key: 'help', kind: 'boolean' },
};

/** Flags exactly as typed; values are still strings. */
export interface RawArgs {
  lists: Partial<Record<OptionKey, string[]>>;
  values: Partial<Record<OptionKey, string>>;
  flags: Set<OptionKey>;
}

function isFlagToken(token: string): boolean {
  return token.startsWith('-') && !DECIMAL_PATTERN.test(token);
}

/**
 * Split argv into flags and their values. List flags take every following
 * token up to the next flag; negative numbers count as values, not flags.
 */
export function tokenize(argv: readonly string[]): RawArgs {
  const raw: RawArgs = { lists: {}, values: {}, flags: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (!isFlagToken(arg)) {
      throw new ValidationError(`Unexpected argument: ${arg}`, { argument: arg });
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    const spec = FLAGS[name];
    if (!spec) {
      throw new ValidationError(`Unknown option: ${name}`, { option: name });
    }

    if (spec.kind === 'boolean') {
      if (inline !== undefined) {
        throw new ValidationError(`Option ${name} does not take a value`, { option: name });
      }
      raw.flags.add(spec.key);
      continue;
    }

    if (spec.kind === 'value') {
      const value = inline ?? argv[i + 1];
      if (value === undefined || (inline === undefined && isFlagToken(value))) {
        throw new ValidationError(`Missing value for ${name}`, { option: name });
      }
      if (inline === undefined) i++;
      raw.values[spec.key] = value;
      continue;
    }

    const list = raw.lists[spec.key] ?? [];
    if (inline !== undefined) list.push(inline);
    while (i + 1 < argv.length && !isFlagToken(argv[i + 1] ?? '')) {
      list.push(argv[i + 1] ?? '');
      i++;
    }
    if (list.length === 0) {
      throw new ValidationError(`Missing value for ${name}`, { option: name });
    }
    raw.lists[spec.key] = list;
  }

  return raw;
}

export const USAGE = `hour-split

Allocate daily working hours across weighted categories.

Usage:
  hour-split --hours 0 2 7.5 7.5 7.5 --percent 0.6 0.4 --sum

Options:
  --hours, -hr <n...>          Total hours per day (required)
  --days, -d <name...>         Day names matching the hours (mon, tue, ... or full names)
  --percent, -p <w...>         Category weights summing to 1.0 (default 0.75 0.25)
  --algorithm, -a <name>       proportional | optimal | sequential (default proportional)
  --resolution, -r <n>         Rounding grid in hours, must divide 1.0 (default 0.5)
  --normalize                  Rescale weights so they sum to 1.0
  --sum, -s                    Show Sum column plus Sum and Delta rows
  --show-actual-percent        Show achieved percentage per category (with --sum)
  --show-remainder             Show input hours left unallocated by rounding
  --csv <path>                 Export the table to CSV
  --json <path>                Export structured allocation data to JSON
  --help, -h                   Show this help
`;
