import { IndexRange } from './synthesis/run-context';

export interface CliOptions {
  scriptPath: string;
  range: IndexRange;
}

export const USAGE = 'Usage: dialogue-synth <script.md> [--start <index>] [--end <index>]';

export function parseArgs(argv: string[]): CliOptions {
  const get = (...keys: string[]) => {
    for (const key of keys) {
      const idx = argv.indexOf(key);
      if (idx >= 0 && idx < argv.length - 1) {
        return argv[idx + 1];
      }
    }
    return undefined;
  };

  const values = new Set([get('--start', '-s'), get('--end', '-e')]);
  const positional = argv.filter((arg) => !arg.startsWith('-') && !values.has(arg));
  const scriptPath = positional[0];
  if (!scriptPath) {
    throw new Error(USAGE);
  }

  const start = parseIndex('--start', get('--start', '-s'));
  const end = parseIndex('--end', get('--end', '-e'));
  if (start !== undefined && end !== undefined && start > end) {
    throw new Error(`--start (${start}) must not be greater than --end (${end})`);
  }
  return { scriptPath, range: { start, end } };
}

function parseIndex(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} must be a positive segment index, got "${raw}"`);
  }
  return value;
}
