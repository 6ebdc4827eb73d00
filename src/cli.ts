import { TIMEFRAMES, TickOutcome, Timeframe, isTimeframe } from './types/common';
import { ConfigurationError } from './utils/errors';

export type CommandName =
  | 'daemon'
  | 'run-once'
  | 'test-connection'
  | 'cleanup'
  | 'stats'
  | 'arbitrage'
  | 'top-movers'
  | 'runs'
  | 'export-json';

export interface CliOptions {
  command: CommandName;
  /** Overrides the configured timeframes when set */
  timeframes: Timeframe[] | null;
  dryRun: boolean;
  coin: string | null;
  file: string | null;
}

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  degraded: 2,
  configuration: 78,
} as const;

export const exitCodeFor = (outcome: TickOutcome): number => EXIT_CODES[outcome];

export const USAGE = `Usage: funding-rate-collector [command] [options]

Commands (default --daemon):
  --daemon               Collect every RUN_INTERVAL_MINUTES until stopped
  --run-once             Run one tick and exit
  --test-connection      Check the database connection
  --cleanup              Delete rows older than RETENTION_DAYS
  --stats [coin]         Funding statistics for a coin, or the largest coins
  --arbitrage            Current arbitrage opportunities
  --top-movers           Largest funding changes over the last day
  --runs                 Recent scrape runs
  --export-json <file>   Write the latest snapshot to a JSON file

Options:
  --timeframe <tf|all>   One of ${TIMEFRAMES.join(', ')}, or all
  --dry-run              Keep data in memory instead of the database`;

const COMMAND_FLAGS: Record<string, CommandName> = {
  '--daemon': 'daemon',
  '--run-once': 'run-once',
  '--test-connection': 'test-connection',
  '--cleanup': 'cleanup',
  '--stats': 'stats',
  '--arbitrage': 'arbitrage',
  '--top-movers': 'top-movers',
  '--runs': 'runs',
  '--export-json': 'export-json',
};

export const parseArgs = (args: readonly string[]): CliOptions => {
  const options: CliOptions = { command: 'daemon', timeframes: null, dryRun: false, coin: null, file: null };
  const issues: string[] = [];
  let commandFlag: string | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    const hasValue = next !== undefined && !next.startsWith('--');

    if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--timeframe') {
      if (!hasValue) {
        issues.push('--timeframe needs a value');
        continue;
      }
      i++;
      if (next === 'all') {
        options.timeframes = [...TIMEFRAMES];
      } else if (isTimeframe(next)) {
        options.timeframes = [next];
      } else {
        issues.push(`Unknown timeframe "${next}"`);
      }
    } else if (arg in COMMAND_FLAGS) {
      if (commandFlag !== null && commandFlag !== arg) {
        issues.push(`${arg} cannot be combined with ${commandFlag}`);
        continue;
      }
      commandFlag = arg;
      options.command = COMMAND_FLAGS[arg];

      if (options.command === 'stats' && hasValue) {
        options.coin = next.trim().toUpperCase();
        i++;
      } else if (options.command === 'export-json') {
        if (!hasValue) {
          issues.push('--export-json needs a file path');
          continue;
        }
        options.file = next;
        i++;
      }
    } else {
      issues.push(`Unknown argument "${arg}"`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return options;
};
