import { formatWeightedApprove } from './aggregate.js';
import { loadConfig, type CliConfig } from './config.js';
import { readPollCsv, writePollCsv } from './csvFile.js';
import { normalizePolls } from './normalize.js';

export const USAGE = 'Usage: normalize-polls <input.csv> <output.csv>';

export interface CliIO {
  log(line: string): void;
  error(line: string): void;
}

/**
 * Reads the poll export, writes the normalized CSV and prints the weighted
 * Approve line. Returns the process exit code: 2 for a bad argument count,
 * 1 when reading or writing fails.
 */
export function runCli(
  argv: readonly string[],
  io: CliIO = console,
  config: CliConfig = loadConfig()
): number {
  if (argv.length !== 2) {
    io.error(USAGE);
    return 2;
  }
  const [inPath, outPath] = argv;
  try {
    const { columns, rows, weightedApprove, summary } = normalizePolls(readPollCsv(inPath));
    writePollCsv(outPath, columns, rows);
    io.log(formatWeightedApprove(weightedApprove));
    if (config.verbose) {
      io.error(
        `Normalized ${summary.totalRows} rows (${summary.undatedRows} without a parseable date, ${summary.weightedRows} weighted) -> ${outPath}`
      );
    }
    return 0;
  } catch (e) {
    io.error(`normalize-polls: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }
}
