// Command-line entry: parse options, solve, print the steps
import { NoSolutionFoundError, InvalidPositionError, solve, formatPath, formatState } from '../puzzle';
import { CliUsageError, USAGE, parseCliOptions, type CliOptions } from './options';

export interface CliIO {
  log: (line: string) => void;
  error: (line: string) => void;
}

const consoleIO: CliIO = {
  log: line => console.log(line),
  error: line => console.error(line)
};

export const EXIT_OK = 0;
export const EXIT_NO_SOLUTION = 1;
export const EXIT_USAGE = 2;
export const EXIT_INVALID_POSITION = 3;

function readOptions(argv: string[], io: CliIO): CliOptions | null {
  try {
    return parseCliOptions(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      io.error(err.message);
      io.error(USAGE);
      return null;
    }
    throw err;
  }
}

// Returns the process exit code
export function run(argv: string[], io: CliIO = consoleIO): number {
  const options = readOptions(argv, io);
  if (!options) return EXIT_USAGE;

  if (options.help) {
    io.log(USAGE);
    return EXIT_OK;
  }

  io.log(formatState('Origin', options.origin));
  io.log(formatState('Target', options.target));

  try {
    const path = solve(options.origin, options.target, { debug: options.debug });
    for (const line of formatPath(path)) {
      io.log(line);
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof NoSolutionFoundError) {
      io.error(err.message);
      return EXIT_NO_SOLUTION;
    }
    if (err instanceof InvalidPositionError) {
      io.error(err.message);
      return EXIT_INVALID_POSITION;
    }
    throw err;
  }
}
