// Command-line options for the solver
import { parseArgs } from 'node:util';
import { GearSolverError, createPosition, createState, parsePolarityFlag, type GearState } from '../puzzle';

export class CliUsageError extends GearSolverError {}

export interface CliOptions {
  help: boolean;
  origin: GearState;
  target: GearState;
  debug: boolean;
}

const OPTION_CONFIG = {
  initial_side: { type: 'string' },
  initial_axis: { type: 'string' },
  initial_tooth: { type: 'string' },
  initial_polarity: { type: 'string' },
  target_side: { type: 'string' },
  target_axis: { type: 'string' },
  target_tooth: { type: 'string' },
  target_polarity: { type: 'string' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' }
} as const;

// Default run: from the start of the puzzle to its goal
const DEFAULTS = {
  initial_side: '1',
  initial_axis: 'X',
  initial_tooth: '0',
  initial_polarity: 'T',
  target_side: '6',
  target_axis: 'X',
  target_tooth: '4',
  target_polarity: 'F'
};

export const USAGE = [
  'Usage: gear-solver [options]',
  '',
  '  --initial_side <1-6>      Initial side of the cube (default 1)',
  '  --initial_axis <X|Y|Z>    Initial axis of the gear (default X)',
  '  --initial_tooth <0-4>     Initial tooth inside the cube (default 0)',
  '  --initial_polarity <T|F>  T if the gear faces its axis, F otherwise (default T)',
  '  --target_side <1-6>       Target side of the cube (default 6)',
  '  --target_axis <X|Y|Z>     Target axis of the gear (default X)',
  '  --target_tooth <0-4>      Target tooth inside the cube (default 4)',
  '  --target_polarity <T|F>   Target polarity (default F)',
  '  --debug                   Log the search trace',
  '  -h, --help                Show this help'
].join('\n');

function parseInteger(name: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new CliUsageError(`--${name} must be an integer, got "${value}"`);
  }
  return Number(value);
}

function buildState(
  prefix: 'initial' | 'target',
  side: string,
  axis: string,
  tooth: string,
  polarity: string
): GearState {
  try {
    const position = createPosition(parseInteger(`${prefix}_side`, side), axis);
    return createState(position, parseInteger(`${prefix}_tooth`, tooth), parsePolarityFlag(polarity));
  } catch (err) {
    if (err instanceof CliUsageError) throw err;
    if (err instanceof GearSolverError) {
      throw new CliUsageError(`${prefix} state: ${err.message}`);
    }
    throw err;
  }
}

function defaultStates(): Pick<CliOptions, 'origin' | 'target'> {
  return {
    origin: buildState(
      'initial',
      DEFAULTS.initial_side,
      DEFAULTS.initial_axis,
      DEFAULTS.initial_tooth,
      DEFAULTS.initial_polarity
    ),
    target: buildState('target', DEFAULTS.target_side, DEFAULTS.target_axis, DEFAULTS.target_tooth, DEFAULTS.target_polarity)
  };
}

function readValues(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTION_CONFIG, allowPositionals: false, strict: true }).values;
  } catch (err) {
    // parseArgs reports unknown or malformed options as TypeError
    if (err instanceof TypeError) throw new CliUsageError(err.message);
    throw err;
  }
}

export function parseCliOptions(argv: string[]): CliOptions {
  const values = readValues(argv);

  // Help wins over any other flag, valid or not
  if (values.help === true) {
    return { help: true, debug: false, ...defaultStates() };
  }

  return {
    help: false,
    debug: values.debug === true,
    origin: buildState(
      'initial',
      values.initial_side ?? DEFAULTS.initial_side,
      values.initial_axis ?? DEFAULTS.initial_axis,
      values.initial_tooth ?? DEFAULTS.initial_tooth,
      values.initial_polarity ?? DEFAULTS.initial_polarity
    ),
    target: buildState(
      'target',
      values.target_side ?? DEFAULTS.target_side,
      values.target_axis ?? DEFAULTS.target_axis,
      values.target_tooth ?? DEFAULTS.target_tooth,
      values.target_polarity ?? DEFAULTS.target_polarity
    )
  };
}
