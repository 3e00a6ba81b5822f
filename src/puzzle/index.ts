// Gear Puzzle - Types, Transition Table, and Solver

// Re-export types
export type {
  Axis,
  Side,
  Tooth,
  Polarity,
  Position,
  GearState,
  Transition,
  TransitionLookup,
  Move,
  SearchPath,
  SolverOptions,
  SolverResult,
  SolveTrace,
  ReachabilityAnalysis
} from './types';
export { positionKey, stateKey, transitionKey, formatPosition } from './types';

export {
  GearSolverError,
  InvalidPositionError,
  NoSolutionFoundError,
  SearchLimitExceededError,
  InvalidStateError
} from './errors';

// State model
export {
  createPosition,
  createState,
  parseAxis,
  parsePolarityFlag,
  polarityFlag,
  positionsEqual,
  statesEqual,
  applyTransition,
  replayPath,
  isValidPath
} from './state';

// Transition table
export { TransitionTable, createTransitionTable, getTransitionTable, GEAR_TRANSITIONS } from './transitions';

// Solver API
export { search, solve, isSolvable } from './solver';

// Analysis
export { computeDistances, analyzeReachability } from './analysis';

// Presentation
export { axisVector, facingDirection, describeFacing } from './orientation';
export { formatMove, formatPath, formatState } from './render';
