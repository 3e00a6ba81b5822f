// Solver error types
import type { GearState, Position } from './types';
import { formatPosition } from './types';

export class GearSolverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Position with no entry in the transition table
export class InvalidPositionError extends GearSolverError {
  readonly position: Position;

  constructor(position: Position, detail = 'is an invalid position') {
    super(`${formatPosition(position)} ${detail}`);
    this.position = position;
  }
}

// The search exhausted every reachable state without meeting the target
export class NoSolutionFoundError extends GearSolverError {
  readonly origin: GearState;
  readonly target: GearState;

  constructor(origin: GearState, target: GearState) {
    super('No solution found, check the provided initial and target positions');
    this.origin = origin;
    this.target = target;
  }
}

export class SearchLimitExceededError extends GearSolverError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Search exceeded ${limit} iterations, the transition table is likely malformed`);
    this.limit = limit;
  }
}

// Raw field that cannot describe a gear state
export class InvalidStateError extends GearSolverError {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, expected: string) {
    super(`Invalid ${field} ${JSON.stringify(value)}: expected ${expected}`);
    this.field = field;
    this.value = value;
  }
}
