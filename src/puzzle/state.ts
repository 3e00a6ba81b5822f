// Gear state construction and step arithmetic
import type {
  Axis,
  GearState,
  Move,
  Polarity,
  Position,
  SearchPath,
  Tooth,
  Transition,
  TransitionLookup
} from './types';
import { AXES, SIDES, TOOTH_COUNT, positionKey, stateKey, transitionKey } from './types';
import { InvalidPositionError, InvalidStateError } from './errors';

const TEETH: readonly Tooth[] = [0, 1, 2, 3, 4];

// ============= Construction =============

export function createPosition(side: number, axis: string): Position {
  const validSide = SIDES.find(s => s === side);
  if (validSide === undefined) {
    throw new InvalidStateError('side', side, 'an integer from 1 to 6');
  }
  return { side: validSide, axis: parseAxis(axis) };
}

export function createState(position: Position, tooth: number, polarity: number): GearState {
  const validTooth = TEETH.find(t => t === tooth);
  if (validTooth === undefined) {
    throw new InvalidStateError('tooth', tooth, 'an integer from 0 to 4');
  }
  const validPolarity: Polarity | undefined = polarity === 1 ? 1 : polarity === -1 ? -1 : undefined;
  if (validPolarity === undefined) {
    throw new InvalidStateError('polarity', polarity, '1 or -1');
  }
  return Object.freeze({
    position: Object.freeze({ side: position.side, axis: position.axis }),
    tooth: validTooth,
    polarity: validPolarity
  });
}

export function parseAxis(value: string): Axis {
  const axis = AXES.find(a => a === value.toUpperCase());
  if (axis === undefined) {
    throw new InvalidStateError('axis', value, 'one of X, Y, Z');
  }
  return axis;
}

// 'T' when the reference face points toward the axis, 'F' otherwise
export function parsePolarityFlag(flag: string): Polarity {
  switch (flag.toUpperCase()) {
    case 'T': return 1;
    case 'F': return -1;
    default:
      throw new InvalidStateError('polarity', flag, 'T or F');
  }
}

export function polarityFlag(polarity: Polarity): 'T' | 'F' {
  return polarity === 1 ? 'T' : 'F';
}

// ============= Comparison =============

export function positionsEqual(a: Position, b: Position): boolean {
  return positionKey(a) === positionKey(b);
}

export function statesEqual(a: GearState, b: GearState): boolean {
  return stateKey(a) === stateKey(b);
}

// ============= Stepping =============

function normalizeTooth(value: number): Tooth {
  return TEETH[((value % TOOTH_COUNT) + TOOTH_COUNT) % TOOTH_COUNT];
}

function multiplyPolarity(a: Polarity, b: Polarity): Polarity {
  return a === b ? 1 : -1;
}

/**
 * Apply one transition to a state.
 * The tooth delta is signed by the current polarity: which way the gear turns
 * depends on which face points along the axis.
 */
export function applyTransition(state: GearState, transition: Transition): GearState {
  if (!positionsEqual(state.position, transition.from)) {
    throw new InvalidPositionError(
      state.position,
      `is not the source of the transition from ${positionKey(transition.from)}`
    );
  }
  return createState(
    transition.to,
    normalizeTooth(state.tooth + transition.toothDelta * state.polarity),
    multiplyPolarity(state.polarity, transition.polarityMult)
  );
}

export function toMove(transition: Transition, state: GearState): Move {
  return {
    transition,
    destination: state.position,
    isRotation: transition.toothDelta === 0,
    state
  };
}

// Final state after applying every move of a path in order
export function replayPath(origin: GearState, path: SearchPath): GearState {
  let state = origin;
  for (const move of path) {
    state = applyTransition(state, move.transition);
  }
  return state;
}

/**
 * Check that a path is a legal move sequence from origin to target:
 * each transition belongs to the table, each recorded state matches the replay.
 */
export function isValidPath(
  origin: GearState,
  target: GearState,
  path: SearchPath,
  table: TransitionLookup
): boolean {
  let state = origin;
  for (const move of path) {
    if (!table.has(state.position)) return false;
    const key = transitionKey(move.transition);
    const legal = [...table.transitionsFrom(state.position)].some(t => transitionKey(t) === key);
    if (!legal) return false;

    state = applyTransition(state, move.transition);
    if (!statesEqual(state, move.state)) return false;
    if (!positionsEqual(state.position, move.destination)) return false;
    if (move.isRotation !== (move.transition.toothDelta === 0)) return false;
  }
  return statesEqual(state, target);
}
