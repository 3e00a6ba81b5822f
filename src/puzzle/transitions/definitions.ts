import type { Axis, Polarity, Side, ToothDelta } from '../types';

// Every legal move of the gear, per (side, axis) position.
//
// Side numbering: side 1 (two notches) on top, side 5 (arrow mark) on the right,
// 2 front, 3 left, 4 back, 6 bottom.
//
// A move is either a rotation in place (tooth delta 0) or a move to an adjacent
// side (tooth delta +-1). A polarity multiplier of -1 flips the gear.

export interface TransitionDefinition {
  to: [Side, Axis];
  toothDelta: ToothDelta;
  polarityMult: Polarity;
}

export interface PositionDefinition {
  from: [Side, Axis];
  transitions: TransitionDefinition[];
}

function move(side: Side, axis: Axis, toothDelta: ToothDelta, polarityMult: Polarity): TransitionDefinition {
  return { to: [side, axis], toothDelta, polarityMult };
}

export const GEAR_TRANSITIONS: PositionDefinition[] = [
  { from: [1, 'X'], transitions: [move(2, 'X', -1, 1), move(4, 'X', 1, 1), move(1, 'Y', 0, -1)] },
  { from: [1, 'Y'], transitions: [move(3, 'Y', 1, 1), move(1, 'X', 0, -1)] },
  { from: [2, 'X'], transitions: [move(1, 'X', 1, 1), move(2, 'Z', 0, -1)] },
  { from: [2, 'Z'], transitions: [move(5, 'Z', -1, 1), move(2, 'X', 0, -1)] },
  { from: [3, 'Y'], transitions: [move(1, 'Y', -1, 1), move(6, 'Y', 1, 1), move(3, 'Z', 0, 1)] },
  { from: [3, 'Z'], transitions: [move(4, 'Z', 1, 1), move(3, 'Y', 0, 1)] },
  { from: [4, 'Z'], transitions: [move(3, 'Z', -1, 1), move(5, 'Z', 1, 1), move(4, 'X', 0, 1)] },
  { from: [4, 'X'], transitions: [move(1, 'X', -1, 1), move(4, 'Z', 0, 1)] },
  { from: [5, 'Z'], transitions: [move(4, 'Z', -1, 1), move(2, 'Z', 1, 1), move(5, 'Y', 0, -1)] },
  { from: [5, 'Y'], transitions: [move(6, 'Y', -1, 1), move(5, 'Z', 0, -1)] },
  { from: [6, 'Y'], transitions: [move(5, 'Y', 1, 1), move(3, 'Y', -1, 1), move(6, 'X', 0, 1)] },
  // Goal position: only the rotation back out
  { from: [6, 'X'], transitions: [move(6, 'Y', 0, 1)] }
];
