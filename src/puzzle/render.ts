// Text rendering of states and solutions
import type { GearState, Move, SearchPath } from './types';
import { polarityFlag } from './state';
import { describeFacing } from './orientation';

export function formatMove(move: Move, index: number): string {
  if (move.isRotation) {
    return `Step ${index + 1}: Rotate`;
  }
  return `Step ${index + 1}: Move to side ${move.destination.side}`;
}

export function formatPath(path: SearchPath): string[] {
  return path.map((move, i) => formatMove(move, i));
}

export function formatState(label: string, state: GearState): string {
  const { side, axis } = state.position;
  return `${label} : side ${side} axis ${axis} tooth ${state.tooth} polarity ${polarityFlag(state.polarity)} (facing ${describeFacing(state)})`;
}
