import type { Axis, GearState, Transition, TransitionLookup } from '../types';
import { positionKey } from '../types';
import { createPosition, createState } from '../state';

export function gear(side: number, axis: Axis, tooth: number, polarity: number): GearState {
  return createState(createPosition(side, axis), tooth, polarity);
}

// Find the table edge between two positions
export function edge(table: TransitionLookup, from: [number, Axis], to: [number, Axis]): Transition {
  const source = createPosition(from[0], from[1]);
  const targetKey = positionKey(createPosition(to[0], to[1]));
  const found = [...table.transitionsFrom(source)].find(t => positionKey(t.to) === targetKey);
  if (!found) {
    throw new Error(`no edge ${positionKey(source)} -> ${targetKey}`);
  }
  return found;
}
