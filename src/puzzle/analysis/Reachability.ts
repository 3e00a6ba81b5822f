// Reachability of the gear state graph from a given origin

import type { GearState, ReachabilityAnalysis, StateKey, TransitionLookup } from '../types';
import { stateKey } from '../types';
import { applyTransition } from '../state';
import { getTransitionTable } from '../transitions';

// Move count to every state reachable from origin (origin itself at 0)
export function computeDistances(
  origin: GearState,
  table: TransitionLookup = getTransitionTable()
): Map<StateKey, number> {
  // Throws on unknown origin
  table.transitionsFrom(origin.position);

  const distances = new Map<StateKey, number>([[stateKey(origin), 0]]);
  const queue: GearState[] = [origin];

  for (let head = 0; head < queue.length; head++) {
    const state = queue[head];
    const distance = distances.get(stateKey(state)) ?? 0;

    for (const transition of table.transitionsFrom(state.position)) {
      const next = applyTransition(state, transition);
      const key = stateKey(next);
      if (distances.has(key)) continue;
      distances.set(key, distance + 1);
      queue.push(next);
    }
  }

  return distances;
}

export function analyzeReachability(
  origin: GearState,
  table: TransitionLookup = getTransitionTable()
): ReachabilityAnalysis {
  const distances = computeDistances(origin, table);
  let maxDistance = 0;
  for (const d of distances.values()) {
    maxDistance = Math.max(maxDistance, d);
  }
  return {
    reachableStates: distances.size,
    maxDistance
  };
}
