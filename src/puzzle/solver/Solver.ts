// Breadth-first search for the shortest move sequence between two gear states

import type { GearState, Move, SearchPath, SolverOptions, SolverResult, SolveTrace, StateKey } from '../types';
import { formatPosition, stateKey } from '../types';
import { InvalidPositionError, NoSolutionFoundError, SearchLimitExceededError } from '../errors';
import { applyTransition, statesEqual, toMove } from '../state';
import { getTransitionTable } from '../transitions';

// 12 positions x 5 teeth x 2 polarities bounds a well-formed table
const DEFAULT_MAX_ITERATIONS = 10000;

interface QueueEntry {
  state: GearState;
  path: Move[];
}

// Search for the shortest path, with a trace of the work done
export function search(origin: GearState, target: GearState, options: SolverOptions = {}): SolverResult {
  const table = options.table ?? getTransitionTable();
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;

  const trace: SolveTrace = {
    statesExplored: 0,
    statesVisited: 1,
    maxDepth: 0
  };

  if (!table.has(origin.position)) {
    throw new InvalidPositionError(origin.position, 'is an invalid initial position');
  }

  if (statesEqual(origin, target)) {
    return finish({ path: [], trace }, options);
  }

  const queue: QueueEntry[] = [{ state: origin, path: [] }];
  let head = 0;
  // Marked on enqueue so a state is never queued twice
  const visited = new Set<StateKey>([stateKey(origin)]);

  while (head < queue.length) {
    if (trace.statesExplored >= maxIterations) {
      throw new SearchLimitExceededError(maxIterations);
    }

    const { state, path } = queue[head++];
    trace.statesExplored++;

    if (!table.has(state.position)) {
      throw new InvalidPositionError(state.position, 'was reached during the search but has no transitions');
    }

    for (const transition of table.transitionsFrom(state.position)) {
      const next = applyTransition(state, transition);
      const key = stateKey(next);
      if (visited.has(key)) continue;

      visited.add(key);
      trace.statesVisited++;

      const nextPath = [...path, toMove(transition, next)];
      trace.maxDepth = Math.max(trace.maxDepth, nextPath.length);

      if (statesEqual(next, target)) {
        return finish({ path: nextPath, trace }, options);
      }
      queue.push({ state: next, path: nextPath });
    }
  }

  if (options.debug) {
    console.log(`search exhausted ${trace.statesVisited} states without reaching the target`, trace);
  }
  throw new NoSolutionFoundError(origin, target);
}

function finish(result: SolverResult, options: SolverOptions): SolverResult {
  if (options.debug) {
    const last = result.path[result.path.length - 1];
    const end = last ? formatPosition(last.destination) : 'origin';
    console.log(`search found ${result.path.length} moves ending at ${end}`, result.trace);
  }
  return result;
}

/**
 * Shortest move sequence from origin to target.
 * Among equal-length sequences, the first found in table order wins.
 */
export function solve(origin: GearState, target: GearState, options: SolverOptions = {}): SearchPath {
  return search(origin, target, options).path;
}

// Check whether target can be reached at all
export function isSolvable(origin: GearState, target: GearState, options: SolverOptions = {}): boolean {
  try {
    search(origin, target, options);
    return true;
  } catch (err) {
    if (err instanceof NoSolutionFoundError) return false;
    throw err;
  }
}
