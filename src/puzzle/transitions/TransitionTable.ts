// Immutable lookup from a gear position to its outgoing transitions
import type { Position, PositionKey, Transition, TransitionLookup } from '../types';
import { positionKey, transitionKey } from '../types';
import { InvalidPositionError } from '../errors';
import { GEAR_TRANSITIONS, type PositionDefinition } from './definitions';

interface TableEntry {
  position: Position;
  transitions: readonly Transition[];
}

export class TransitionTable implements TransitionLookup {
  private readonly entries: ReadonlyMap<PositionKey, TableEntry>;

  constructor(definitions: PositionDefinition[]) {
    const edges = new Map<PositionKey, { position: Position; byKey: Map<string, Transition> }>();

    for (const def of definitions) {
      const from: Position = Object.freeze({ side: def.from[0], axis: def.from[1] });
      const key = positionKey(from);
      const slot = edges.get(key) ?? { position: from, byKey: new Map<string, Transition>() };
      edges.set(key, slot);

      // Collapse duplicate edges, keep first-seen order
      for (const t of def.transitions) {
        const transition: Transition = Object.freeze({
          from: slot.position,
          to: Object.freeze({ side: t.to[0], axis: t.to[1] }),
          toothDelta: t.toothDelta,
          polarityMult: t.polarityMult
        });
        const edgeKey = transitionKey(transition);
        if (!slot.byKey.has(edgeKey)) slot.byKey.set(edgeKey, transition);
      }
    }

    const entries = new Map<PositionKey, TableEntry>();
    for (const [key, slot] of edges) {
      entries.set(key, { position: slot.position, transitions: Object.freeze([...slot.byKey.values()]) });
    }

    // Every target must be a position of its own
    for (const entry of entries.values()) {
      for (const t of entry.transitions) {
        if (!entries.has(positionKey(t.to))) {
          throw new InvalidPositionError(t.to, `is reached from ${positionKey(entry.position)} but has no entry`);
        }
      }
    }

    this.entries = entries;
  }

  has(position: Position): boolean {
    return this.entries.has(positionKey(position));
  }

  // Fails on unknown positions instead of returning an empty set.
  // Each call gets its own set over the frozen edge list.
  transitionsFrom(position: Position): ReadonlySet<Transition> {
    const entry = this.entries.get(positionKey(position));
    if (!entry) {
      throw new InvalidPositionError(position);
    }
    return new Set(entry.transitions);
  }

  positions(): Position[] {
    return [...this.entries.values()].map(e => e.position);
  }

  get size(): number {
    return this.entries.size;
  }
}

export function createTransitionTable(definitions: PositionDefinition[] = GEAR_TRANSITIONS): TransitionTable {
  return new TransitionTable(definitions);
}

// Shared table, built on first use
let _transitionTable: TransitionTable | null = null;

export function getTransitionTable(): TransitionTable {
  if (!_transitionTable) {
    _transitionTable = createTransitionTable();
  }
  return _transitionTable;
}
