// Gear puzzle types

// ============= Basic Types =============

export type Axis = 'X' | 'Y' | 'Z';
export type Side = 1 | 2 | 3 | 4 | 5 | 6;
export type Tooth = 0 | 1 | 2 | 3 | 4;
export type Polarity = 1 | -1;
export type ToothDelta = -1 | 0 | 1;

export const AXES: readonly Axis[] = ['X', 'Y', 'Z'];
export const SIDES: readonly Side[] = [1, 2, 3, 4, 5, 6];
export const TOOTH_COUNT = 5;

// Position key format: "side:axis"
export type PositionKey = string;
// State key format: "side:axis:tooth:polarity"
export type StateKey = string;

// ============= State Types =============

// Which cube side the gear sits in and which axis it follows
export interface Position {
  readonly side: Side;
  readonly axis: Axis;
}

export interface GearState {
  readonly position: Position;
  // Tooth currently inside the cube
  readonly tooth: Tooth;
  // 1 when the reference face points toward the axis positive area
  readonly polarity: Polarity;
}

// ============= Transition Types =============

export interface Transition {
  readonly from: Position;
  readonly to: Position;
  // 0 for in-place rotations, +-1 when moving to an adjacent side
  readonly toothDelta: ToothDelta;
  // -1 if the move flips the gear
  readonly polarityMult: Polarity;
}

// One entry of a search path
export interface Move {
  readonly transition: Transition;
  readonly destination: Position;
  readonly isRotation: boolean;
  // State reached after this move
  readonly state: GearState;
}

export type SearchPath = readonly Move[];

// ============= Solver Types =============

export interface SolverOptions {
  table?: TransitionLookup;
  maxIterations?: number;
  debug?: boolean;
}

export interface SolveTrace {
  statesExplored: number;
  statesVisited: number;
  maxDepth: number;
}

export interface SolverResult {
  path: SearchPath;
  trace: SolveTrace;
}

// Read side of the transition table, as the solver consumes it
export interface TransitionLookup {
  has(position: Position): boolean;
  transitionsFrom(position: Position): ReadonlySet<Transition>;
  positions(): Position[];
}

// ============= Analysis Types =============

export interface ReachabilityAnalysis {
  reachableStates: number;
  maxDistance: number;
}

// ============= Utility Types =============

export function positionKey(position: Position): PositionKey {
  return `${position.side}:${position.axis}`;
}

export function stateKey(state: GearState): StateKey {
  return `${state.position.side}:${state.position.axis}:${state.tooth}:${state.polarity}`;
}

export function transitionKey(transition: Transition): string {
  const { from, to, toothDelta, polarityMult } = transition;
  return `${positionKey(from)}>${positionKey(to)}:${toothDelta}:${polarityMult}`;
}

export function formatPosition(position: Position): string {
  return `(${position.side}, ${position.axis})`;
}
