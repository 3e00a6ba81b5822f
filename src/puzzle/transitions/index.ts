// Transition table exports
export { TransitionTable, createTransitionTable, getTransitionTable } from './TransitionTable';
export { GEAR_TRANSITIONS } from './definitions';
export type { PositionDefinition, TransitionDefinition } from './definitions';
