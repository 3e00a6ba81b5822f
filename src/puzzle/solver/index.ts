// Solver exports
export { search, solve, isSolvable } from './Solver';
