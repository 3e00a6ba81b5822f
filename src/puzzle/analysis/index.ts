// Analysis exports
export { computeDistances, analyzeReachability } from './Reachability';
