export {
  type BatchReport,
  formatSummary,
  fromFile,
  type PuzzleOutcome,
  solveAll
} from './batch.ts';
export { CandidateStore } from './CandidateStore.ts';
export {
  DEFAULT_SOLVER_CONFIG,
  loadSolverConfig,
  parseSolverConfig,
  type SolveMethod,
  type SolverConfig
} from './config.ts';
export { Configuration } from './Configuration.ts';
export { countConflicts } from './conflicts.ts';
export { renderGrid } from './display.ts';
export { PuzzleInputError } from './errors.ts';
export {
  solveApprox,
  type SolveApproxOptions
} from './localSearch.ts';
export { findBestNeighbor } from './neighbors.ts';
export {
  getCellRef,
  gridValues,
  parseCellRef
} from './parsers.ts';
export {
  assign,
  eliminate,
  parseGrid
} from './propagation.ts';
export {
  createSeededRandom,
  type RandomSource
} from './random.ts';
export { randomPuzzle } from './randomPuzzle.ts';
export {
  search,
  solve
} from './search.ts';
export { createLocalSearchStrategy } from './strategies/createLocalSearchStrategy.ts';
export { HillClimbingStrategy } from './strategies/HillClimbingStrategy.ts';
export type {
  LocalSearchResult,
  LocalSearchStrategy,
  StopReason
} from './strategies/LocalSearchStrategy.ts';
export { SimulatedAnnealingStrategy } from './strategies/SimulatedAnnealingStrategy.ts';
export {
  cross,
  peers,
  UNIT_LIST,
  units
} from './topology.ts';
export {
  isSolved,
  type SolvedGrid
} from './verification.ts';
