export * from "./types/grid-types"
export { classifyCell, isWalkableCell } from "./grid/classifyCell"
export {
  buildGridModel,
  findHouses,
  getGridDimensions,
  hasObstacles,
} from "./grid/buildGridModel"
export {
  findSeparableMeetingPoint,
  scanNoObstacles,
} from "./solvers/SeparableScanSolver/scanNoObstacles"
export {
  findReachableMeetingPoint,
  traverseWithObstacles,
} from "./solvers/ReachabilityTraversalSolver/traverseWithObstacles"
export { selectAlgorithm } from "./solvers/MeetingPointSolver/selectAlgorithm"
export { minTotalDistance } from "./solvers/MeetingPointSolver/minTotalDistance"
export * from "./solvers/SeparableScanSolver/SeparableScanSolver"
export * from "./solvers/ReachabilityTraversalSolver/ReachabilityTraversalSolver"
export * from "./solvers/MeetingPointSolver/MeetingPointSolver"
export * from "./visualization/visualizeGrid"
export * from "./benchmark/generateTestGrid"
export * from "./benchmark/benchmarkAlgorithm"
export * from "./benchmark/runBenchmarks"
export * from "./benchmark/formatBenchmarkReport"
export * from "./benchmark/buildBenchmarkChart"
export { MEETING_POINT_CONFIG, BENCHMARK_CONFIG } from "../meeting-point.config"
