// meeting-point.config.ts
/**
 * Constants shared by the meeting point solvers, visualizations and
 * benchmarks. Exposed at the top level for easy experimentation.
 */

export const MEETING_POINT_CONFIG = {
  /** Raw grid value of an empty cell (a candidate meeting cell). */
  EMPTY_CELL: 0,
  /** Raw grid value of a house. Every other value is an obstacle. */
  HOUSE_CELL: 1,
  /** Raw value written for obstacles by the grid generator. */
  OBSTACLE_CELL: 2,
  /** Returned when no empty cell is reachable from every house. */
  NO_MEETING_POINT: -1,
  /** Side length of one cell in visualizations. */
  CELL_SIZE: 1,
}

export const BENCHMARK_CONFIG = {
  DEFAULT_RUNS: 5,
  DEFAULT_SEED: 42,
  DEFAULT_HOUSE_DENSITY: 0.1,
  DEFAULT_OBSTACLE_DENSITY: 0,
  /** Where the benchmark CLI writes its timing chart. */
  CHART_OUTPUT_PATH: "benchmark-results.svg",
  SPEEDUP_CHART_OUTPUT_PATH: "benchmark-speedup.svg",
}
