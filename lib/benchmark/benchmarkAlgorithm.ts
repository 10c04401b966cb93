import {
  BENCHMARK_CONFIG,
  MEETING_POINT_CONFIG,
} from "../../meeting-point.config"
import type { RawGrid } from "../types/grid-types"
import { findHouses } from "../grid/buildGridModel"
import { minTotalDistance } from "../solvers/MeetingPointSolver/minTotalDistance"
import { scanNoObstacles } from "../solvers/SeparableScanSolver/scanNoObstacles"
import { traverseWithObstacles } from "../solvers/ReachabilityTraversalSolver/traverseWithObstacles"

/**
 * "main" goes through the dispatcher, "fast" and "bfs" call one algorithm
 * directly.
 */
export type BenchmarkedAlgorithm = "main" | "fast" | "bfs"

export type BenchmarkTiming = {
  meanMs: number
  /** Sample standard deviation; 0 for a single run. */
  stdMs: number
  result: number
}

const runAlgorithm = (grid: RawGrid, algorithm: BenchmarkedAlgorithm) => {
  if (algorithm === "main") return minTotalDistance(grid)

  const houses = findHouses(grid)
  if (houses.length === 0) return MEETING_POINT_CONFIG.NO_MEETING_POINT
  return algorithm === "fast"
    ? scanNoObstacles(grid, houses)
    : traverseWithObstacles(grid, houses)
}

export const mean = (samples: readonly number[]): number =>
  samples.reduce((sum, sample) => sum + sample, 0) / samples.length

export const sampleStdDev = (samples: readonly number[]): number => {
  if (samples.length < 2) return 0
  const avg = mean(samples)
  const squaredDeviations = samples.reduce(
    (sum, sample) => sum + (sample - avg) ** 2,
    0,
  )
  return Math.sqrt(squaredDeviations / (samples.length - 1))
}

export function benchmarkAlgorithm(
  grid: RawGrid,
  algorithm: BenchmarkedAlgorithm,
  runs: number = BENCHMARK_CONFIG.DEFAULT_RUNS,
): BenchmarkTiming {
  if (!Number.isInteger(runs) || runs < 1) {
    throw new Error(`runs must be a positive integer, got ${runs}`)
  }

  const samples: number[] = []
  let result: number = MEETING_POINT_CONFIG.NO_MEETING_POINT
  for (let i = 0; i < runs; i++) {
    const start = performance.now()
    result = runAlgorithm(grid, algorithm)
    samples.push(performance.now() - start)
  }

  return { meanMs: mean(samples), stdMs: sampleStdDev(samples), result }
}
