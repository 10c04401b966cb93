import { BENCHMARK_CONFIG } from "../../meeting-point.config"
import { classifyCell } from "../grid/classifyCell"
import { benchmarkAlgorithm, type BenchmarkTiming } from "./benchmarkAlgorithm"
import { generateTestGrid } from "./generateTestGrid"

export type BenchmarkConfig = {
  name: string
  rows: number
  cols: number
  houseDensity: number
  obstacleDensity: number
}

export type BenchmarkResult = {
  name: string
  rows: number
  cols: number
  houseDensity: number
  obstacleDensity: number
  houses: number
  obstacles: number
  empty: number
  main: BenchmarkTiming
  /** Only for obstacle-free grids with at least one house. */
  comparison?: {
    fast: BenchmarkTiming
    bfs: BenchmarkTiming
    resultsMatch: boolean
    /** bfs mean / fast mean; null when the fast mean rounds to 0. */
    speedup: number | null
  }
}

export const DEFAULT_BENCHMARK_CONFIGS: BenchmarkConfig[] = [
  {
    name: "Small Dense",
    rows: 20,
    cols: 20,
    houseDensity: 0.2,
    obstacleDensity: 0,
  },
  {
    name: "Small Sparse",
    rows: 20,
    cols: 20,
    houseDensity: 0.05,
    obstacleDensity: 0,
  },
  {
    name: "Medium Dense",
    rows: 50,
    cols: 50,
    houseDensity: 0.1,
    obstacleDensity: 0,
  },
  {
    name: "Medium with Obstacles",
    rows: 50,
    cols: 50,
    houseDensity: 0.1,
    obstacleDensity: 0.1,
  },
  {
    name: "Large Sparse",
    rows: 100,
    cols: 100,
    houseDensity: 0.02,
    obstacleDensity: 0,
  },
  {
    name: "Large with Obstacles",
    rows: 100,
    cols: 100,
    houseDensity: 0.05,
    obstacleDensity: 0.05,
  },
]

export function runBenchmarks(
  configs: readonly BenchmarkConfig[] = DEFAULT_BENCHMARK_CONFIGS,
  runs: number = BENCHMARK_CONFIG.DEFAULT_RUNS,
): BenchmarkResult[] {
  return configs.map((config) => {
    const grid = generateTestGrid({
      rows: config.rows,
      cols: config.cols,
      houseDensity: config.houseDensity,
      obstacleDensity: config.obstacleDensity,
      seed: BENCHMARK_CONFIG.DEFAULT_SEED,
    })

    const composition = { house: 0, obstacle: 0, empty: 0 }
    for (const row of grid) {
      for (const value of row) composition[classifyCell(value)]++
    }

    const result: BenchmarkResult = {
      name: config.name,
      rows: config.rows,
      cols: config.cols,
      houseDensity: config.houseDensity,
      obstacleDensity: config.obstacleDensity,
      houses: composition.house,
      obstacles: composition.obstacle,
      empty: composition.empty,
      main: benchmarkAlgorithm(grid, "main", runs),
    }

    if (composition.obstacle === 0 && composition.house > 0) {
      const fast = benchmarkAlgorithm(grid, "fast", runs)
      const bfs = benchmarkAlgorithm(grid, "bfs", runs)
      result.comparison = {
        fast,
        bfs,
        resultsMatch: fast.result === bfs.result,
        speedup: fast.meanMs > 0 ? bfs.meanMs / fast.meanMs : null,
      }
    }

    return result
  })
}
