import {
  BENCHMARK_CONFIG,
  MEETING_POINT_CONFIG,
} from "../../meeting-point.config"
import type { GridCell } from "../types/grid-types"
import {
  createSeededRandom,
  sampleWithoutReplacement,
} from "./createSeededRandom"

export type GenerateTestGridOptions = {
  rows: number
  cols: number
  /** Fraction of all cells that become houses. */
  houseDensity?: number
  /** Fraction of the cells left empty after placing houses that become obstacles. */
  obstacleDensity?: number
  seed?: number
}

const assertDensity = (name: string, value: number) => {
  if (!(value >= 0 && value <= 1)) {
    throw new Error(`${name} must be between 0 and 1, got ${value}`)
  }
}

/**
 * Random grid for benchmarks and property tests. The same options always
 * produce the same grid.
 */
export function generateTestGrid(options: GenerateTestGridOptions): number[][] {
  const {
    rows,
    cols,
    houseDensity = BENCHMARK_CONFIG.DEFAULT_HOUSE_DENSITY,
    obstacleDensity = BENCHMARK_CONFIG.DEFAULT_OBSTACLE_DENSITY,
    seed = BENCHMARK_CONFIG.DEFAULT_SEED,
  } = options

  if (!Number.isInteger(rows) || rows < 0) {
    throw new Error(`rows must be a non-negative integer, got ${rows}`)
  }
  if (!Number.isInteger(cols) || cols < 0) {
    throw new Error(`cols must be a non-negative integer, got ${cols}`)
  }
  assertDensity("houseDensity", houseDensity)
  assertDensity("obstacleDensity", obstacleDensity)

  const random = createSeededRandom(seed)
  const grid: number[][] = Array.from({ length: rows }, () =>
    new Array<number>(cols).fill(MEETING_POINT_CONFIG.EMPTY_CELL),
  )

  const allCells: GridCell[] = []
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) allCells.push({ row, col })
  }

  const houseCount = Math.floor(rows * cols * houseDensity)
  for (const { row, col } of sampleWithoutReplacement(
    allCells,
    houseCount,
    random,
  )) {
    grid[row]![col] = MEETING_POINT_CONFIG.HOUSE_CELL
  }

  if (obstacleDensity > 0) {
    const emptyCells = allCells.filter(
      ({ row, col }) => grid[row]![col] === MEETING_POINT_CONFIG.EMPTY_CELL,
    )
    const obstacleCount = Math.floor(emptyCells.length * obstacleDensity)
    for (const { row, col } of sampleWithoutReplacement(
      emptyCells,
      obstacleCount,
      random,
    )) {
      grid[row]![col] = MEETING_POINT_CONFIG.OBSTACLE_CELL
    }
  }

  return grid
}
