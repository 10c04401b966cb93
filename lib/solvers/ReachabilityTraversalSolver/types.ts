import type { GridCell, RawGrid } from "../../types/grid-types"

export type TraversalState = {
  // static
  grid: RawGrid
  rows: number
  cols: number
  houses: readonly GridCell[]

  // accumulators, indexed by row * cols + col
  distanceSums: Float64Array
  reachCounts: Uint32Array

  // visited iff visitGeneration[index] === generation
  visitGeneration: Uint32Array
  generation: number

  // BFS frontier shared by every traversal; each cell is enqueued at most
  // once per generation, so rows * cols slots suffice
  queue: Int32Array
  queueDistances: Uint32Array

  /** Index into `houses` of the next house to traverse from. */
  houseIndex: number
}
