export type CellKind = "empty" | "house" | "obstacle"

/** Row-major grid of raw cell values: 0 = empty, 1 = house, else obstacle. */
export type RawGrid = ReadonlyArray<ReadonlyArray<number>>

export type GridCell = { row: number; col: number }

export type GridModel = {
  rows: number
  cols: number
  /** Houses in row-major order. */
  houses: GridCell[]
  hasObstacles: boolean
}

export type MeetingPoint = GridCell & { totalDistance: number }

export type MeetingPointAlgorithm = "separable-scan" | "reachability-traversal"

export type AlgorithmSelection =
  | { kind: "none" }
  | { kind: "separable-scan"; houses: GridCell[] }
  | { kind: "reachability-traversal"; houses: GridCell[] }
