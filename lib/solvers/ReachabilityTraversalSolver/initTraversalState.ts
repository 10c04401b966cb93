import type { GridCell, RawGrid } from "../../types/grid-types"
import { getGridDimensions } from "../../grid/buildGridModel"
import type { TraversalState } from "./types"

export function initTraversalState(
  grid: RawGrid,
  houses: readonly GridCell[],
): TraversalState {
  const { rows, cols } = getGridDimensions(grid)
  const cellCount = rows * cols
  return {
    grid,
    rows,
    cols,
    houses,
    distanceSums: new Float64Array(cellCount),
    reachCounts: new Uint32Array(cellCount),
    visitGeneration: new Uint32Array(cellCount),
    generation: 1,
    queue: new Int32Array(cellCount),
    queueDistances: new Uint32Array(cellCount),
    houseIndex: 0,
  }
}
