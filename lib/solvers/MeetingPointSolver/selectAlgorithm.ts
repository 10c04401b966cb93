import type { AlgorithmSelection, RawGrid } from "../../types/grid-types"
import {
  findHouses,
  getGridDimensions,
  hasObstacles,
} from "../../grid/buildGridModel"

/**
 * Decide which algorithm answers this grid. Empty grids and grids without
 * houses have no meeting point; obstacle-free grids take the closed-form
 * scan; everything else needs the reachability traversal.
 */
export function selectAlgorithm(grid: RawGrid): AlgorithmSelection {
  const { rows, cols } = getGridDimensions(grid)
  if (rows === 0 || cols === 0) return { kind: "none" }

  const houses = findHouses(grid)
  if (houses.length === 0) return { kind: "none" }

  if (!hasObstacles(grid)) return { kind: "separable-scan", houses }
  return { kind: "reachability-traversal", houses }
}
