import { MEETING_POINT_CONFIG } from "../../../meeting-point.config"
import type { RawGrid } from "../../types/grid-types"
import { scanNoObstacles } from "../SeparableScanSolver/scanNoObstacles"
import { traverseWithObstacles } from "../ReachabilityTraversalSolver/traverseWithObstacles"
import { selectAlgorithm } from "./selectAlgorithm"

/**
 * Minimum total walking distance from every house to one empty cell that all
 * houses can reach, or `NO_MEETING_POINT` (-1) when there is no such cell.
 */
export function minTotalDistance(grid: RawGrid): number {
  const selection = selectAlgorithm(grid)
  switch (selection.kind) {
    case "none":
      return MEETING_POINT_CONFIG.NO_MEETING_POINT
    case "separable-scan":
      return scanNoObstacles(grid, selection.houses)
    case "reachability-traversal":
      return traverseWithObstacles(grid, selection.houses)
  }
}
