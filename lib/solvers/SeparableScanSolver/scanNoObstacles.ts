import { MEETING_POINT_CONFIG } from "../../../meeting-point.config"
import type { GridCell, MeetingPoint, RawGrid } from "../../types/grid-types"
import { getGridDimensions } from "../../grid/buildGridModel"
import { isEmptyCell } from "../../grid/classifyCell"
import { computeAxisCosts } from "./computeAxisCosts"

/**
 * Closed-form meeting point search for grids without obstacles.
 *
 * Without obstacles every empty cell is reachable from every house, so the
 * walking distance is the Manhattan distance and the total splits into an
 * independent row term and column term. The grid must contain only empty
 * cells and houses; this is not checked.
 */
export function findSeparableMeetingPoint(
  grid: RawGrid,
  houses: readonly GridCell[],
): MeetingPoint | null {
  const { rows, cols } = getGridDimensions(grid)
  const rowCosts = computeAxisCosts(
    houses.map((house) => house.row),
    rows,
  )
  const colCosts = computeAxisCosts(
    houses.map((house) => house.col),
    cols,
  )

  let best: MeetingPoint | null = null
  for (let row = 0; row < rows; row++) {
    const scanned = scanRow(grid, row, rowCosts, colCosts)
    if (scanned && (!best || scanned.totalDistance < best.totalDistance)) {
      best = scanned
    }
  }
  return best
}

/** Best empty cell within one row, or null if the row has none. */
export function scanRow(
  grid: RawGrid,
  row: number,
  rowCosts: Float64Array,
  colCosts: Float64Array,
): MeetingPoint | null {
  const cells = grid[row]!
  const rowCost = rowCosts[row]!
  let best: MeetingPoint | null = null
  for (let col = 0; col < colCosts.length; col++) {
    if (!isEmptyCell(cells[col]!)) continue
    const totalDistance = rowCost + colCosts[col]!
    if (!best || totalDistance < best.totalDistance) {
      best = { row, col, totalDistance }
    }
  }
  return best
}

export function scanNoObstacles(
  grid: RawGrid,
  houses: readonly GridCell[],
): number {
  const meetingPoint = findSeparableMeetingPoint(grid, houses)
  return meetingPoint?.totalDistance ?? MEETING_POINT_CONFIG.NO_MEETING_POINT
}
