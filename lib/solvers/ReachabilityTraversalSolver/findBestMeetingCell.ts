import type { MeetingPoint } from "../../types/grid-types"
import { isEmptyCell } from "../../grid/classifyCell"
import type { TraversalState } from "./types"

/**
 * Smallest accumulated sum among empty cells reached by every house.
 * Ties keep the first cell in row-major order.
 */
export function findBestMeetingCell(
  state: TraversalState,
): MeetingPoint | null {
  const { grid, rows, cols, distanceSums, reachCounts } = state
  const houseCount = state.houses.length

  let best: MeetingPoint | null = null
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const index = row * cols + col
      if (!isEmptyCell(grid[row]![col]!)) continue
      if (reachCounts[index] !== houseCount) continue
      const totalDistance = distanceSums[index]!
      if (!best || totalDistance < best.totalDistance) {
        best = { row, col, totalDistance }
      }
    }
  }
  return best
}
