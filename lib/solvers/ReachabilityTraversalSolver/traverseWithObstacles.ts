import { MEETING_POINT_CONFIG } from "../../../meeting-point.config"
import type { GridCell, MeetingPoint, RawGrid } from "../../types/grid-types"
import { initTraversalState } from "./initTraversalState"
import { traverseFromHouse } from "./traverseFromHouse"
import { findBestMeetingCell } from "./findBestMeetingCell"

/**
 * Meeting point search that respects obstacles: one breadth-first traversal
 * per house, O(H * M * N) overall. Also correct on obstacle-free grids.
 */
export function findReachableMeetingPoint(
  grid: RawGrid,
  houses: readonly GridCell[],
): MeetingPoint | null {
  const state = initTraversalState(grid, houses)
  for (const house of houses) traverseFromHouse(state, house)
  return findBestMeetingCell(state)
}

export function traverseWithObstacles(
  grid: RawGrid,
  houses: readonly GridCell[],
): number {
  const meetingPoint = findReachableMeetingPoint(grid, houses)
  return meetingPoint?.totalDistance ?? MEETING_POINT_CONFIG.NO_MEETING_POINT
}
