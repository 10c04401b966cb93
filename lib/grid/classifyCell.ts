import { MEETING_POINT_CONFIG } from "../../meeting-point.config"
import type { CellKind } from "../types/grid-types"

export const classifyCell = (value: number): CellKind => {
  if (value === MEETING_POINT_CONFIG.EMPTY_CELL) return "empty"
  if (value === MEETING_POINT_CONFIG.HOUSE_CELL) return "house"
  return "obstacle"
}

export const isEmptyCell = (value: number): boolean =>
  value === MEETING_POINT_CONFIG.EMPTY_CELL

export const isHouseCell = (value: number): boolean =>
  value === MEETING_POINT_CONFIG.HOUSE_CELL

/** Empty cells and houses can be walked through; obstacles cannot. */
export const isWalkableCell = (value: number): boolean =>
  isEmptyCell(value) || isHouseCell(value)
