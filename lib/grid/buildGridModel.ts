import type { GridCell, GridModel, RawGrid } from "../types/grid-types"
import { isHouseCell, isWalkableCell } from "./classifyCell"

export const getGridDimensions = (
  grid: RawGrid,
): { rows: number; cols: number } => {
  const rows = grid.length
  const cols = grid[0]?.length ?? 0
  return { rows, cols }
}

export function findHouses(grid: RawGrid): GridCell[] {
  const { rows, cols } = getGridDimensions(grid)
  const houses: GridCell[] = []
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      if (isHouseCell(grid[row]![col]!)) houses.push({ row, col })
    }
  }
  return houses
}

export function hasObstacles(grid: RawGrid): boolean {
  const { rows, cols } = getGridDimensions(grid)
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      if (!isWalkableCell(grid[row]![col]!)) return true
    }
  }
  return false
}

/**
 * Read the grid once into its dimensions, house list and obstacle flag.
 * Never mutates the grid.
 */
export function buildGridModel(grid: RawGrid): GridModel {
  const { rows, cols } = getGridDimensions(grid)
  return {
    rows,
    cols,
    houses: findHouses(grid),
    hasObstacles: hasObstacles(grid),
  }
}
