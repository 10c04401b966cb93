import type { RawGrid } from "lib/types/grid-types"

/** Houses at (0,0), (0,4), (2,2); obstacle at (0,2). Best cell is (1,2). */
export const walledExampleGrid: RawGrid = [
  [1, 0, 2, 0, 1],
  [0, 0, 0, 0, 0],
  [0, 0, 1, 0, 0],
]

export const singleHouseGrid: RawGrid = [
  [0, 0, 0],
  [0, 1, 0],
  [0, 0, 0],
]

export const fencedHousesGrid: RawGrid = [
  [1, 2, 1],
  [2, 2, 2],
  [1, 2, 1],
]

export const isolatedEmptyCellGrid: RawGrid = [
  [1, 2, 1],
  [2, 0, 2],
  [1, 2, 1],
]

export const linearHousesGrid: RawGrid = [[1, 0, 1, 0, 1]]

/** Empty land exists but the houses sit in a walled-off column. */
export const unreachableLandGrid: RawGrid = [
  [1, 2, 0],
  [2, 2, 0],
  [1, 2, 0],
]

export const cornerHousesGrid: RawGrid = [
  [1, 0, 0, 1],
  [0, 0, 0, 0],
  [0, 0, 0, 0],
  [1, 0, 0, 1],
]

export const noHousesGrid: RawGrid = [
  [0, 0, 0],
  [0, 0, 0],
  [0, 0, 0],
]
