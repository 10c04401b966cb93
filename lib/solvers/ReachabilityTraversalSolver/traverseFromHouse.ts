import type { GridCell } from "../../types/grid-types"
import { isEmptyCell, isWalkableCell } from "../../grid/classifyCell"
import type { TraversalState } from "./types"

const DIRECTIONS = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
] as const

/**
 * Breadth-first traversal from one house. Every empty cell reached adds its
 * step distance to its sum and bumps its reach count. Uses the current
 * generation as the visited marker and advances it when done.
 */
export function traverseFromHouse(
  state: TraversalState,
  house: GridCell,
): void {
  const {
    grid,
    rows,
    cols,
    distanceSums,
    reachCounts,
    visitGeneration,
    queue,
    queueDistances: distances,
  } = state
  const generation = state.generation

  let head = 0
  let tail = 0

  const start = house.row * cols + house.col
  visitGeneration[start] = generation
  queue[tail] = start
  distances[tail] = 0
  tail++

  while (head < tail) {
    const index = queue[head]!
    const distance = distances[head]!
    head++

    const row = Math.floor(index / cols)
    const col = index - row * cols

    if (isEmptyCell(grid[row]![col]!)) {
      distanceSums[index] = distanceSums[index]! + distance
      reachCounts[index] = reachCounts[index]! + 1
    }

    for (const [dr, dc] of DIRECTIONS) {
      const nextRow = row + dr
      const nextCol = col + dc
      if (nextRow < 0 || nextRow >= rows || nextCol < 0 || nextCol >= cols) {
        continue
      }
      const next = nextRow * cols + nextCol
      if (visitGeneration[next] === generation) continue
      if (!isWalkableCell(grid[nextRow]![nextCol]!)) continue

      visitGeneration[next] = generation
      queue[tail] = next
      distances[tail] = distance + 1
      tail++
    }
  }

  state.generation++
}

/**
 * Traverse from the next pending house. Returns false once every house has
 * been traversed.
 */
export function stepTraversal(state: TraversalState): boolean {
  const house = state.houses[state.houseIndex]
  if (!house) return false
  traverseFromHouse(state, house)
  state.houseIndex++
  return true
}
