/**
 * For every position `p` on an axis of the given length, compute
 * `sum(|coordinate - p|)` over the given coordinates.
 *
 * Uses a per-position count and a running sweep, so the cost is
 * O(length + coordinates.length) instead of one pass per coordinate.
 */
export function computeAxisCosts(
  coordinates: readonly number[],
  length: number,
): Float64Array {
  const costs = new Float64Array(length)
  if (length === 0) return costs

  const countAt = new Uint32Array(length)
  let coordinateSum = 0
  for (const coordinate of coordinates) {
    countAt[coordinate] = countAt[coordinate]! + 1
    coordinateSum += coordinate
  }

  // Sweep left to right; at position p the houses split into those at or
  // before p (countBefore, sumBefore) and those after it.
  const total = coordinates.length
  let countBefore = 0
  let sumBefore = 0
  for (let p = 0; p < length; p++) {
    countBefore += countAt[p]!
    sumBefore += countAt[p]! * p
    const countAfter = total - countBefore
    const sumAfter = coordinateSum - sumBefore
    costs[p] = p * countBefore - sumBefore + (sumAfter - p * countAfter)
  }

  return costs
}
