import { expect, test } from "vitest"
import { generateTestGrid } from "lib/benchmark/generateTestGrid"
import {
  createSeededRandom,
  sampleWithoutReplacement,
} from "lib/benchmark/createSeededRandom"

const countValue = (grid: number[][], value: number) =>
  grid.flat().filter((cell) => cell === value).length

test("createSeededRandom is deterministic per seed", () => {
  const a = createSeededRandom(7)
  const b = createSeededRandom(7)
  const first = [a(), a(), a()]
  expect([b(), b(), b()]).toEqual(first)
  for (const value of first) {
    expect(value).toBeGreaterThanOrEqual(0)
    expect(value).toBeLessThan(1)
  }
  expect(createSeededRandom(8)()).not.toBe(first[0])
})

test("sampleWithoutReplacement picks distinct items", () => {
  const items = [1, 2, 3, 4, 5, 6]
  const sample = sampleWithoutReplacement(items, 4, createSeededRandom(1))
  expect(sample).toHaveLength(4)
  expect(new Set(sample).size).toBe(4)
  expect(items).toEqual([1, 2, 3, 4, 5, 6])
  expect(sampleWithoutReplacement(items, 10, createSeededRandom(1))).toHaveLength(6)
})

test("generateTestGrid places the requested number of houses and obstacles", () => {
  const grid = generateTestGrid({
    rows: 10,
    cols: 10,
    houseDensity: 0.5,
    obstacleDensity: 0.5,
    seed: 3,
  })

  expect(grid).toHaveLength(10)
  expect(grid.every((row) => row.length === 10)).toBe(true)
  expect(countValue(grid, 1)).toBe(50)
  expect(countValue(grid, 2)).toBe(25)
  expect(countValue(grid, 0)).toBe(25)
})

test("generateTestGrid is reproducible for a seed", () => {
  const options = { rows: 6, cols: 8, houseDensity: 0.25, seed: 11 }
  expect(generateTestGrid(options)).toEqual(generateTestGrid(options))
})

test("generateTestGrid defaults to no obstacles", () => {
  const grid = generateTestGrid({ rows: 10, cols: 10 })
  expect(countValue(grid, 2)).toBe(0)
  expect(countValue(grid, 1)).toBe(10)
})

test("generateTestGrid supports empty dimensions", () => {
  expect(generateTestGrid({ rows: 0, cols: 5 })).toEqual([])
  expect(generateTestGrid({ rows: 2, cols: 0 })).toEqual([[], []])
})

test("generateTestGrid rejects invalid options", () => {
  expect(() => generateTestGrid({ rows: -1, cols: 3 })).toThrow(
    "rows must be a non-negative integer, got -1",
  )
  expect(() => generateTestGrid({ rows: 3, cols: 2.5 })).toThrow(
    "cols must be a non-negative integer, got 2.5",
  )
  expect(() =>
    generateTestGrid({ rows: 3, cols: 3, houseDensity: 1.5 }),
  ).toThrow("houseDensity must be between 0 and 1, got 1.5")
  expect(() =>
    generateTestGrid({ rows: 3, cols: 3, obstacleDensity: -0.1 }),
  ).toThrow("obstacleDensity must be between 0 and 1, got -0.1")
})
