import { expect, test } from "vitest"
import {
  benchmarkAlgorithm,
  mean,
  sampleStdDev,
} from "lib/benchmark/benchmarkAlgorithm"
import { runBenchmarks, type BenchmarkResult } from "lib/benchmark/runBenchmarks"
import {
  formatBenchmarkDetails,
  formatBenchmarkReport,
  formatNumericalSummary,
} from "lib/benchmark/formatBenchmarkReport"
import {
  buildBenchmarkChart,
  buildSpeedupChart,
} from "lib/benchmark/buildBenchmarkChart"
import { noHousesGrid, singleHouseGrid } from "tests/fixtures/grids"

test("mean and sample standard deviation", () => {
  expect(mean([1, 2, 3])).toBe(2)
  expect(sampleStdDev([5])).toBe(0)
  expect(sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(
    Math.sqrt(32 / 7),
  )
})

test("benchmarkAlgorithm returns each algorithm's result", () => {
  for (const algorithm of ["main", "fast", "bfs"] as const) {
    const timing = benchmarkAlgorithm(singleHouseGrid, algorithm, 3)
    expect(timing.result).toBe(1)
    expect(timing.meanMs).toBeGreaterThanOrEqual(0)
    expect(timing.stdMs).toBeGreaterThanOrEqual(0)
  }
})

test("benchmarkAlgorithm reports -1 when there are no houses", () => {
  expect(benchmarkAlgorithm(noHousesGrid, "fast", 1)).toMatchObject({
    result: -1,
    stdMs: 0,
  })
  expect(benchmarkAlgorithm(noHousesGrid, "bfs", 1).result).toBe(-1)
})

test("benchmarkAlgorithm requires at least one run", () => {
  expect(() => benchmarkAlgorithm(singleHouseGrid, "main", 0)).toThrow(
    "runs must be a positive integer, got 0",
  )
})

test("runBenchmarks compares both algorithms on obstacle-free grids", () => {
  const [result] = runBenchmarks(
    [
      {
        name: "Tiny",
        rows: 10,
        cols: 10,
        houseDensity: 0.5,
        obstacleDensity: 0,
      },
    ],
    1,
  )

  expect(result?.houseDensity).toBe(0.5)
  expect(result?.obstacleDensity).toBe(0)
  expect(result?.houses).toBe(50)
  expect(result?.obstacles).toBe(0)
  expect(result?.empty).toBe(50)
  expect(result?.comparison?.resultsMatch).toBe(true)
  expect(result?.comparison?.fast.result).toBe(result?.main.result)
})

test("runBenchmarks skips the comparison when obstacles exist", () => {
  const [result] = runBenchmarks(
    [
      {
        name: "Walled",
        rows: 10,
        cols: 10,
        houseDensity: 0.5,
        obstacleDensity: 0.5,
      },
    ],
    1,
  )

  expect(result?.houses).toBe(50)
  expect(result?.obstacles).toBe(25)
  expect(result?.empty).toBe(25)
  expect(result?.comparison).toBeUndefined()
})

const makeResult = (
  overrides: Partial<BenchmarkResult> & Pick<BenchmarkResult, "name">,
): BenchmarkResult => ({
  rows: 5,
  cols: 5,
  houseDensity: 0.2,
  obstacleDensity: 0,
  houses: 5,
  obstacles: 0,
  empty: 20,
  main: { meanMs: 1.5, stdMs: 0.25, result: 4 },
  ...overrides,
})

test("formatBenchmarkReport lays out a fixed-width table", () => {
  const report = formatBenchmarkReport([makeResult({ name: "Tiny" })])
  const lines = report.split("\n")

  expect(lines[0]).toBe(
    "Test Case" +
      " ".repeat(16) +
      "Size" +
      " ".repeat(7) +
      "Houses" +
      " ".repeat(3) +
      "Time (ms)" +
      " ".repeat(12) +
      "Result",
  )
  expect(lines[1]).toBe("-".repeat(72))
  expect(lines[2]).toBe(
    "Tiny" +
      " ".repeat(21) +
      "5x5" +
      " ".repeat(8) +
      "5" +
      " ".repeat(8) +
      "1.5000±0.250" +
      " ".repeat(9) +
      "4",
  )
})

test("formatBenchmarkDetails includes the algorithm comparison", () => {
  const lines = formatBenchmarkDetails(
    makeResult({
      name: "Tiny",
      comparison: {
        fast: { meanMs: 0.5, stdMs: 0, result: 4 },
        bfs: { meanMs: 1, stdMs: 0, result: 4 },
        resultsMatch: true,
        speedup: 2,
      },
    }),
  )

  expect(lines).toEqual([
    "Testing: Tiny (5x5)",
    "House density: 20.0%, Obstacle density: 0.0%",
    "Grid composition: 5 houses, 0 obstacles, 20 empty",
    "Main algorithm: 1.5000ms ± 0.2500ms (result: 4)",
    "Fast algorithm: 0.5000ms ± 0.0000ms (result: 4)",
    "BFS algorithm:  1.0000ms ± 0.0000ms (result: 4)",
    "Fast and BFS results match",
    "Fast algorithm speedup: 2.00x",
  ])
})

test("buildBenchmarkChart plots one line per timed algorithm", () => {
  const graphics = buildBenchmarkChart([
    makeResult({
      name: "Large",
      rows: 10,
      cols: 10,
      main: { meanMs: 4, stdMs: 0, result: 1 },
    }),
    makeResult({ name: "Small", main: { meanMs: 1, stdMs: 0, result: 1 } }),
  ])

  expect(graphics.lines).toHaveLength(1)
  expect(graphics.lines?.[0]?.label).toBe("main")
  expect(graphics.lines?.[0]?.points).toEqual([
    { x: 2.5, y: 2.5 },
    { x: 10, y: 10 },
  ])
  expect(graphics.points).toHaveLength(2)
})

const comparedResults = [
  makeResult({
    name: "Small",
    comparison: {
      fast: { meanMs: 0.5, stdMs: 0, result: 4 },
      bfs: { meanMs: 1, stdMs: 0, result: 4 },
      resultsMatch: true,
      speedup: 2,
    },
  }),
  makeResult({
    name: "Walled",
    rows: 10,
    cols: 10,
    obstacleDensity: 0.5,
    main: { meanMs: 3, stdMs: 0, result: -1 },
  }),
]

test("formatNumericalSummary compares the algorithms and names the largest grid", () => {
  const lines = formatNumericalSummary(comparedResults).split("\n")

  expect(lines[1]).toBe("-".repeat(80))
  expect(lines.slice(2)).toEqual([
    "Small" +
      " ".repeat(20) +
      "25" +
      " ".repeat(7) +
      "1.5000ms" +
      " ".repeat(5) +
      "0.5000ms" +
      " ".repeat(5) +
      "1.0000ms" +
      " ".repeat(5) +
      "2.00x",
    "",
    "Average Fast Path Speedup: 2.00x",
    "Largest grid tested: 10x10 (100 cells) in 3.0000ms",
  ])
})

test("buildSpeedupChart draws one bar per compared benchmark", () => {
  const graphics = buildSpeedupChart(comparedResults)

  expect(graphics.rects).toHaveLength(1)
  expect(graphics.rects?.[0]).toMatchObject({
    center: { x: 0.5, y: 1 },
    width: 0.6,
    height: 2,
    label: "Small: 2.00x",
  })
  expect(graphics.lines?.[0]?.points).toEqual([
    { x: 0, y: 1 },
    { x: 1, y: 1 },
  ])
  expect(graphics.texts?.map((t) => t.text)).toEqual(["Small"])
})
