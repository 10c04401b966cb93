import { expect, test } from "vitest"
import { MeetingPointSolver } from "lib/solvers/MeetingPointSolver/MeetingPointSolver"
import { minTotalDistance } from "lib/solvers/MeetingPointSolver/minTotalDistance"
import { generateTestGrid } from "lib/benchmark/generateTestGrid"
import {
  fencedHousesGrid,
  linearHousesGrid,
  walledExampleGrid,
} from "tests/fixtures/grids"

test("MeetingPointSolver uses the scan for obstacle-free grids", () => {
  const solver = new MeetingPointSolver({ grid: linearHousesGrid })
  solver.solve()

  expect(solver.solved).toBe(true)
  expect(solver.getOutput()).toEqual({
    algorithm: "separable-scan",
    totalDistance: 5,
    meetingPoint: { row: 0, col: 1, totalDistance: 5 },
  })
})

test("MeetingPointSolver uses the traversal when obstacles exist", () => {
  const solver = new MeetingPointSolver({ grid: walledExampleGrid })
  solver.solve()

  expect(solver.getOutput()).toEqual({
    algorithm: "reachability-traversal",
    totalDistance: 7,
    meetingPoint: { row: 1, col: 2, totalDistance: 7 },
  })
  expect(solver.stats.algorithm).toBe("reachability-traversal")
  expect(solver.stats.housesTraversed).toBe(3)
})

test("MeetingPointSolver finishes immediately on an empty grid", () => {
  const solver = new MeetingPointSolver({ grid: [[]] })
  solver.setup()
  expect(solver.stats.algorithm).toBe("none")

  solver.step()
  expect(solver.solved).toBe(true)
  expect(solver.getOutput()).toEqual({
    algorithm: null,
    totalDistance: -1,
    meetingPoint: null,
  })
})

test("MeetingPointSolver reports -1 for fenced houses", () => {
  const solver = new MeetingPointSolver({ grid: fencedHousesGrid })
  solver.solve()
  expect(solver.getOutput().totalDistance).toBe(-1)
  expect(solver.getOutput().meetingPoint).toBeNull()
})

test("MeetingPointSolver agrees with minTotalDistance on random grids", () => {
  for (let seed = 1; seed <= 10; seed++) {
    const grid = generateTestGrid({
      rows: 6,
      cols: 6,
      houseDensity: 0.2,
      obstacleDensity: 0.2,
      seed,
    })
    const solver = new MeetingPointSolver({ grid })
    solver.solve()
    expect(solver.getOutput().totalDistance).toBe(minTotalDistance(grid))
  }
})

test("MeetingPointSolver visualizes the active sub-solver", () => {
  const solver = new MeetingPointSolver({ grid: walledExampleGrid })
  solver.setup()
  solver.step()

  const graphics = solver.visualize()
  expect(graphics.title).toBe("ReachabilityTraversalSolver")
  // 15 cells plus the next house outline
  expect(graphics.rects).toHaveLength(16)
})
