import type { GraphicsObject } from "graphics-debug"
import type { BenchmarkTiming } from "./benchmarkAlgorithm"
import type { BenchmarkResult } from "./runBenchmarks"

const CHART_SIZE = 10

const SERIES = [
  {
    label: "main",
    color: "#3b82f6",
    pick: (result: BenchmarkResult) => result.main,
  },
  {
    label: "fast",
    color: "#10b981",
    pick: (result: BenchmarkResult) => result.comparison?.fast,
  },
  {
    label: "bfs",
    color: "#ef4444",
    pick: (result: BenchmarkResult) => result.comparison?.bfs,
  },
] satisfies Array<{
  label: string
  color: string
  pick: (result: BenchmarkResult) => BenchmarkTiming | undefined
}>

/**
 * Mean time against grid cell count, one line per algorithm. Both axes are
 * scaled to a CHART_SIZE square so small and large benchmarks share a view.
 */
export function buildBenchmarkChart(
  results: readonly BenchmarkResult[],
): GraphicsObject {
  const lineList: NonNullable<GraphicsObject["lines"]> = []
  const pointList: NonNullable<GraphicsObject["points"]> = []
  const textList: NonNullable<GraphicsObject["texts"]> = []

  const sorted = [...results].sort(
    (a, b) => a.rows * a.cols - b.rows * b.cols,
  )
  const maxCells = Math.max(1, ...sorted.map((r) => r.rows * r.cols))
  const maxMs = Math.max(
    Number.EPSILON,
    ...sorted.flatMap((r) =>
      SERIES.map((series) => series.pick(r)?.meanMs ?? 0),
    ),
  )

  for (const series of SERIES) {
    const seriesPoints = sorted.flatMap((result) => {
      const timing = series.pick(result)
      if (!timing) return []
      return [
        {
          x: ((result.rows * result.cols) / maxCells) * CHART_SIZE,
          y: (timing.meanMs / maxMs) * CHART_SIZE,
          label: `${series.label} ${result.name}: ${timing.meanMs.toFixed(4)}ms`,
        },
      ]
    })
    if (seriesPoints.length === 0) continue

    lineList.push({
      points: seriesPoints.map(({ x, y }) => ({ x, y })),
      strokeColor: series.color,
      strokeWidth: 0.05,
      label: series.label,
    })
    for (const point of seriesPoints) {
      pointList.push({ ...point, color: series.color })
    }
  }

  textList.push(
    {
      text: `cells (max ${maxCells})`,
      x: CHART_SIZE,
      y: 0,
      anchorSide: "top_right",
      fontSize: 0.3,
    },
    {
      text: `mean time (max ${maxMs.toFixed(4)}ms)`,
      x: 0,
      y: CHART_SIZE,
      anchorSide: "top_left",
      fontSize: 0.3,
    },
  )

  return {
    title: "Meeting point benchmark timings",
    coordinateSystem: "cartesian",
    lines: lineList,
    points: pointList,
    texts: textList,
  }
}

const BAR_WIDTH = 0.6

/**
 * One bar per benchmark that timed both algorithms, with height equal to the
 * bfs / fast speedup, and a reference line at 1 (no speedup).
 */
export function buildSpeedupChart(
  results: readonly BenchmarkResult[],
): GraphicsObject {
  const rectList: NonNullable<GraphicsObject["rects"]> = []
  const textList: NonNullable<GraphicsObject["texts"]> = []

  const compared = results.filter((result) => result.comparison)
  compared.forEach((result, index) => {
    const speedup = result.comparison?.speedup ?? 1
    rectList.push({
      center: { x: index + 0.5, y: speedup / 2 },
      width: BAR_WIDTH,
      height: speedup,
      fill: "rgba(16, 185, 129, 0.7)",
      stroke: "#10b981",
      label: `${result.name}: ${speedup.toFixed(2)}x`,
    })
    textList.push({
      text: result.name,
      x: index + 0.5,
      y: 0,
      anchorSide: "top_center",
      fontSize: 0.2,
    })
  })

  return {
    title: "Fast path speedup over BFS",
    coordinateSystem: "cartesian",
    rects: rectList,
    lines: [
      {
        points: [
          { x: 0, y: 1 },
          { x: Math.max(1, compared.length), y: 1 },
        ],
        strokeColor: "#ef4444",
        strokeWidth: 0.02,
        label: "No speedup",
      },
    ],
    texts: textList,
  }
}
