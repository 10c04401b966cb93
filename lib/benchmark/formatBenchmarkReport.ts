import type { BenchmarkResult } from "./runBenchmarks"

const formatPercent = (fraction: number) => `${(fraction * 100).toFixed(1)}%`

const formatTiming = (meanMs: number, stdMs: number) =>
  `${meanMs.toFixed(4)}ms ± ${stdMs.toFixed(4)}ms`

/** Per-benchmark detail lines, printed as each benchmark finishes. */
export function formatBenchmarkDetails(result: BenchmarkResult): string[] {
  const lines = [
    `Testing: ${result.name} (${result.rows}x${result.cols})`,
    `House density: ${formatPercent(result.houseDensity)}, Obstacle density: ${formatPercent(result.obstacleDensity)}`,
    `Grid composition: ${result.houses} houses, ${result.obstacles} obstacles, ${result.empty} empty`,
    `Main algorithm: ${formatTiming(result.main.meanMs, result.main.stdMs)} (result: ${result.main.result})`,
  ]

  const { comparison } = result
  if (comparison) {
    lines.push(
      `Fast algorithm: ${formatTiming(comparison.fast.meanMs, comparison.fast.stdMs)} (result: ${comparison.fast.result})`,
      `BFS algorithm:  ${formatTiming(comparison.bfs.meanMs, comparison.bfs.stdMs)} (result: ${comparison.bfs.result})`,
      comparison.resultsMatch
        ? "Fast and BFS results match"
        : "Fast and BFS results differ!",
    )
    if (comparison.speedup !== null) {
      lines.push(`Fast algorithm speedup: ${comparison.speedup.toFixed(2)}x`)
    }
  }

  return lines
}

/** Fixed-width summary table, one row per benchmark. */
export function formatBenchmarkReport(
  results: readonly BenchmarkResult[],
): string {
  const header = [
    "Test Case".padEnd(24),
    "Size".padEnd(10),
    "Houses".padEnd(8),
    "Time (ms)".padEnd(20),
    "Result",
  ].join(" ")

  const rows = results.map((result) =>
    [
      result.name.padEnd(24),
      `${result.rows}x${result.cols}`.padEnd(10),
      String(result.houses).padEnd(8),
      `${result.main.meanMs.toFixed(4)}±${result.main.stdMs.toFixed(3)}`.padEnd(
        20,
      ),
      String(result.main.result),
    ].join(" "),
  )

  return [header, "-".repeat(header.length), ...rows].join("\n")
}

/**
 * Timing comparison for the benchmarks that ran both algorithms, followed by
 * the average speedup (over benchmarks where the scan won) and the largest
 * grid timed.
 */
export function formatNumericalSummary(
  results: readonly BenchmarkResult[],
): string {
  const header = [
    "Grid".padEnd(24),
    "Size".padEnd(8),
    "Main".padEnd(12),
    "Fast".padEnd(12),
    "BFS".padEnd(12),
    "Speedup",
  ].join(" ")
  const lines = [header, "-".repeat(header.length)]

  const speedups: number[] = []
  for (const result of results) {
    const { comparison } = result
    if (!comparison) continue
    const speedup = comparison.speedup ?? 1
    if (speedup > 1) speedups.push(speedup)

    lines.push(
      [
        result.name.padEnd(24),
        String(result.rows * result.cols).padEnd(8),
        `${result.main.meanMs.toFixed(4)}ms`.padEnd(12),
        `${comparison.fast.meanMs.toFixed(4)}ms`.padEnd(12),
        `${comparison.bfs.meanMs.toFixed(4)}ms`.padEnd(12),
        `${speedup.toFixed(2)}x`,
      ].join(" "),
    )
  }

  if (speedups.length > 0) {
    const average = speedups.reduce((sum, s) => sum + s, 0) / speedups.length
    lines.push("", `Average Fast Path Speedup: ${average.toFixed(2)}x`)
  }

  const largest = results.reduce<BenchmarkResult | undefined>(
    (best, result) =>
      !best || result.rows * result.cols > best.rows * best.cols ? result : best,
    undefined,
  )
  if (largest) {
    lines.push(
      `Largest grid tested: ${largest.rows}x${largest.cols} (${largest.rows * largest.cols} cells) in ${largest.main.meanMs.toFixed(4)}ms`,
    )
  }

  return lines.join("\n")
}
