import { writeFileSync } from "node:fs"
import { getSvgFromGraphicsObject } from "graphics-debug"
import { BENCHMARK_CONFIG } from "../meeting-point.config"
import {
  buildBenchmarkChart,
  buildSpeedupChart,
} from "../lib/benchmark/buildBenchmarkChart"
import {
  formatBenchmarkDetails,
  formatBenchmarkReport,
  formatNumericalSummary,
} from "../lib/benchmark/formatBenchmarkReport"
import { runBenchmarks } from "../lib/benchmark/runBenchmarks"

console.log("=== Optimal Meeting Point Benchmarks ===\n")

const results = runBenchmarks()
for (const result of results) {
  console.log(formatBenchmarkDetails(result).join("\n"))
  console.log("-".repeat(60))
}

console.log("\n=== Summary ===")
console.log(formatBenchmarkReport(results))

console.log("\n=== Numerical Summary ===")
console.log(formatNumericalSummary(results))

writeFileSync(
  BENCHMARK_CONFIG.CHART_OUTPUT_PATH,
  getSvgFromGraphicsObject(buildBenchmarkChart(results)),
)
writeFileSync(
  BENCHMARK_CONFIG.SPEEDUP_CHART_OUTPUT_PATH,
  getSvgFromGraphicsObject(buildSpeedupChart(results)),
)
console.log("\nCharts written to:")
console.log(`  - ${BENCHMARK_CONFIG.CHART_OUTPUT_PATH}`)
console.log(`  - ${BENCHMARK_CONFIG.SPEEDUP_CHART_OUTPUT_PATH}`)
