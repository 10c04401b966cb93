import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import { MEETING_POINT_CONFIG } from "../../../meeting-point.config"
import type { GridCell, MeetingPoint, RawGrid } from "../../types/grid-types"
import { findHouses, getGridDimensions } from "../../grid/buildGridModel"
import { visualizeGrid } from "../../visualization/visualizeGrid"
import { computeAxisCosts } from "./computeAxisCosts"
import { scanRow } from "./scanNoObstacles"

export type SeparableScanSolverInput = {
  grid: RawGrid
  /** Derived from the grid when omitted. */
  houses?: GridCell[]
}

export type SeparableScanSolverOutput = {
  totalDistance: number
  meetingPoint: MeetingPoint | null
}

/**
 * Incremental form of the obstacle-free scan: axis costs are computed in
 * setup, then each step scans one grid row.
 */
export class SeparableScanSolver extends BaseSolver {
  private grid!: RawGrid
  private houses!: GridCell[]
  private rowCosts!: Float64Array
  private colCosts!: Float64Array
  private currentRow!: number
  private best!: MeetingPoint | null

  constructor(private input: SeparableScanSolverInput) {
    super()
  }

  override _setup() {
    const { grid } = this.input
    const { rows, cols } = getGridDimensions(grid)
    this.grid = grid
    this.houses = this.input.houses ?? findHouses(grid)
    this.rowCosts = computeAxisCosts(
      this.houses.map((house) => house.row),
      rows,
    )
    this.colCosts = computeAxisCosts(
      this.houses.map((house) => house.col),
      cols,
    )
    this.currentRow = 0
    this.best = null
    // One step per row, plus the step that finishes an empty grid
    this.MAX_ITERATIONS = rows + 1

    this.stats = {
      rowsScanned: 0,
      houseCount: this.houses.length,
    }
  }

  /** Scans exactly one row per call. */
  override _step() {
    if (this.currentRow >= this.rowCosts.length) {
      this.solved = true
      return
    }

    const scanned = scanRow(
      this.grid,
      this.currentRow,
      this.rowCosts,
      this.colCosts,
    )
    if (
      scanned &&
      (!this.best || scanned.totalDistance < this.best.totalDistance)
    ) {
      this.best = scanned
    }
    this.currentRow++
    if (this.currentRow >= this.rowCosts.length) this.solved = true

    this.stats.rowsScanned = this.currentRow
    this.stats.bestTotalDistance = this.best?.totalDistance
  }

  computeProgress(): number {
    if (this.solved) return 1
    return this.currentRow / Math.max(1, this.rowCosts.length)
  }

  getOutput(): SeparableScanSolverOutput {
    if (this.failed) {
      return {
        totalDistance: MEETING_POINT_CONFIG.NO_MEETING_POINT,
        meetingPoint: null,
      }
    }
    return {
      totalDistance:
        this.best?.totalDistance ?? MEETING_POINT_CONFIG.NO_MEETING_POINT,
      meetingPoint: this.best,
    }
  }

  override visualize(): GraphicsObject {
    const cols = this.colCosts?.length ?? 0
    const scanningRow =
      this.currentRow < (this.rowCosts?.length ?? 0)
        ? this.currentRow
        : undefined
    return visualizeGrid(this.input.grid, {
      title: "SeparableScanSolver",
      highlightedCells:
        scanningRow === undefined
          ? []
          : Array.from({ length: cols }, (_, col) => ({
              row: scanningRow,
              col,
            })),
      cellLabel: ({ row, col }) =>
        this.rowCosts
          ? `row cost: ${this.rowCosts[row]}, col cost: ${this.colCosts[col]}`
          : undefined,
      meetingPoint: this.best,
    })
  }
}
