import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import { MEETING_POINT_CONFIG } from "../../../meeting-point.config"
import type {
  AlgorithmSelection,
  MeetingPoint,
  MeetingPointAlgorithm,
  RawGrid,
} from "../../types/grid-types"
import { visualizeGrid } from "../../visualization/visualizeGrid"
import { SeparableScanSolver } from "../SeparableScanSolver/SeparableScanSolver"
import { ReachabilityTraversalSolver } from "../ReachabilityTraversalSolver/ReachabilityTraversalSolver"
import { selectAlgorithm } from "./selectAlgorithm"

export type MeetingPointSolverInput = {
  grid: RawGrid
}

export type MeetingPointSolverOutput = {
  /** null when the grid is empty or has no houses. */
  algorithm: MeetingPointAlgorithm | null
  totalDistance: number
  meetingPoint: MeetingPoint | null
}

/**
 * Classifies the grid once, then steps the matching sub-solver until it is
 * done.
 */
export class MeetingPointSolver extends BaseSolver {
  selection!: AlgorithmSelection
  subSolver?: SeparableScanSolver | ReachabilityTraversalSolver

  constructor(private input: MeetingPointSolverInput) {
    super()
  }

  override _setup() {
    const { grid } = this.input
    this.selection = selectAlgorithm(grid)

    if (this.selection.kind === "separable-scan") {
      this.subSolver = new SeparableScanSolver({
        grid,
        houses: this.selection.houses,
      })
    } else if (this.selection.kind === "reachability-traversal") {
      this.subSolver = new ReachabilityTraversalSolver({
        grid,
        houses: this.selection.houses,
      })
    } else {
      this.subSolver = undefined
    }
    this.subSolver?.setup()
    // The sub-solver's own budget, plus this solver's finishing step
    this.MAX_ITERATIONS = (this.subSolver?.MAX_ITERATIONS ?? 0) + 1

    this.stats = {
      algorithm: this.selection.kind,
    }
  }

  override _step() {
    if (!this.subSolver) {
      this.solved = true
      return
    }

    this.subSolver.step()
    this.stats = {
      algorithm: this.selection.kind,
      ...this.subSolver.stats,
    }

    if (this.subSolver.failed) {
      this.failed = true
      this.error = this.subSolver.error
      return
    }
    if (this.subSolver.solved) this.solved = true
  }

  computeProgress(): number {
    if (this.solved) return 1
    return this.subSolver?.computeProgress() ?? 0
  }

  getOutput(): MeetingPointSolverOutput {
    if (!this.subSolver || this.selection.kind === "none") {
      return {
        algorithm: null,
        totalDistance: MEETING_POINT_CONFIG.NO_MEETING_POINT,
        meetingPoint: null,
      }
    }
    if (this.failed) {
      return {
        algorithm: this.selection.kind,
        totalDistance: MEETING_POINT_CONFIG.NO_MEETING_POINT,
        meetingPoint: null,
      }
    }
    return {
      algorithm: this.selection.kind,
      ...this.subSolver.getOutput(),
    }
  }

  override visualize(): GraphicsObject {
    if (this.subSolver) return this.subSolver.visualize()
    return visualizeGrid(this.input.grid, { title: "MeetingPointSolver" })
  }
}
