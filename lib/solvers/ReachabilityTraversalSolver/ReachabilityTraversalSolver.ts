import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import { MEETING_POINT_CONFIG } from "../../../meeting-point.config"
import type { GridCell, MeetingPoint, RawGrid } from "../../types/grid-types"
import { findHouses } from "../../grid/buildGridModel"
import { visualizeGrid } from "../../visualization/visualizeGrid"
import { initTraversalState } from "./initTraversalState"
import { stepTraversal } from "./traverseFromHouse"
import { findBestMeetingCell } from "./findBestMeetingCell"
import type { TraversalState } from "./types"

export type ReachabilityTraversalSolverInput = {
  grid: RawGrid
  /** Derived from the grid when omitted. */
  houses?: GridCell[]
}

export type ReachabilityTraversalSolverOutput = {
  totalDistance: number
  meetingPoint: MeetingPoint | null
}

/**
 * Incremental form of the obstacle-aware search: one house traversal per
 * step, then a final step that picks the best fully reachable cell.
 */
export class ReachabilityTraversalSolver extends BaseSolver {
  private state!: TraversalState
  private meetingPoint: MeetingPoint | null = null

  constructor(private input: ReachabilityTraversalSolverInput) {
    super()
  }

  override _setup() {
    const houses = this.input.houses ?? findHouses(this.input.grid)
    this.state = initTraversalState(this.input.grid, houses)
    this.meetingPoint = null
    // One step per house, the selection step, and one spare
    this.MAX_ITERATIONS = houses.length + 2

    this.stats = {
      houseCount: houses.length,
      housesTraversed: 0,
      generation: this.state.generation,
    }
  }

  /** Exactly ONE house traversal (or the final selection) per call. */
  override _step() {
    if (stepTraversal(this.state)) {
      this.stats.housesTraversed = this.state.houseIndex
      this.stats.generation = this.state.generation
      return
    }

    this.meetingPoint = findBestMeetingCell(this.state)
    this.stats.bestTotalDistance = this.meetingPoint?.totalDistance
    this.solved = true
  }

  computeProgress(): number {
    if (this.solved) return 1
    if (!this.state) return 0
    // Reserve the last slot for the selection step
    return this.state.houseIndex / (this.state.houses.length + 1)
  }

  getOutput(): ReachabilityTraversalSolverOutput {
    if (this.failed) {
      return {
        totalDistance: MEETING_POINT_CONFIG.NO_MEETING_POINT,
        meetingPoint: null,
      }
    }
    return {
      totalDistance:
        this.meetingPoint?.totalDistance ??
        MEETING_POINT_CONFIG.NO_MEETING_POINT,
      meetingPoint: this.meetingPoint,
    }
  }

  override visualize(): GraphicsObject {
    const state = this.state
    const nextHouse = state?.houses[state.houseIndex]
    return visualizeGrid(this.input.grid, {
      title: "ReachabilityTraversalSolver",
      highlightedCells: nextHouse ? [nextHouse] : [],
      cellLabel: ({ row, col }) => {
        if (!state) return undefined
        const index = row * state.cols + col
        const reached = state.reachCounts[index]
        if (!reached) return undefined
        return `sum: ${state.distanceSums[index]}, reached by: ${reached}/${state.houses.length}`
      },
      meetingPoint: this.meetingPoint,
    })
  }
}
