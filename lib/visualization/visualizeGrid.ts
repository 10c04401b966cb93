import type { GraphicsObject } from "graphics-debug"
import { MEETING_POINT_CONFIG } from "../../meeting-point.config"
import type { GridCell, MeetingPoint, RawGrid } from "../types/grid-types"
import { getGridDimensions } from "../grid/buildGridModel"
import { classifyCell } from "../grid/classifyCell"
import { getColorForCellKind } from "./getColorForCellKind"

export type VisualizeGridOptions = {
  title?: string
  /** Per-cell label text, e.g. accumulated distances. */
  cellLabel?: (cell: GridCell) => string | undefined
  /** Cells drawn with a highlighted outline (e.g. the row being scanned). */
  highlightedCells?: readonly GridCell[]
  meetingPoint?: MeetingPoint | null
}

/** Center of a grid cell in graphics space; row 0 is drawn at the top. */
export const getCellCenter = (cell: GridCell): { x: number; y: number } => {
  const size = MEETING_POINT_CONFIG.CELL_SIZE
  return {
    x: cell.col * size + size / 2,
    y: -(cell.row * size + size / 2),
  }
}

export function visualizeGrid(
  grid: RawGrid,
  options: VisualizeGridOptions = {},
): GraphicsObject {
  const rectList: NonNullable<GraphicsObject["rects"]> = []
  const pointList: NonNullable<GraphicsObject["points"]> = []
  const size = MEETING_POINT_CONFIG.CELL_SIZE
  const { rows, cols } = getGridDimensions(grid)

  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const kind = classifyCell(grid[row]![col]!)
      const colors = getColorForCellKind(kind)
      const extraLabel = options.cellLabel?.({ row, col })
      rectList.push({
        center: getCellCenter({ row, col }),
        width: size,
        height: size,
        fill: colors.fill,
        stroke: colors.stroke,
        layer: kind,
        label: extraLabel
          ? `${kind} (${row},${col})\n${extraLabel}`
          : `${kind} (${row},${col})`,
      })
    }
  }

  for (const cell of options.highlightedCells ?? []) {
    rectList.push({
      center: getCellCenter(cell),
      width: size,
      height: size,
      fill: "none",
      stroke: "#f59e0b",
      layer: "highlight",
      label: "active",
    })
  }

  if (options.meetingPoint) {
    pointList.push({
      ...getCellCenter(options.meetingPoint),
      color: "#10b981",
      label: `meeting point (${options.meetingPoint.row},${options.meetingPoint.col})\ntotal distance: ${options.meetingPoint.totalDistance}`,
    })
  }

  return {
    title: options.title ?? `Grid ${rows}x${cols}`,
    rects: rectList,
    points: pointList,
  }
}
