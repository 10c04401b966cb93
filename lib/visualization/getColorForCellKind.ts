import type { CellKind } from "../types/grid-types"

export const getColorForCellKind = (
  kind: CellKind,
): {
  fill: string
  stroke: string
} => {
  const colors = {
    empty: { fill: "#f9fafb", stroke: "#d1d5db" },
    house: { fill: "#dbeafe", stroke: "#3b82f6" },
    obstacle: { fill: "#fecaca", stroke: "#ef4444" },
  } as const
  return colors[kind]
}
