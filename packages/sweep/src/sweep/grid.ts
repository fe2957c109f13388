import type { ParameterGrid } from "../types/config.js";

export interface GridCell {
  buffer: number;
  trailMultiplier: number;
}

/**
 * Cartesian product of the grid, outer loop over buffers, inner over trail multipliers.
 */
export function expandGrid(grid: ParameterGrid): GridCell[] {
  const cells: GridCell[] = [];
  for (const buffer of grid.buffers) {
    for (const trailMultiplier of grid.trailMultipliers) {
      cells.push({ buffer, trailMultiplier });
    }
  }
  return cells;
}

/**
 * Shortest decimal form, but never without a fractional part: `1` prints as `1.0`
 * so a YAML reader still loads the value as a float.
 */
export function formatNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function formatCell(cell: GridCell): string {
  return `(buf=${formatNumber(cell.buffer)}, trail=${formatNumber(cell.trailMultiplier)})`;
}
