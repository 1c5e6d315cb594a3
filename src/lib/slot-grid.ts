import type { Slot } from '@/types/booking';
import { isFilledCell } from './validators';

export type GridCell = string | number | boolean | null | undefined;
export type Grid = ReadonlyArray<ReadonlyArray<GridCell>>;

function cellText(value: GridCell): string {
  return value === null || value === undefined ? '' : String(value).trim();
}

export function slotLabel(dateCell: GridCell, headerCell: GridCell, col: number): string {
  const header = cellText(headerCell);
  return `${cellText(dateCell)} - ${header || `Vaga ${col}`}`;
}

/**
 * Row-major scan for empty slot cells. Row 0 is the header and rows without a
 * date are skipped; the scan stops as soon as `maxCount` slots are found.
 */
export function findOpenSlots(grid: Grid, maxCount: number): Slot[] {
  const slots: Slot[] = [];
  if (maxCount <= 0) return slots;

  const header = grid[0] ?? [];
  for (let row = 1; row < grid.length; row++) {
    const cells = grid[row] ?? [];
    if (!isFilledCell(cells[0])) continue;

    const width = Math.max(header.length, cells.length);
    for (let col = 1; col < width; col++) {
      if (isFilledCell(cells[col])) continue;
      slots.push({ row, col, label: slotLabel(cells[0], header[col], col) });
      if (slots.length >= maxCount) return slots;
    }
  }
  return slots;
}

/** 0-based column index to A1 letters: 0 → A, 25 → Z, 26 → AA. */
export function columnLetter(col: number): string {
  let letters = '';
  let n = col + 1;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function quoteSheet(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

/** A1 reference of a 0-based (row, col) cell, sheet name quoted. */
export function cellReference(sheetName: string, row: number, col: number): string {
  return `${quoteSheet(sheetName)}!${columnLetter(col)}${row + 1}`;
}
