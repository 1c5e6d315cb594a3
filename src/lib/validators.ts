export function isValidGridRow(index: number | undefined | null): index is number {
  return typeof index === 'number' && Number.isInteger(index) && index > 0;
}

export function isValidSlotColumn(index: number | undefined | null): index is number {
  return typeof index === 'number' && Number.isInteger(index) && index > 0;
}

export function isFilledCell(value: unknown): boolean {
  return value !== null && value !== undefined && String(value).trim() !== '';
}
