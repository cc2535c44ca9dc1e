import type { RawCell } from './types.js';

export function cellToNumber(cell: RawCell | undefined): number | null {
  if (cell === null || cell === undefined) {
    return null;
  }
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  const cleaned = cell.replace(/,/g, '').trim();
  if (!cleaned) {
    return null;
  }
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/** "45.2%" -> 45.2 */
export function cellToPercent(cell: RawCell | undefined): number | null {
  if (typeof cell === 'string') {
    return cellToNumber(cell.replace('%', ''));
  }
  return cellToNumber(cell);
}

export function cellToText(cell: unknown): string | null {
  if (cell === null || cell === undefined) {
    return null;
  }
  if (typeof cell !== 'string' && typeof cell !== 'number') {
    return null;
  }
  const text = String(cell).trim();
  return text.length ? text : null;
}
