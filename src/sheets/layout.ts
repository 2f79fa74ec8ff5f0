/**
 * Proxy Sheets – Sheet Layout Engine
 *
 * PURPOSE:
 *   Maps an ordered selection onto fixed-capacity pages. Slots fill strictly in selection order,
 *   row-major from the top left, and only the last page may be partly empty.
 *
 * GEOMETRY:
 *   - trim:      the card's cut rectangle
 *   - drawable:  trim expanded outward by the bleed on every side; the image fills it
 *   - the grid pitch is drawable size + gutter, and the grid is centred on the page
 *   - `marks`:   at each trim corner, one horizontal and one vertical mark starting at the
 *                drawable edge and running outward
 *   - `lines`:   a guide line along every trim edge, running past the grid on both ends
 *
 * Coordinates are millimetres from the top-left corner of the page.
 */

import { LayoutError } from '../utils/errors';
import { LINE_OVERHANG_MM, type SheetProfile } from './geometry';

const EPSILON = 1e-6;

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Segment {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface PlacedSlot<T> {
  /** Position of the entry in the selection. */
  index: number;
  page: number;
  /** Position on the page, row-major. */
  position: number;
  row: number;
  column: number;
  trim: Rect;
  drawable: Rect;
  entry: T;
}

export interface SheetPage<T> {
  index: number;
  /** Exactly `capacity` entries; null marks an empty slot. */
  slots: Array<PlacedSlot<T> | null>;
  cutGuides: Segment[];
}

export interface SheetPlan<T> {
  profile: SheetProfile;
  capacity: number;
  pages: Array<SheetPage<T>>;
}

function positive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function nonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function gridSize(profile: SheetProfile): { width: number; height: number } {
  const cellWidth = profile.cardWidth + 2 * profile.bleed;
  const cellHeight = profile.cardHeight + 2 * profile.bleed;
  return {
    width: profile.columns * cellWidth + (profile.columns - 1) * profile.gutter,
    height: profile.rows * cellHeight + (profile.rows - 1) * profile.gutter,
  };
}

export function validateProfile(profile: SheetProfile): void {
  if (!Number.isInteger(profile.rows) || profile.rows <= 0) {
    throw new LayoutError(`rows must be a positive integer, got ${profile.rows}`, { ids: ['rows'] });
  }
  if (!Number.isInteger(profile.columns) || profile.columns <= 0) {
    throw new LayoutError(`columns must be a positive integer, got ${profile.columns}`, { ids: ['columns'] });
  }
  for (const field of ['pageWidth', 'pageHeight', 'cardWidth', 'cardHeight'] as const) {
    if (!positive(profile[field])) {
      throw new LayoutError(`${field} must be positive, got ${profile[field]}`, { ids: [field] });
    }
  }
  for (const field of ['bleed', 'gutter', 'markLength'] as const) {
    if (!nonNegative(profile[field])) {
      throw new LayoutError(`${field} must not be negative, got ${profile[field]}`, { ids: [field] });
    }
  }

  const grid = gridSize(profile);
  if (grid.width > profile.pageWidth + EPSILON || grid.height > profile.pageHeight + EPSILON) {
    throw new LayoutError(
      `a ${profile.rows}x${profile.columns} grid needs ${grid.width.toFixed(2)} x ${grid.height.toFixed(2)} mm ` +
        `but the page is ${profile.pageWidth} x ${profile.pageHeight} mm`,
      { ids: ['rows', 'columns'] }
    );
  }
}

/** Trim and drawable rectangles of one grid position. */
export function slotRects(profile: SheetProfile, row: number, column: number): { trim: Rect; drawable: Rect } {
  const grid = gridSize(profile);
  const originX = (profile.pageWidth - grid.width) / 2;
  const originY = (profile.pageHeight - grid.height) / 2;
  const pitchX = profile.cardWidth + 2 * profile.bleed + profile.gutter;
  const pitchY = profile.cardHeight + 2 * profile.bleed + profile.gutter;

  const drawable: Rect = {
    x: originX + column * pitchX,
    y: originY + row * pitchY,
    width: profile.cardWidth + 2 * profile.bleed,
    height: profile.cardHeight + 2 * profile.bleed,
  };
  const trim: Rect = {
    x: drawable.x + profile.bleed,
    y: drawable.y + profile.bleed,
    width: profile.cardWidth,
    height: profile.cardHeight,
  };
  return { trim, drawable };
}

/** Eight marks per slot, two at each trim corner, outside the drawable rectangle. */
export function cropMarks(trim: Rect, drawable: Rect, length: number): Segment[] {
  const left = drawable.x;
  const right = drawable.x + drawable.width;
  const top = drawable.y;
  const bottom = drawable.y + drawable.height;
  const trimRight = trim.x + trim.width;
  const trimBottom = trim.y + trim.height;

  return [
    // top-left
    { x1: left - length, y1: trim.y, x2: left, y2: trim.y },
    { x1: trim.x, y1: top - length, x2: trim.x, y2: top },
    // top-right
    { x1: right, y1: trim.y, x2: right + length, y2: trim.y },
    { x1: trimRight, y1: top - length, x2: trimRight, y2: top },
    // bottom-left
    { x1: left - length, y1: trimBottom, x2: left, y2: trimBottom },
    { x1: trim.x, y1: bottom, x2: trim.x, y2: bottom + length },
    // bottom-right
    { x1: right, y1: trimBottom, x2: right + length, y2: trimBottom },
    { x1: trimRight, y1: bottom, x2: trimRight, y2: bottom + length },
  ];
}

function uniqueSorted(values: number[]): number[] {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted.filter((value, i) => i === 0 || Math.abs(value - (sorted[i - 1] ?? value)) > EPSILON);
}

/** Full-length guide lines along every trim edge of the grid. */
export function guideLines(profile: SheetProfile): Segment[] {
  const xs: number[] = [];
  const ys: number[] = [];
  for (let column = 0; column < profile.columns; column++) {
    const { trim } = slotRects(profile, 0, column);
    xs.push(trim.x, trim.x + trim.width);
  }
  for (let row = 0; row < profile.rows; row++) {
    const { trim } = slotRects(profile, row, 0);
    ys.push(trim.y, trim.y + trim.height);
  }

  const grid = gridSize(profile);
  const left = (profile.pageWidth - grid.width) / 2 - LINE_OVERHANG_MM;
  const right = (profile.pageWidth + grid.width) / 2 + LINE_OVERHANG_MM;
  const top = (profile.pageHeight - grid.height) / 2 - LINE_OVERHANG_MM;
  const bottom = (profile.pageHeight + grid.height) / 2 + LINE_OVERHANG_MM;

  return [
    ...uniqueSorted(xs).map((x) => ({ x1: x, y1: top, x2: x, y2: bottom })),
    ...uniqueSorted(ys).map((y) => ({ x1: left, y1: y, x2: right, y2: y })),
  ];
}

/**
 * Lays the entries out on pages. Throws LayoutError for an unusable profile or an empty selection.
 */
export function planSheets<T>(entries: ReadonlyArray<T>, profile: SheetProfile): SheetPlan<T> {
  validateProfile(profile);
  if (entries.length === 0) {
    throw new LayoutError('the selection is empty; nothing to lay out');
  }

  const capacity = profile.rows * profile.columns;
  const pageCount = Math.ceil(entries.length / capacity);
  const lines = profile.cutIndicator === 'lines' ? guideLines(profile) : [];
  const pages: Array<SheetPage<T>> = Array.from({ length: pageCount }, (_, index) => ({
    index,
    slots: [],
    cutGuides: [...lines],
  }));

  entries.forEach((entry, index) => {
    const page = Math.floor(index / capacity);
    const position = index % capacity;
    const row = Math.floor(position / profile.columns);
    const column = position % profile.columns;
    const { trim, drawable } = slotRects(profile, row, column);
    const target = pages[page];
    if (!target) return;
    target.slots.push({ index, page, position, row, column, trim, drawable, entry });
    if (profile.cutIndicator === 'marks') {
      target.cutGuides.push(...cropMarks(trim, drawable, profile.markLength));
    }
  });

  for (const page of pages) {
    while (page.slots.length < capacity) page.slots.push(null);
  }

  return { profile, capacity, pages };
}
