/**
 * Proxy Sheets – Print Geometry Profiles
 *
 * All lengths are millimetres. A bleed mode names the total extra width and height added
 * around one card, so each side of the trim gets half of it.
 */

import { z } from 'zod';

export const PAPER_SIZES = {
  a4: { width: 210, height: 297 },
  letter: { width: 215.9, height: 279.4 },
} as const;

export type PaperSize = keyof typeof PAPER_SIZES;

export const BLEED_MODES = {
  none: 0,
  narrow: 2,
  medium: 4,
  wide: 6,
} as const;

export type BleedMode = keyof typeof BLEED_MODES;

export const CUT_INDICATORS = ['marks', 'lines', 'none'] as const;

export type CutIndicator = (typeof CUT_INDICATORS)[number];

const IN_TO_MM = 25.4;

/** Poker-size card (2.5 × 3.5 in) printed at 98%. */
export const CARD_WIDTH_MM = 2.5 * IN_TO_MM * 0.98;
export const CARD_HEIGHT_MM = 3.5 * IN_TO_MM * 0.98;

/** Guide lines run this far past the outer edge of the grid. */
export const LINE_OVERHANG_MM = 0.25 * IN_TO_MM;

export const DEFAULT_MARK_LENGTH_MM = 3;

export interface SheetProfile {
  pageWidth: number;
  pageHeight: number;
  cardWidth: number;
  cardHeight: number;
  /** Margin added on every side of the trim rectangle. */
  bleed: number;
  /** Space between neighbouring drawable rectangles. */
  gutter: number;
  cutIndicator: CutIndicator;
  markLength: number;
  rows: number;
  columns: number;
}

export const profileOptionsSchema = z
  .object({
    paper: z.enum(['a4', 'letter']).default('a4'),
    bleed: z.enum(['none', 'narrow', 'medium', 'wide']).default('none'),
    cut: z.enum(CUT_INDICATORS).default('marks'),
    rows: z.number().int().default(3),
    columns: z.number().int().default(3),
    gutter: z.number().default(0),
    markLength: z.number().default(DEFAULT_MARK_LENGTH_MM),
  })
  .strict();

export type ProfileOptions = z.input<typeof profileOptionsSchema>;

/**
 * Builds a profile from preset names. Range checks happen in validateProfile.
 */
export function buildProfile(options: ProfileOptions = {}): SheetProfile {
  const resolved = profileOptionsSchema.parse(options);
  const paper = PAPER_SIZES[resolved.paper];
  return {
    pageWidth: paper.width,
    pageHeight: paper.height,
    cardWidth: CARD_WIDTH_MM,
    cardHeight: CARD_HEIGHT_MM,
    bleed: BLEED_MODES[resolved.bleed] / 2,
    gutter: resolved.gutter,
    cutIndicator: resolved.cut,
    markLength: resolved.markLength,
    rows: resolved.rows,
    columns: resolved.columns,
  };
}

/** Pixel size of a drawable rectangle at the given print resolution. */
export function mmToPixels(mm: number, dpi: number): number {
  return Math.max(1, Math.round((mm / IN_TO_MM) * dpi));
}
