/**
 * Proxy Sheets – Card Model
 *
 * PURPOSE:
 *   Defines the compiled Card, Printing and Insert records and the zod schemas that validate
 *   them whenever a manifest is read back from disk.
 *
 * FIELD OVERVIEW:
 *   - Card.id:            Dataset card id (e.g. "hoshiko_shiro_untold_protagonist") or an override id
 *   - Card.group:         Locale/edition namespace the card is printed in (e.g. "english")
 *   - Card.faces:         Alternate face titles; face 1 is the front and carries the card title
 *   - Card.variants:      Number of variant arts, only present when there are at least two
 *   - Printing.id:        Zero-padded code, plus `.<ordinal>` for a face or variant ("01001", "26066.2")
 *   - Printing.code:      The integer dataset printing number
 *   - Insert.insertGroups: Groups of physical inserts the item is bundled with
 */

import { z } from 'zod';

export const titleSchema = z
  .object({
    title: z.string().min(1),
    strippedTitle: z.string().min(1),
  })
  .strict();

export type Title = z.infer<typeof titleSchema>;

export const printingSchema = z
  .object({
    id: z.string().regex(/^\d{5,}(\.\d+)?$/, 'printing id must be a padded code with an optional ordinal'),
    code: z.number().int().nonnegative(),
    name: z.string(),
    face: z.number().int().min(1).optional(),
    variant: z.number().int().min(1).optional(),
  })
  .strict();

export type Printing = z.infer<typeof printingSchema>;

export const cardSchema = z
  .object({
    id: z.string().min(1),
    group: z.string().min(1),
    title: z.string().min(1),
    strippedTitle: z.string().min(1),
    faces: z.array(titleSchema),
    variants: z.number().int().min(2).optional(),
    printings: z.array(printingSchema).min(1),
  })
  .strict();

export type Card = z.infer<typeof cardSchema>;

export const insertSchema = z
  .object({
    id: z.string().min(1),
    group: z.string().min(1),
    title: z.string().min(1),
    strippedTitle: z.string().min(1),
    insertGroups: z.array(z.string()),
  })
  .strict();

export type Insert = z.infer<typeof insertSchema>;

/** How one printing code expands into printing records. */
export type CardShape =
  | { kind: 'single' }
  | { kind: 'faces'; faces: Title[] }
  | { kind: 'variants'; count: number };

export function shapeOf(card: Pick<Card, 'faces' | 'variants'>): CardShape {
  if (card.faces.length > 0) return { kind: 'faces', faces: card.faces };
  if (card.variants !== undefined) return { kind: 'variants', count: card.variants };
  return { kind: 'single' };
}

export function sameShape(a: CardShape, b: CardShape): boolean {
  if (a.kind === 'faces' && b.kind === 'faces') {
    return (
      a.faces.length === b.faces.length &&
      a.faces.every((face, i) => face.title === b.faces[i]?.title)
    );
  }
  if (a.kind === 'variants' && b.kind === 'variants') return a.count === b.count;
  return a.kind === b.kind;
}

/**
 * Removes every non-ASCII character from a title. A title made only of non-ASCII characters
 * is kept as it is.
 */
export function stripNonAscii(title: string): string {
  const stripped = Array.from(title)
    .filter((char) => (char.codePointAt(0) ?? 0) < 0x80)
    .join('');
  return stripped.length > 0 ? stripped : title;
}

export function makeTitle(title: string, strippedTitle?: string): Title {
  return { title, strippedTitle: strippedTitle ?? stripNonAscii(title) };
}

/** Ordinal of a face or variant printing, or undefined for a single-faced printing. */
export function printingOrdinal(printing: Printing): number | undefined {
  return printing.face ?? printing.variant;
}

/** Formats the printing identifier, which is also the stem of the printing's image file. */
export function printingId(code: number, ordinal?: number): string {
  const padded = String(code).padStart(5, '0');
  return ordinal === undefined ? padded : `${padded}.${ordinal}`;
}

/**
 * Deterministic id ordering: ids made only of digits compare numerically (by length, then
 * digit by digit), everything else by UTF-16 code unit. Never locale-dependent.
 */
export function compareIds(a: string, b: string): number {
  const digitsA = /^\d+$/.test(a);
  const digitsB = /^\d+$/.test(b);
  if (digitsA && digitsB) {
    const trimmedA = a.replace(/^0+(?=\d)/, '');
    const trimmedB = b.replace(/^0+(?=\d)/, '');
    if (trimmedA.length !== trimmedB.length) return trimmedA.length - trimmedB.length;
    if (trimmedA !== trimmedB) return trimmedA < trimmedB ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Orders printings by code, then by ordinal (single-faced first). */
export function comparePrintings(a: Printing, b: Printing): number {
  if (a.code !== b.code) return a.code - b.code;
  return (printingOrdinal(a) ?? 0) - (printingOrdinal(b) ?? 0);
}
