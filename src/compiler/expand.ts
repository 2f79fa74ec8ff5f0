/**
 * Proxy Sheets – Face/Variant Expansion
 *
 * Turns each draft printing declaration into concrete Printing records. A flip card yields one
 * printing per face (`code.1` is the front), a variant card one per variant art (`code.1 … code.N`),
 * and a single-faced card one printing with the bare code. Runs before any remap or uniqueness
 * check, so conflict detection always sees the flat record set.
 */

import { printingId, type Card, type Printing } from '../models/Card';
import type { DraftCard, DraftPrinting } from './types';

export function expandPrinting(card: Pick<DraftCard, 'title' | 'shape'>, declared: DraftPrinting): Printing[] {
  const { code, name } = declared;
  switch (card.shape.kind) {
    case 'single':
      return [{ id: printingId(code), code, name }];
    case 'faces': {
      const titles = [card.title, ...card.shape.faces.map((face) => face.title)];
      return titles.map((title, i) => ({
        id: printingId(code, i + 1),
        code,
        name: `${name} (${title})`,
        face: i + 1,
      }));
    }
    case 'variants': {
      const printings: Printing[] = [];
      for (let variant = 1; variant <= card.shape.count; variant++) {
        printings.push({
          id: printingId(code, variant),
          code,
          name: `${name} (variant ${variant})`,
          variant,
        });
      }
      return printings;
    }
  }
}

/** Expands a draft card into a compiled Card. */
export function expandCard(draft: DraftCard): Card {
  const card: Card = {
    id: draft.id,
    group: draft.group,
    title: draft.title,
    strippedTitle: draft.strippedTitle,
    faces: draft.shape.kind === 'faces' ? draft.shape.faces : [],
    printings: draft.printings.flatMap((declared) => expandPrinting(draft, declared)),
  };
  if (draft.shape.kind === 'variants') card.variants = draft.shape.count;
  return card;
}
