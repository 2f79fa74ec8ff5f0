import type { CardShape } from '../models/Card';

/** A printing declaration before face/variant expansion. */
export interface DraftPrinting {
  code: number;
  name: string;
}

/**
 * A card while the compiler is still merging sources into it. `origin` records who created
 * the card and `amendments` how many override entries have edited it since.
 */
export interface DraftCard {
  id: string;
  group: string;
  title: string;
  strippedTitle: string;
  shape: CardShape;
  printings: DraftPrinting[];
  origin: 'dataset' | 'override';
  amendments: number;
}

export function draftKey(group: string, id: string): string {
  return `${group}/${id}`;
}
