/**
 * Proxy Sheets – Selection Builder
 *
 * PURPOSE:
 *   Builds the ordered list of things to print: specific printings, whole cards and inserts.
 *   Every entry is resolved against the catalog up front, so layout and rendering never look
 *   anything up again.
 *
 * RULES:
 *   - A flip card adds every face, front first.
 *   - A variant card adds one variant per copy, rotating to the least-used variant
 *     (lowest ordinal wins ties).
 *   - Any other card adds its newest printing (highest code).
 *
 * DECK LISTS:
 *   One entry per line, `[<count>[x]] <ref>`, where <ref> is a printing id ("26066.2"), a code
 *   ("1001", translated through remaps) or `insert:<group>/<name>`. `#` starts a comment.
 */

import { printingId, type Card, type Insert, type Printing } from '../models/Card';
import type { Catalog } from '../catalog/catalog';
import { LoadError } from '../utils/errors';

export type SelectionEntry =
  | {
      kind: 'printing';
      card: Card;
      printing: Printing;
      name: string;
      imageUrl: string;
    }
  | {
      kind: 'insert';
      insert: Insert;
      name: string;
      imageUrl: string;
    };

/** Short label for logs and error ids. */
export function entryLabel(entry: SelectionEntry): string {
  return entry.kind === 'printing' ? entry.printing.id : `insert:${entry.insert.group}/${entry.insert.id}`;
}

const DECK_LINE = /^(?:(\d+)\s*x?\s+)?(\S+)$/i;
const INSERT_REF = /^insert:([^/\s]+)\/(\S+)$/;
const PRINTING_REF = /^(\d+)\.(\d+)$/;
const CODE_REF = /^\d+$/;

export class SelectionBuilder {
  private readonly selected: SelectionEntry[] = [];
  private readonly variantUsage = new Map<string, number>();

  constructor(private readonly catalog: Catalog) {}

  get entries(): ReadonlyArray<SelectionEntry> {
    return this.selected;
  }

  get size(): number {
    return this.selected.length;
  }

  private printingEntry(card: Card, printing: Printing): SelectionEntry {
    return {
      kind: 'printing',
      card,
      printing,
      name: this.catalog.displayName(card, printing),
      imageUrl: this.catalog.printingImageUrl(card, printing),
    };
  }

  private track(entry: SelectionEntry, delta: 1 | -1): void {
    if (entry.kind !== 'printing' || entry.printing.variant === undefined) return;
    const used = (this.variantUsage.get(entry.printing.id) ?? 0) + delta;
    this.variantUsage.set(entry.printing.id, Math.max(0, used));
  }

  private push(entry: SelectionEntry): SelectionEntry {
    this.selected.push(entry);
    this.track(entry, 1);
    return entry;
  }

  private entryAt(index: number): SelectionEntry {
    const entry = this.selected[index];
    if (entry === undefined) {
      throw new RangeError(`selection index ${index} is out of range (size ${this.selected.length})`);
    }
    return entry;
  }

  /** Picks the printings one copy of `code` contributes, following the card's shape. */
  private printingsForCode(card: Card, code: number): Printing[] {
    const printings = card.printings.filter((printing) => printing.code === code);
    if (card.faces.length > 0) {
      return [...printings].sort((a, b) => (a.face ?? 0) - (b.face ?? 0));
    }
    if (card.variants !== undefined) {
      const next = [...printings].sort(
        (a, b) =>
          (this.variantUsage.get(a.id) ?? 0) - (this.variantUsage.get(b.id) ?? 0) ||
          (a.variant ?? 0) - (b.variant ?? 0)
      )[0];
      return next ? [next] : [];
    }
    return printings.slice(0, 1);
  }

  addPrinting(id: string): SelectionEntry {
    const resolved = this.catalog.findPrinting(id);
    if (!resolved) {
      throw new LoadError(`unknown printing ${id}`, { ids: [id] });
    }
    return this.push(this.printingEntry(resolved.card, resolved.printing));
  }

  /** Adds one copy of the card, using its newest printing. */
  addCard(card: Card): SelectionEntry[] {
    const newest = Math.max(...card.printings.map((printing) => printing.code));
    return this.printingsForCode(card, newest).map((printing) => this.push(this.printingEntry(card, printing)));
  }

  /** Adds one copy of the printing with this code, after remap translation. */
  addCode(code: number): SelectionEntry[] {
    const translated = this.catalog.translateCode(code);
    const card = this.catalog.cardForCode(code);
    if (!card) {
      throw new LoadError(`no card owns printing code ${code}`, { ids: [String(code)] });
    }
    return this.printingsForCode(card, translated).map((printing) =>
      this.push(this.printingEntry(card, printing))
    );
  }

  addInsert(group: string, id: string): SelectionEntry {
    const insert = this.catalog.findInsert(group, id);
    if (!insert) {
      throw new LoadError(`unknown insert ${group}/${id}`, { ids: [`insert:${group}/${id}`] });
    }
    return this.push({
      kind: 'insert',
      insert,
      name: insert.title,
      imageUrl: this.catalog.insertImageUrl(insert),
    });
  }

  remove(index: number): SelectionEntry {
    const entry = this.entryAt(index);
    this.selected.splice(index, 1);
    this.track(entry, -1);
    return entry;
  }

  replace(index: number, id: string): SelectionEntry {
    const previous = this.entryAt(index);
    const resolved = this.catalog.findPrinting(id);
    if (!resolved) {
      throw new LoadError(`unknown printing ${id}`, { ids: [id] });
    }
    const entry = this.printingEntry(resolved.card, resolved.printing);
    this.track(previous, -1);
    this.selected[index] = entry;
    this.track(entry, 1);
    return entry;
  }

  private resolveReference(ref: string, lineNumber: number): () => SelectionEntry[] {
    const insert = INSERT_REF.exec(ref);
    if (insert) {
      const [, group = '', id = ''] = insert;
      if (!this.catalog.findInsert(group, id)) throw unknownReference(ref, lineNumber);
      return () => [this.addInsert(group, id)];
    }

    const printing = PRINTING_REF.exec(ref);
    if (printing) {
      const id = printingId(Number(printing[1]), Number(printing[2]));
      if (!this.catalog.findPrinting(id)) throw unknownReference(ref, lineNumber);
      return () => [this.addPrinting(id)];
    }

    if (CODE_REF.test(ref)) {
      const code = Number.parseInt(ref, 10);
      if (!this.catalog.cardForCode(code)) throw unknownReference(ref, lineNumber);
      return () => this.addCode(code);
    }

    throw unknownReference(ref, lineNumber);
  }

  /**
   * Resolves every line first and only then adds, so a bad line leaves the selection untouched.
   */
  parseDeckList(text: string): SelectionEntry[] {
    const actions: Array<() => SelectionEntry[]> = [];

    text.split(/\r?\n/).forEach((rawLine, i) => {
      const line = rawLine.replace(/#.*$/, '').trim();
      if (line.length === 0) return;

      const match = DECK_LINE.exec(line);
      if (!match) {
        throw new LoadError(`deck list line ${i + 1} is not \`[<count>[x]] <ref>\`: ${line}`, {
          ids: [`line ${i + 1}`],
        });
      }
      const count = match[1] === undefined ? 1 : Number.parseInt(match[1], 10);
      if (count < 1) {
        throw new LoadError(`deck list line ${i + 1} has a count below 1`, { ids: [`line ${i + 1}`] });
      }
      const action = this.resolveReference(match[2] ?? '', i + 1);
      for (let copy = 0; copy < count; copy++) actions.push(action);
    });

    return actions.flatMap((action) => action());
  }
}

function unknownReference(ref: string, lineNumber: number): LoadError {
  return new LoadError(`deck list line ${lineNumber}: unknown reference ${ref}`, { ids: [ref] });
}
