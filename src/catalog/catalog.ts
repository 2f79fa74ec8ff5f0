/**
 * Proxy Sheets – Runtime Catalog
 *
 * PURPOSE:
 *   Read-only view over a compiled manifest plus its optional local overlay, used by deck
 *   import, sheet generation and the HTTP service.
 *
 * CONTEXT:
 *   - Neither manifest is mutated. Overlay printings are unioned into the matching primary card,
 *     overlay remaps and local images are appended.
 *   - Legacy printing codes are translated through the remap table before any code lookup.
 *   - A local image override for the exact code, group and face beats the remote image URL.
 */

import {
  printingOrdinal,
  type Card,
  type Insert,
  type Printing,
} from '../models/Card';
import type { LocalImage, Manifest, Remap } from '../models/Manifest';
import { getEnv } from '../utils/config';
import { logInfo } from '../utils/fileHelpers';
import { loadManifestFile, probeLocalOverlay } from './manifestFile';

const TAG = 'catalog';

export interface ResolvedPrinting {
  card: Card;
  printing: Printing;
}

export interface CatalogOptions {
  /** Root of the remote card image tree. Defaults to CARD_IMAGE_URL_ROOT. */
  imageUrlRoot?: string;
}

function key(group: string, id: string): string {
  return `${group}/${id}`;
}

export class Catalog {
  readonly cards: ReadonlyArray<Card>;
  readonly inserts: ReadonlyArray<Insert>;
  readonly remaps: ReadonlyArray<Remap>;
  readonly localImages: ReadonlyArray<LocalImage>;
  readonly collectionNames: ReadonlyMap<string, string>;

  private readonly imageUrlRoot: string;
  private readonly cardsByKey = new Map<string, Card>();
  private readonly printingsById = new Map<string, ResolvedPrinting>();
  private readonly cardsByCode = new Map<number, Card>();
  private readonly remapTable = new Map<number, number>();
  private readonly insertsByKey = new Map<string, Insert>();

  constructor(
    readonly primary: Manifest,
    readonly overlay: Manifest | null = null,
    options: CatalogOptions = {}
  ) {
    this.imageUrlRoot = (options.imageUrlRoot ?? getEnv().CARD_IMAGE_URL_ROOT).replace(/\/+$/, '');

    for (const card of [...primary.cards, ...(overlay?.cards ?? [])]) {
      const existing = this.cardsByKey.get(key(card.group, card.id));
      const combined: Card = existing
        ? { ...existing, printings: [...existing.printings, ...card.printings] }
        : { ...card, printings: [...card.printings] };
      this.cardsByKey.set(key(card.group, card.id), combined);
    }
    this.cards = Array.from(this.cardsByKey.values());

    for (const card of this.cards) {
      for (const printing of card.printings) {
        this.printingsById.set(printing.id, { card, printing });
        this.cardsByCode.set(printing.code, card);
      }
    }

    this.inserts = [...primary.inserts, ...(overlay?.inserts ?? [])];
    for (const insert of this.inserts) this.insertsByKey.set(key(insert.group, insert.id), insert);

    this.remaps = [...primary.remaps, ...(overlay?.remaps ?? [])];
    for (const remap of this.remaps) this.remapTable.set(remap.from, remap.to);

    this.localImages = [...primary.localImages, ...(overlay?.localImages ?? [])];
    this.collectionNames = new Map(
      [...primary.collections, ...(overlay?.collections ?? [])].map((collection) => [
        collection.group,
        collection.name,
      ])
    );
  }

  /**
   * Loads a manifest file and, when present, the overlay beside it.
   */
  static async load(manifestPath: string, options: CatalogOptions = {}): Promise<Catalog> {
    const primary = await loadManifestFile(manifestPath);
    const overlayPath = await probeLocalOverlay(manifestPath);
    const overlay = overlayPath ? await loadManifestFile(overlayPath) : null;
    logInfo(
      TAG,
      `Loaded ${primary.cards.length} cards from ${manifestPath}` +
        (overlayPath ? ` and ${overlay?.cards.length ?? 0} from overlay ${overlayPath}` : '')
    );
    return new Catalog(primary, overlay, options);
  }

  findPrinting(id: string): ResolvedPrinting | undefined {
    return this.printingsById.get(id);
  }

  findCard(group: string, id: string): Card | undefined {
    return this.cardsByKey.get(key(group, id));
  }

  findInsert(group: string, id: string): Insert | undefined {
    return this.insertsByKey.get(key(group, id));
  }

  /** Translates a legacy code through the remap table (single hop). */
  translateCode(code: number): number {
    return this.remapTable.get(code) ?? code;
  }

  /** The card owning a code, after remap translation. */
  cardForCode(code: number): Card | undefined {
    return this.cardsByCode.get(this.translateCode(code));
  }

  localImageUrl(group: string, printing: Printing): string | undefined {
    const ordinal = printingOrdinal(printing);
    return this.localImages.find(
      (image) => image.id === printing.code && image.group === group && image.face === ordinal
    )?.url;
  }

  printingImageUrl(card: Card, printing: Printing): string {
    return (
      this.localImageUrl(card.group, printing) ??
      `${this.imageUrlRoot}/${card.group}/card/${printing.id}.webp`
    );
  }

  insertImageUrl(insert: Insert): string {
    return `${this.imageUrlRoot}/${insert.group}/insert/${insert.id}.webp`;
  }

  /** Face title for back faces, the card title otherwise. */
  displayName(card: Card, printing: Printing): string {
    if (printing.face !== undefined && printing.face >= 2) {
      return card.faces[printing.face - 2]?.title ?? card.title;
    }
    return card.title;
  }
}
