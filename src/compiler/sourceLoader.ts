/**
 * Proxy Sheets – Source Dataset Loader
 *
 * PURPOSE:
 *   Streams the printing files of every collection declared in the override file and joins each
 *   printing with its card record, producing draft cards in dataset order.
 *
 * CONTEXT:
 *   - Dataset layout: `<dir>/v2/printings/<spec>.json` (array of printings) and
 *     `<dir>/v2/cards/<card_id>.json` (one card record per file).
 *   - A card's shape is decided by its card record: `faces` on the card means a flip card,
 *     `faces` on the printing means variant arts (count = faces + 1), otherwise single-faced.
 *   - Any missing directory, file or field aborts the run with a LoadError naming the file and id.
 *
 * IMPLEMENTATION DETAILS:
 *   - Printing files are streamed with stream-json so large sets never sit in memory as text.
 *   - Each card record is read at most once per run, however many printings reference it.
 */

import fs from 'fs';
import path from 'path';
import { chain } from 'stream-chain';
import { parser } from 'stream-json';
import { streamArray } from 'stream-json/streamers/StreamArray';
import { z } from 'zod';
import { fromError } from 'zod-validation-error';

import { makeTitle, type CardShape, type Insert } from '../models/Card';
import {
  datasetCardSchema,
  datasetPrintingSchema,
  type DatasetCard,
  type DatasetPrinting,
} from '../models/Dataset';
import type { Collection } from '../models/Manifest';
import type { CollectionEntry } from '../models/Override';
import { LoadError } from '../utils/errors';
import { dirExists, fileExists, logInfo } from '../utils/fileHelpers';
import { draftKey, type DraftCard } from './types';

const TAG = 'sourceLoader';

const streamedItemSchema = z.object({ key: z.number(), value: z.unknown() });

export interface SourceData {
  collections: Collection[];
  inserts: Insert[];
  /** Draft cards keyed by `group/id`, in the order the dataset first mentions them. */
  cards: Map<string, DraftCard>;
}

/**
 * Streams one JSON array file and yields its elements in order.
 */
async function* streamJsonArray(filePath: string): AsyncGenerator<{ index: number; value: unknown }> {
  const pipeline = chain([fs.createReadStream(filePath), parser(), streamArray()]);
  for await (const item of pipeline) {
    const parsed = streamedItemSchema.safeParse(item);
    if (parsed.success) {
      yield { index: parsed.data.key, value: parsed.data.value };
    }
  }
}

function shapeFor(card: DatasetCard, printingFaces: unknown[] | undefined): CardShape {
  if (card.faces && card.faces.length > 0) {
    return {
      kind: 'faces',
      faces: card.faces.map((face) => makeTitle(face.title, face.stripped_title)),
    };
  }
  if (printingFaces && printingFaces.length > 0) {
    return { kind: 'variants', count: printingFaces.length + 1 };
  }
  return { kind: 'single' };
}

function parsePrinting(value: unknown, index: number, filePath: string, spec: string): DatasetPrinting {
  const parsed = datasetPrintingSchema.safeParse(value);
  if (parsed.success) return parsed.data;
  const id = z.object({ id: z.string() }).safeParse(value);
  throw new LoadError(`invalid printing #${index} in ${filePath}: ${fromError(parsed.error).message}`, {
    ids: id.success ? [id.data.id] : [`${spec}#${index}`],
    cause: parsed.error,
  });
}

class CardRecordCache {
  private readonly records = new Map<string, DatasetCard>();

  constructor(private readonly cardsDir: string) {}

  async get(cardId: string, referencedBy: string): Promise<DatasetCard> {
    const cached = this.records.get(cardId);
    if (cached) return cached;

    const filePath = path.join(this.cardsDir, `${cardId}.json`);
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
    } catch (err) {
      throw new LoadError(`card record ${filePath} referenced by printing ${referencedBy} is missing or unreadable`, {
        ids: [cardId, referencedBy],
        cause: err,
      });
    }

    const parsed = datasetCardSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LoadError(`invalid card record ${filePath}: ${fromError(parsed.error).message}`, {
        ids: [cardId],
        cause: parsed.error,
      });
    }
    this.records.set(cardId, parsed.data);
    return parsed.data;
  }
}

/**
 * Loads every collection's printings from the dataset directory.
 */
export async function loadSource(datasetDir: string, collections: CollectionEntry[]): Promise<SourceData> {
  if (!(await dirExists(datasetDir))) {
    throw new LoadError(`source dataset directory ${datasetDir} does not exist`, { ids: [datasetDir] });
  }

  const printingsDir = path.join(datasetDir, 'v2', 'printings');
  const cardRecords = new CardRecordCache(path.join(datasetDir, 'v2', 'cards'));
  const cards = new Map<string, DraftCard>();
  const inserts: Insert[] = [];
  let printingCount = 0;

  for (const collection of collections) {
    for (const insert of collection.inserts) {
      inserts.push({
        id: insert.id,
        group: collection.group,
        ...makeTitle(insert.title, insert.strippedTitle),
        insertGroups: insert.insertGroups,
      });
    }

    for (const set of collection.sets) {
      const filePath = path.join(printingsDir, `${set.spec}.json`);
      if (!(await fileExists(filePath))) {
        throw new LoadError(`printing file ${filePath} for collection ${collection.group} not found`, {
          ids: [set.spec],
        });
      }

      try {
        for await (const { index, value } of streamJsonArray(filePath)) {
          const printing = parsePrinting(value, index, filePath, set.spec);
          const key = draftKey(collection.group, printing.card_id);
          let draft = cards.get(key);
          if (!draft) {
            const record = await cardRecords.get(printing.card_id, printing.id);
            draft = {
              id: printing.card_id,
              group: collection.group,
              ...makeTitle(record.title, record.stripped_title),
              shape: shapeFor(record, printing.faces),
              printings: [],
              origin: 'dataset',
              amendments: 0,
            };
            cards.set(key, draft);
          }
          draft.printings.push({ code: Number.parseInt(printing.id, 10), name: set.name });
          printingCount++;
        }
      } catch (err) {
        if (err instanceof LoadError) throw err;
        throw new LoadError(`printing file ${filePath} is not a valid JSON array`, {
          ids: [set.spec],
          cause: err,
        });
      }
    }
  }

  logInfo(
    TAG,
    `Loaded ${printingCount} printings of ${cards.size} cards from ${collections.length} collections`
  );

  return {
    collections: collections.map((collection) => ({
      group: collection.group,
      name: collection.name,
      printings: collection.sets.map((set) => ({ spec: set.spec, name: set.name })),
    })),
    inserts,
    cards,
  };
}
