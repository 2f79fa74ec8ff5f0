/**
 * Proxy Sheets – Override File Parser
 *
 * PURPOSE:
 *   Reads a hand-authored TOML override file and turns every table into a typed, tagged entry.
 *   Validation happens here, table by table, so the merger only ever sees well-formed entries.
 *
 * CONTEXT:
 *   - A malformed table fails the whole run with a LoadError naming the table's id.
 *   - Entries keep their declaration order; the merger applies them in that order.
 *   - Relative `path` values are kept as written and resolved later against the file's directory.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseToml } from '@iarna/toml';
import { z } from 'zod';
import { fromError } from 'zod-validation-error';

import {
  DEFAULT_GROUP,
  cardTableSchema,
  collectionTableSchema,
  localImageRootTableSchema,
  localImageTableSchema,
  overrideDocumentSchema,
  remapTableSchema,
  type CardEntry,
  type OverrideEntry,
  type OverrideFile,
} from '../models/Override';
import { makeTitle } from '../models/Card';
import { LoadError } from '../utils/errors';
import { logInfo } from '../utils/fileHelpers';

const TAG = 'overrideParser';

const idProbeSchema = z.object({ id: z.union([z.string(), z.number()]) });

/** Best-effort id of a table that failed validation, for the error's `ids`. */
function tableId(table: unknown, fallback: string): string {
  const probe = idProbeSchema.safeParse(table);
  return probe.success ? String(probe.data.id) : fallback;
}

function validateTable<T extends z.ZodTypeAny>(
  schema: T,
  table: unknown,
  label: string,
  filePath: string
): z.output<T> {
  const parsed = schema.safeParse(table);
  if (!parsed.success) {
    throw new LoadError(`invalid ${label} in ${filePath}: ${fromError(parsed.error).message}`, {
      ids: [tableId(table, label)],
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function toCardEntry(table: z.output<typeof cardTableSchema>): CardEntry {
  const printings =
    table.printings ??
    (table.printing_id !== undefined ? [{ id: table.printing_id, name: undefined }] : []);

  let shape: CardEntry['shape'];
  if (table.faces) {
    shape = { kind: 'faces', faces: table.faces.map((face) => makeTitle(face)) };
  } else if (table.variants !== undefined) {
    shape = { kind: 'variants', count: table.variants };
  }

  return {
    kind: 'card',
    id: table.id,
    group: table.group ?? DEFAULT_GROUP,
    title: table.title,
    strippedTitle: table.stripped_title,
    printingName: table.printing_name,
    printings: printings.map((printing) => ({ code: printing.id, name: printing.name })),
    shape,
  };
}

/**
 * Parses override TOML text. `filePath` is used for messages and to resolve relative paths.
 */
export function parseOverrideText(text: string, filePath: string): OverrideFile {
  let raw: unknown;
  try {
    raw = parseToml(text);
  } catch (err) {
    throw new LoadError(`override file ${filePath} is not valid TOML: ${String(err)}`, {
      ids: [filePath],
      cause: err,
    });
  }

  const document = overrideDocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new LoadError(`invalid override file ${filePath}: ${fromError(document.error).message}`, {
      ids: [filePath],
      cause: document.error,
    });
  }

  const baseDir = path.dirname(path.resolve(filePath));
  const entries: OverrideEntry[] = [];

  document.data.collection.forEach((table, i) => {
    const collection = validateTable(collectionTableSchema, table, `[[collection]] #${i + 1}`, filePath);
    entries.push({
      kind: 'collection',
      group: collection.group,
      name: collection.name,
      sets: collection.printing,
      inserts: collection.insert.map((insert) => ({
        id: insert.id,
        title: insert.title,
        strippedTitle: insert.stripped_title,
        insertGroups: insert.insert_groups,
      })),
    });
  });

  document.data.card.forEach((table, i) => {
    entries.push(toCardEntry(validateTable(cardTableSchema, table, `[[card]] #${i + 1}`, filePath)));
  });

  document.data.nrdb_remap.forEach((table, i) => {
    const remap = validateTable(remapTableSchema, table, `[[nrdb_remap]] #${i + 1}`, filePath);
    entries.push({ kind: 'remap', ...remap });
  });

  document.data.local_image.forEach((table, i) => {
    const image = validateTable(localImageTableSchema, table, `[[local_image]] #${i + 1}`, filePath);
    entries.push({
      kind: 'local-image',
      id: image.id,
      group: image.group ?? DEFAULT_GROUP,
      face: image.face,
      path: image.path,
      url: image.url,
      baseDir,
    });
  });

  if (document.data.local_image_root !== undefined) {
    const root = validateTable(
      localImageRootTableSchema,
      document.data.local_image_root,
      '[local_image_root]',
      filePath
    );
    entries.push({ kind: 'local-image-root', ...root, baseDir });
  }

  return { path: filePath, entries };
}

export async function parseOverrideFile(filePath: string): Promise<OverrideFile> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new LoadError(`cannot read override file ${filePath}`, { ids: [filePath], cause: err });
  }

  const file = parseOverrideText(text, filePath);
  logInfo(TAG, `Parsed ${file.entries.length} entries from ${filePath}`);
  return file;
}
