/**
 * Proxy Sheets – Override File Model
 *
 * PURPOSE:
 *   Zod schemas for every table an override TOML file may contain, and the tagged entries the
 *   parser turns them into. Tables are validated strictly: unknown keys, missing keys, wrong
 *   types and contradictory combinations are rejected before any merging happens.
 *
 * TABLES:
 *   - [[collection]]      name, group, printing = [{spec, name}], insert = [{id, title, ...}]
 *   - [[card]]            id, title?, stripped_title?, group?, printing_id? | printings?, faces? | variants?
 *   - [[nrdb_remap]]      from, to, supersede?
 *   - [[local_image]]     id, group?, face?, path? | url?
 *   - [local_image_root]  path?, url?, extension?
 */

import { z } from 'zod';

import type { CardShape } from './Card';

export const DEFAULT_GROUP = 'english';
export const DEFAULT_PRINTING_NAME = 'Custom';
export const DEFAULT_IMAGE_EXTENSION = 'webp';

const code = z.number().int().nonnegative();

export const collectionTableSchema = z
  .object({
    name: z.string().min(1),
    group: z.string().min(1),
    printing: z
      .array(z.object({ spec: z.string().min(1), name: z.string().min(1) }).strict())
      .default([]),
    insert: z
      .array(
        z
          .object({
            id: z.string().min(1),
            title: z.string().min(1),
            stripped_title: z.string().min(1).optional(),
            insert_groups: z.array(z.string().min(1)).default([]),
          })
          .strict()
      )
      .default([]),
  })
  .strict();

export const cardTableSchema = z
  .object({
    id: z.union([z.string().min(1), code.transform(String)]),
    title: z.string().min(1).optional(),
    stripped_title: z.string().min(1).optional(),
    group: z.string().min(1).optional(),
    printing_id: code.optional(),
    printing_name: z.string().min(1).optional(),
    printings: z.array(z.object({ id: code, name: z.string().min(1).optional() }).strict()).optional(),
    faces: z.array(z.string().min(1)).min(1).optional(),
    variants: z.number().int().optional(),
  })
  .strict()
  .superRefine((card, ctx) => {
    if (card.faces !== undefined && card.variants !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `card ${card.id} cannot define both \`faces\` and \`variants\``,
      });
    }
    if (card.variants !== undefined && card.variants < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['variants'],
        message: `card ${card.id} has \`variants\` < 2; omit it for single-face cards`,
      });
    }
    if (card.printing_id !== undefined && card.printings !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `card ${card.id} cannot define both \`printing_id\` and \`printings\``,
      });
    }
  });

export const remapTableSchema = z
  .object({
    from: code,
    to: code,
    supersede: z.boolean().default(false),
  })
  .strict();

export const localImageTableSchema = z
  .object({
    id: code,
    group: z.string().min(1).optional(),
    face: z.number().int().min(1).optional(),
    path: z.string().min(1).optional(),
    url: z.string().min(1).optional(),
  })
  .strict()
  .refine((image) => image.path === undefined || image.url === undefined, (image) => ({
    message: `local image ${image.id} cannot define both \`url\` and \`path\``,
  }));

export const localImageRootTableSchema = z
  .object({
    path: z.string().min(1).optional(),
    url: z.string().min(1).optional(),
    extension: z
      .string()
      .regex(/^[A-Za-z0-9]+$/, 'extension must be alphanumeric without a leading dot')
      .default(DEFAULT_IMAGE_EXTENSION),
  })
  .strict();

/** Top level of an override file. Tables are validated one at a time by the parser. */
export const overrideDocumentSchema = z
  .object({
    collection: z.array(z.unknown()).default([]),
    card: z.array(z.unknown()).default([]),
    nrdb_remap: z.array(z.unknown()).default([]),
    local_image: z.array(z.unknown()).default([]),
    local_image_root: z.unknown().optional(),
  })
  .strict();

export interface CollectionEntry {
  kind: 'collection';
  group: string;
  name: string;
  sets: Array<{ spec: string; name: string }>;
  inserts: Array<{ id: string; title: string; strippedTitle?: string; insertGroups: string[] }>;
}

export interface CardPrintingDecl {
  code: number;
  name?: string;
}

export interface CardEntry {
  kind: 'card';
  id: string;
  group: string;
  title?: string;
  strippedTitle?: string;
  printingName?: string;
  printings: CardPrintingDecl[];
  /** Undefined when the entry names neither `faces` nor `variants`. */
  shape?: CardShape;
}

export interface RemapEntry {
  kind: 'remap';
  from: number;
  to: number;
  supersede: boolean;
}

export interface LocalImageEntry {
  kind: 'local-image';
  id: number;
  group: string;
  face?: number;
  path?: string;
  url?: string;
  /** Directory of the override file that declared the entry; relative paths resolve against it. */
  baseDir: string;
}

export interface LocalImageRootEntry {
  kind: 'local-image-root';
  path?: string;
  url?: string;
  extension: string;
  baseDir: string;
}

export type OverrideEntry =
  | CollectionEntry
  | CardEntry
  | RemapEntry
  | LocalImageEntry
  | LocalImageRootEntry;

export type OverrideKind = OverrideEntry['kind'];

export interface OverrideFile {
  path: string;
  entries: OverrideEntry[];
}

export function entriesOfKind<K extends OverrideKind>(
  file: OverrideFile,
  kind: K
): Array<Extract<OverrideEntry, { kind: K }>> {
  return file.entries.filter((entry): entry is Extract<OverrideEntry, { kind: K }> => entry.kind === kind);
}
