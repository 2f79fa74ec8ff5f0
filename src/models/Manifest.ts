/**
 * Proxy Sheets – Manifest Model
 *
 * The compiled manifest and the local overlay share this schema. The primary manifest always
 * has an empty `localImages` list; local image overrides only ever live in the overlay.
 */

import { z } from 'zod';

import { cardSchema, insertSchema } from './Card';

export const MANIFEST_VERSION = 1;

/** The overlay lives at `<manifest dir>/local-assets/manifest.local.yaml`. */
export const LOCAL_ASSETS_DIR = 'local-assets';
export const LOCAL_MANIFEST_NAME = 'manifest.local.yaml';

export const collectionSetSchema = z
  .object({
    spec: z.string().min(1),
    name: z.string().min(1),
  })
  .strict();

export const collectionSchema = z
  .object({
    group: z.string().min(1),
    name: z.string().min(1),
    printings: z.array(collectionSetSchema),
  })
  .strict();

export type Collection = z.infer<typeof collectionSchema>;

export const remapSchema = z
  .object({
    from: z.number().int().nonnegative(),
    to: z.number().int().nonnegative(),
  })
  .strict();

export type Remap = z.infer<typeof remapSchema>;

export const localImageSchema = z
  .object({
    id: z.number().int().nonnegative(),
    group: z.string().min(1),
    face: z.number().int().min(1).optional(),
    url: z.string().min(1),
  })
  .strict();

export type LocalImage = z.infer<typeof localImageSchema>;

export const manifestSchema = z
  .object({
    version: z.literal(MANIFEST_VERSION),
    collections: z.array(collectionSchema),
    cards: z.array(cardSchema),
    inserts: z.array(insertSchema),
    remaps: z.array(remapSchema),
    localImages: z.array(localImageSchema),
  })
  .strict();

export type Manifest = z.infer<typeof manifestSchema>;

export function emptyManifest(): Manifest {
  return {
    version: MANIFEST_VERSION,
    collections: [],
    cards: [],
    inserts: [],
    remaps: [],
    localImages: [],
  };
}
