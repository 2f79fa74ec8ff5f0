import fs from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';

import { Catalog } from '../catalog/catalog';
import type { Manifest } from '../models/Manifest';
import type { FetchLike } from '../sheets/assetFetcher';

export const IMAGE_ROOT = 'https://img.test/cards';

export async function makeTempDir(): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), 'proxy-sheets-'));
}

export interface DatasetFixture {
  /** Printing arrays keyed by set spec. */
  printings: Record<string, unknown[]>;
  /** Card records keyed by card id. */
  cards: Record<string, unknown>;
}

/** A small dataset with a single-faced card, a flip card, a variant card and a legacy printing. */
export const coreDataset: DatasetFixture = {
  printings: {
    core: [
      { id: '01001', card_id: 'noise_hacker', quantity: 3 },
      { id: '26066', card_id: 'hoshiko_shiro' },
      { id: '30010', card_id: 'the_twins', faces: [{ illustrator: 'A' }, { illustrator: 'B' }] },
      { id: '32003', card_id: 'legacy_card' },
    ],
  },
  cards: {
    noise_hacker: { id: 'noise_hacker', title: 'Noise: Hacker Extraordinaire', side_id: 'runner' },
    hoshiko_shiro: {
      id: 'hoshiko_shiro',
      title: 'Hoshiko Shiro: Untold Protagonist',
      faces: [{ title: 'Hoshiko Shiro: Mahou Shoujo' }],
    },
    the_twins: { id: 'the_twins', title: 'The Twins' },
    legacy_card: { id: 'legacy_card', title: 'Legacy Card' },
  },
};

export const COLLECTION_TOML = `
[[collection]]
name = "English"
group = "english"
printing = [{ spec = "core", name = "Core Set" }]
`;

export async function writeDataset(dir: string, fixture: DatasetFixture): Promise<void> {
  const printingsDir = path.join(dir, 'v2', 'printings');
  const cardsDir = path.join(dir, 'v2', 'cards');
  await fs.promises.mkdir(printingsDir, { recursive: true });
  await fs.promises.mkdir(cardsDir, { recursive: true });
  for (const [spec, printings] of Object.entries(fixture.printings)) {
    await fs.promises.writeFile(path.join(printingsDir, `${spec}.json`), JSON.stringify(printings, null, 2));
  }
  for (const [id, card] of Object.entries(fixture.cards)) {
    await fs.promises.writeFile(path.join(cardsDir, `${id}.json`), JSON.stringify(card));
  }
}

export async function solidPng(width = 16, height = 22): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 40, b: 40 } },
  })
    .png()
    .toBuffer();
}

/** Serves the same PNG for every URL, except URLs containing one of `failing` (HTTP 500). */
export function stubFetch(png: Buffer, failing: string[] = []): FetchLike {
  return async (url) => {
    if (failing.some((fragment) => url.includes(fragment))) {
      return new Response('boom', { status: 500 });
    }
    return new Response(new Uint8Array(png), { status: 200 });
  };
}

export function sampleManifest(): Manifest {
  return {
    version: 1,
    collections: [{ group: 'english', name: 'English', printings: [{ spec: 'core', name: 'Core Set' }] }],
    cards: [
      {
        id: 'noise_hacker',
        group: 'english',
        title: 'Noise',
        strippedTitle: 'Noise',
        faces: [],
        printings: [
          { id: '01001', code: 1001, name: 'Core Set' },
          { id: '20037', code: 20037, name: 'Reprint' },
        ],
      },
      {
        id: 'hoshiko_shiro',
        group: 'english',
        title: 'Hoshiko',
        strippedTitle: 'Hoshiko',
        faces: [{ title: 'Mahou Shoujo', strippedTitle: 'Mahou Shoujo' }],
        printings: [
          { id: '26066.1', code: 26066, name: 'Core Set (Hoshiko)', face: 1 },
          { id: '26066.2', code: 26066, name: 'Core Set (Mahou Shoujo)', face: 2 },
        ],
      },
      {
        id: 'the_twins',
        group: 'english',
        title: 'The Twins',
        strippedTitle: 'The Twins',
        faces: [],
        variants: 3,
        printings: [
          { id: '30010.1', code: 30010, name: 'Core Set (variant 1)', variant: 1 },
          { id: '30010.2', code: 30010, name: 'Core Set (variant 2)', variant: 2 },
          { id: '30010.3', code: 30010, name: 'Core Set (variant 3)', variant: 3 },
        ],
      },
      {
        id: 'legacy_card',
        group: 'english',
        title: 'Legacy Card',
        strippedTitle: 'Legacy Card',
        faces: [],
        printings: [{ id: '33022', code: 33022, name: 'Core Set' }],
      },
    ],
    inserts: [
      { id: 'rules', group: 'english', title: 'Rules Card', strippedTitle: 'Rules Card', insertGroups: ['starter'] },
    ],
    remaps: [{ from: 32003, to: 33022 }],
    localImages: [{ id: 1001, group: 'english', url: 'file:///proxy-sheets-test/noise.png' }],
  };
}

export function sampleCatalog(overlay: Manifest | null = null): Catalog {
  return new Catalog(sampleManifest(), overlay, { imageUrlRoot: IMAGE_ROOT });
}
