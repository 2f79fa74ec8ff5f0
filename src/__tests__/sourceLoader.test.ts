import path from 'path';
import { beforeEach, describe, expect, it } from 'vitest';

import { loadSource } from '../compiler/sourceLoader';
import type { CollectionEntry } from '../models/Override';
import { LoadError } from '../utils/errors';
import { coreDataset, makeTempDir, writeDataset } from './fixtures';

const english: CollectionEntry = {
  kind: 'collection',
  group: 'english',
  name: 'English',
  sets: [{ spec: 'core', name: 'Core Set' }],
  inserts: [{ id: 'rules', title: 'Rules Card', insertGroups: [] }],
};

describe('loadSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  it('joins printings with their card records and detects shapes', async () => {
    await writeDataset(dir, coreDataset);
    const source = await loadSource(dir, [english]);

    expect(Array.from(source.cards.keys())).toEqual([
      'english/noise_hacker',
      'english/hoshiko_shiro',
      'english/the_twins',
      'english/legacy_card',
    ]);
    expect(source.cards.get('english/noise_hacker')).toMatchObject({
      title: 'Noise: Hacker Extraordinaire',
      strippedTitle: 'Noise: Hacker Extraordinaire',
      shape: { kind: 'single' },
      printings: [{ code: 1001, name: 'Core Set' }],
      origin: 'dataset',
    });
    expect(source.cards.get('english/hoshiko_shiro')?.shape).toEqual({
      kind: 'faces',
      faces: [{ title: 'Hoshiko Shiro: Mahou Shoujo', strippedTitle: 'Hoshiko Shiro: Mahou Shoujo' }],
    });
    expect(source.cards.get('english/the_twins')?.shape).toEqual({ kind: 'variants', count: 3 });
    expect(source.inserts).toEqual([
      { id: 'rules', group: 'english', title: 'Rules Card', strippedTitle: 'Rules Card', insertGroups: [] },
    ]);
    expect(source.collections).toEqual([
      { group: 'english', name: 'English', printings: [{ spec: 'core', name: 'Core Set' }] },
    ]);
  });

  it('fails when the dataset directory is missing', async () => {
    await expect(loadSource(path.join(dir, 'nope'), [english])).rejects.toBeInstanceOf(LoadError);
  });

  it('names the set spec when a printing file is missing', async () => {
    await writeDataset(dir, { printings: {}, cards: {} });
    await expect(loadSource(dir, [english])).rejects.toMatchObject({ name: 'LoadError', ids: ['core'] });
  });

  it('names the card and printing when a card record is missing', async () => {
    await writeDataset(dir, { printings: { core: [{ id: '01003', card_id: 'ghost' }] }, cards: {} });
    await expect(loadSource(dir, [english])).rejects.toMatchObject({ name: 'LoadError', ids: ['ghost', '01003'] });
  });

  it('names the printing when a required field is missing', async () => {
    await writeDataset(dir, { printings: { core: [{ id: '01004' }] }, cards: {} });
    await expect(loadSource(dir, [english])).rejects.toMatchObject({ name: 'LoadError', ids: ['01004'] });
  });
});
