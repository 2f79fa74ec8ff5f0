import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';

import { Catalog } from '../catalog/catalog';
import { loadManifestFile } from '../catalog/manifestFile';
import { renderManifest } from '../compiler/serializer';
import { emptyManifest, type Manifest } from '../models/Manifest';
import { LoadError } from '../utils/errors';
import { IMAGE_ROOT, makeTempDir, sampleCatalog, sampleManifest } from './fixtures';

function overlayManifest(): Manifest {
  return {
    ...emptyManifest(),
    cards: [
      {
        id: 'noise_hacker',
        group: 'english',
        title: 'Noise',
        strippedTitle: 'Noise',
        faces: [],
        printings: [{ id: '90001', code: 90001, name: 'Alt Art' }],
      },
    ],
    localImages: [{ id: 26066, group: 'english', face: 2, url: 'https://img.test/local/26066.2.png' }],
  };
}

describe('Catalog', () => {
  it('unions overlay printings without touching either manifest', () => {
    const primary = sampleManifest();
    const catalog = new Catalog(primary, overlayManifest(), { imageUrlRoot: IMAGE_ROOT });

    expect(catalog.findCard('english', 'noise_hacker')?.printings.map((printing) => printing.id)).toEqual([
      '01001',
      '20037',
      '90001',
    ]);
    expect(primary.cards[0]?.printings).toHaveLength(2);
    expect(catalog.findPrinting('90001')?.card.id).toBe('noise_hacker');
  });

  it('translates legacy codes through the remap table', () => {
    const catalog = sampleCatalog();
    expect(catalog.translateCode(32003)).toBe(33022);
    expect(catalog.translateCode(1001)).toBe(1001);
    expect(catalog.cardForCode(32003)?.id).toBe('legacy_card');
  });

  it('prefers a matching local image over the remote URL', () => {
    const catalog = new Catalog(sampleManifest(), overlayManifest(), { imageUrlRoot: `${IMAGE_ROOT}/` });
    const hoshiko = catalog.findCard('english', 'hoshiko_shiro');
    if (!hoshiko) throw new Error('missing card');
    const [front, back] = hoshiko.printings;
    if (!front || !back) throw new Error('missing printings');

    expect(catalog.printingImageUrl(hoshiko, front)).toBe('https://img.test/cards/english/card/26066.1.webp');
    expect(catalog.printingImageUrl(hoshiko, back)).toBe('https://img.test/local/26066.2.png');
  });

  it('uses face titles for back faces', () => {
    const catalog = sampleCatalog();
    const resolved = catalog.findPrinting('26066.2');
    if (!resolved) throw new Error('missing printing');
    expect(catalog.displayName(resolved.card, resolved.printing)).toBe('Mahou Shoujo');
  });

  it('resolves insert images', () => {
    const catalog = sampleCatalog();
    const insert = catalog.findInsert('english', 'rules');
    if (!insert) throw new Error('missing insert');
    expect(catalog.insertImageUrl(insert)).toBe('https://img.test/cards/english/insert/rules.webp');
  });

  it('loads a manifest and the overlay beside it', async () => {
    const dir = await makeTempDir();
    const manifestPath = path.join(dir, 'manifest.yaml');
    await fs.promises.writeFile(manifestPath, renderManifest(sampleManifest()));
    await fs.promises.mkdir(path.join(dir, 'local-assets'));
    await fs.promises.writeFile(path.join(dir, 'local-assets', 'manifest.local.yaml'), renderManifest(overlayManifest()));

    const catalog = await Catalog.load(manifestPath, { imageUrlRoot: IMAGE_ROOT });
    expect(catalog.overlay?.cards).toHaveLength(1);
    expect(catalog.findPrinting('90001')).toBeDefined();
  });

  it('rejects a manifest that fails validation', async () => {
    const dir = await makeTempDir();
    const manifestPath = path.join(dir, 'manifest.yaml');
    await fs.promises.writeFile(manifestPath, 'version: 2\ncards: []\n');
    await expect(loadManifestFile(manifestPath)).rejects.toBeInstanceOf(LoadError);
  });
});
