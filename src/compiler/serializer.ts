/**
 * Proxy Sheets – Manifest Serializer
 *
 * PURPOSE:
 *   Orders a merged manifest deterministically and renders it as YAML with a fixed key order,
 *   then writes the primary manifest and the optional overlay atomically.
 *
 * ORDERING:
 *   - collections by group; cards and inserts by (group, id); printings by (code, ordinal)
 *   - remaps by `from`; local images by (group, id, face, url)
 *
 * CONTEXT:
 *   - Output carries no timestamps, so identical inputs give byte-identical files.
 *   - Both documents are rendered before either file is touched; the two are never concatenated.
 */

import { stringify as stringifyYaml } from 'yaml';

import { compareIds, comparePrintings, type Card, type Insert, type Printing } from '../models/Card';
import { MANIFEST_VERSION, type LocalImage, type Manifest } from '../models/Manifest';
import { SerializationError } from '../utils/errors';
import { logInfo, writeFilesAtomic } from '../utils/fileHelpers';

const TAG = 'serializer';

function byGroupThenId(a: { group: string; id: string }, b: { group: string; id: string }): number {
  return compareIds(a.group, b.group) || compareIds(a.id, b.id);
}

function orderPrinting(printing: Printing): Printing {
  return {
    id: printing.id,
    code: printing.code,
    name: printing.name,
    ...(printing.face !== undefined ? { face: printing.face } : {}),
    ...(printing.variant !== undefined ? { variant: printing.variant } : {}),
  };
}

function orderCard(card: Card): Card {
  return {
    id: card.id,
    group: card.group,
    title: card.title,
    strippedTitle: card.strippedTitle,
    faces: card.faces.map((face) => ({ title: face.title, strippedTitle: face.strippedTitle })),
    ...(card.variants !== undefined ? { variants: card.variants } : {}),
    printings: [...card.printings].sort(comparePrintings).map(orderPrinting),
  };
}

function orderInsert(insert: Insert): Insert {
  return {
    id: insert.id,
    group: insert.group,
    title: insert.title,
    strippedTitle: insert.strippedTitle,
    insertGroups: [...insert.insertGroups].sort(compareIds),
  };
}

function compareLocalImages(a: LocalImage, b: LocalImage): number {
  return (
    compareIds(a.group, b.group) ||
    a.id - b.id ||
    (a.face ?? 0) - (b.face ?? 0) ||
    compareIds(a.url, b.url)
  );
}

/**
 * Returns a sorted copy of the manifest with every object's keys in serialization order.
 */
export function toManifestDocument(manifest: Manifest): Manifest {
  return {
    version: MANIFEST_VERSION,
    collections: [...manifest.collections]
      .sort((a, b) => compareIds(a.group, b.group))
      .map((collection) => ({
        group: collection.group,
        name: collection.name,
        printings: collection.printings.map((set) => ({ spec: set.spec, name: set.name })),
      })),
    cards: [...manifest.cards].sort(byGroupThenId).map(orderCard),
    inserts: [...manifest.inserts].sort(byGroupThenId).map(orderInsert),
    remaps: [...manifest.remaps]
      .sort((a, b) => a.from - b.from)
      .map((remap) => ({ from: remap.from, to: remap.to })),
    localImages: [...manifest.localImages].sort(compareLocalImages).map((image) => ({
      id: image.id,
      group: image.group,
      ...(image.face !== undefined ? { face: image.face } : {}),
      url: image.url,
    })),
  };
}

export function renderManifest(manifest: Manifest): string {
  return stringifyYaml(toManifestDocument(manifest), { lineWidth: 0 });
}

export interface ManifestOutputs {
  primary: Manifest;
  overlay: Manifest | null;
  outputPath: string;
  overlayPath: string;
}

/**
 * Renders both manifests, stages both files, and renames them into place only once every
 * write has succeeded. The overlay file is only written when there is an overlay.
 */
export async function writeManifests(outputs: ManifestOutputs): Promise<void> {
  const files = [{ path: outputs.outputPath, data: renderManifest(outputs.primary) }];
  if (outputs.overlay) {
    files.push({ path: outputs.overlayPath, data: renderManifest(outputs.overlay) });
  }

  try {
    await writeFilesAtomic(files);
  } catch (err) {
    const paths = files.map((file) => file.path);
    throw new SerializationError(`cannot write manifest ${paths.join(', ')}`, { ids: paths, cause: err });
  }
  logInfo(TAG, `Wrote ${outputs.primary.cards.length} cards to ${outputs.outputPath}`);
  if (outputs.overlay) {
    logInfo(TAG, `Wrote local overlay to ${outputs.overlayPath}`);
  }
}
