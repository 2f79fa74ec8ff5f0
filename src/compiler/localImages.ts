/**
 * Proxy Sheets – Local Image Resolution
 *
 * PURPOSE:
 *   Turns `[[local_image]]` entries into concrete image URLs bound to one compiled printing.
 *
 * URL PRECEDENCE:
 *   1. `url`, used verbatim
 *   2. `path`, as a `file:` URL (relative paths resolve against the override file's directory)
 *   3. `[local_image_root].url` + `/<file>`
 *   4. `[local_image_root].path` + `/<file>`, as a `file:` URL
 *
 *   `<file>` is the unpadded printing code, `.face` for a flip card, plus the root's extension,
 *   e.g. `1001.webp` or `26066.2.webp`.
 */

import path from 'path';
import { pathToFileURL } from 'url';

import { printingId, printingOrdinal, type Printing } from '../models/Card';
import type { LocalImage } from '../models/Manifest';
import {
  DEFAULT_IMAGE_EXTENSION,
  type LocalImageEntry,
  type LocalImageRootEntry,
} from '../models/Override';
import { LoadError, MergeConflictError } from '../utils/errors';

export interface GroupedPrinting {
  group: string;
  printing: Printing;
}

function toFileUrl(filePath: string, baseDir: string): string {
  const normalized = filePath.replace(/\\/g, '/');
  if (normalized.startsWith('file://')) return normalized;
  return pathToFileURL(path.resolve(baseDir, normalized)).href;
}

function selectOrdinal(entry: LocalImageEntry, matches: Printing[]): number | undefined {
  if (entry.face !== undefined) {
    const face = entry.face;
    if (!matches.some((printing) => printingOrdinal(printing) === face)) {
      throw new MergeConflictError(
        `local image ${entry.id} face ${face} does not exist in group ${entry.group}`,
        { ids: [printingId(entry.id, face)] }
      );
    }
    return face;
  }
  const [only, ...rest] = matches;
  if (only === undefined || rest.length > 0) {
    throw new MergeConflictError(`local image ${entry.id} matches multiple faces; specify \`face\``, {
      ids: matches.map((printing) => printing.id),
    });
  }
  return printingOrdinal(only);
}

export function resolveLocalImage(
  entry: LocalImageEntry,
  root: LocalImageRootEntry | undefined,
  printings: ReadonlyArray<GroupedPrinting>
): LocalImage {
  if (entry.url === undefined && entry.path === undefined && !root?.url && !root?.path) {
    throw new LoadError(
      `local image ${entry.id} has neither \`url\` nor \`path\` and no [local_image_root] is set`,
      { ids: [String(entry.id)] }
    );
  }

  const matches = printings
    .filter((candidate) => candidate.group === entry.group && candidate.printing.code === entry.id)
    .map((candidate) => candidate.printing);
  if (matches.length === 0) {
    throw new MergeConflictError(
      `local image ${entry.id} does not match any printing in group ${entry.group}`,
      { ids: [String(entry.id)] }
    );
  }

  const face = selectOrdinal(entry, matches);
  const stem = face === undefined ? String(entry.id) : `${entry.id}.${face}`;
  const fileName = `${stem}.${root?.extension ?? DEFAULT_IMAGE_EXTENSION}`;

  let url: string;
  if (entry.url !== undefined) {
    url = entry.url;
  } else if (entry.path !== undefined) {
    url = toFileUrl(entry.path, entry.baseDir);
  } else if (root?.url) {
    url = `${root.url.replace(/\/+$/, '')}/${fileName}`;
  } else if (root?.path) {
    url = toFileUrl(`${root.path.replace(/[\\/]+$/, '')}/${fileName}`, root.baseDir);
  } else {
    throw new LoadError(`local image ${entry.id} has no image source`, { ids: [String(entry.id)] });
  }

  const image: LocalImage = { id: entry.id, group: entry.group, url };
  if (face !== undefined) image.face = face;
  return image;
}

export function resolveLocalImages(
  entries: ReadonlyArray<LocalImageEntry>,
  root: LocalImageRootEntry | undefined,
  printings: ReadonlyArray<GroupedPrinting>
): LocalImage[] {
  return entries.map((entry) => resolveLocalImage(entry, root, printings));
}
