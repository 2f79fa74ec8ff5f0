/**
 * Proxy Sheets – Manifest File Loading
 *
 * Reads a compiled YAML manifest back into memory and validates it. The local overlay is looked
 * up once, at fixed paths beside the primary manifest.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { fromError } from 'zod-validation-error';

import { LOCAL_ASSETS_DIR, LOCAL_MANIFEST_NAME, manifestSchema, type Manifest } from '../models/Manifest';
import { LoadError } from '../utils/errors';
import { fileExists } from '../utils/fileHelpers';

export async function loadManifestFile(filePath: string): Promise<Manifest> {
  let raw: unknown;
  try {
    raw = parseYaml(await fs.promises.readFile(filePath, 'utf-8'));
  } catch (err) {
    throw new LoadError(`cannot read manifest ${filePath}`, { ids: [filePath], cause: err });
  }

  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new LoadError(`invalid manifest ${filePath}: ${fromError(parsed.error).message}`, {
      ids: [filePath],
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Overlay locations probed for a manifest, in order. */
export function overlayCandidates(manifestPath: string): string[] {
  const dir = path.dirname(manifestPath);
  return [path.join(dir, LOCAL_ASSETS_DIR, LOCAL_MANIFEST_NAME), path.join(dir, LOCAL_MANIFEST_NAME)];
}

export async function probeLocalOverlay(manifestPath: string): Promise<string | undefined> {
  for (const candidate of overlayCandidates(manifestPath)) {
    if (await fileExists(candidate)) return candidate;
  }
  return undefined;
}
