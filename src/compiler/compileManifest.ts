/**
 * Proxy Sheets – Manifest Compiler Pipeline
 *
 * PURPOSE:
 *   Runs the full compile in one sequential pass:
 *     parse overrides -> load dataset -> merge -> serialize -> write.
 *
 * CONTEXT:
 *   - The local override file is resolved exactly once, before anything else runs: the explicit
 *     path when given, otherwise a sibling `<stem>.local.toml` next to the override file.
 *   - The overlay is written to `<output dir>/local-assets/manifest.local.yaml` by default.
 *     A run without local entries removes a stale overlay left at that default path.
 *   - Every failure surfaces before the first write, so a failed run leaves no output behind.
 */

import fs from 'fs';
import path from 'path';

import { LOCAL_ASSETS_DIR, LOCAL_MANIFEST_NAME, type Manifest } from '../models/Manifest';
import { entriesOfKind } from '../models/Override';
import { fileExists, logInfo } from '../utils/fileHelpers';
import { mergeOverrides } from './merger';
import { parseOverrideFile } from './overrideParser';
import { writeManifests } from './serializer';
import { loadSource } from './sourceLoader';

const TAG = 'prepare';

export interface PrepareOptions {
  datasetDir: string;
  overridePath: string;
  outputPath: string;
  localManifestPath?: string;
  localOutputPath?: string;
}

export interface PrepareResult {
  primary: Manifest;
  overlay: Manifest | null;
  outputPath: string;
  /** Set only when an overlay was written. */
  overlayPath?: string;
}

/** Explicit local override path, or the `<stem>.local.toml` sibling when it exists. */
export async function resolveLocalManifestPath(
  overridePath: string,
  explicit?: string
): Promise<string | undefined> {
  if (explicit !== undefined) return explicit;
  const parsed = path.parse(overridePath);
  const sibling = path.join(parsed.dir, `${parsed.name}.local.toml`);
  return (await fileExists(sibling)) ? sibling : undefined;
}

export function defaultOverlayPath(outputPath: string): string {
  return path.join(path.dirname(outputPath), LOCAL_ASSETS_DIR, LOCAL_MANIFEST_NAME);
}

/**
 * Parses, loads and merges without writing anything.
 */
export async function buildManifests(
  options: Pick<PrepareOptions, 'datasetDir' | 'overridePath'> & { localManifestPath?: string }
): Promise<{ primary: Manifest; overlay: Manifest | null }> {
  const primaryFile = await parseOverrideFile(options.overridePath);
  const localFile = options.localManifestPath ? await parseOverrideFile(options.localManifestPath) : undefined;

  const source = await loadSource(options.datasetDir, entriesOfKind(primaryFile, 'collection'));
  return mergeOverrides({ source, primary: primaryFile, local: localFile });
}

export async function prepareManifests(options: PrepareOptions): Promise<PrepareResult> {
  const localManifestPath = await resolveLocalManifestPath(options.overridePath, options.localManifestPath);
  if (localManifestPath) {
    logInfo(TAG, `Using local override file ${localManifestPath}`);
  }

  const { primary, overlay } = await buildManifests({ ...options, localManifestPath });
  const overlayPath = options.localOutputPath ?? defaultOverlayPath(options.outputPath);

  await writeManifests({ primary, overlay, outputPath: options.outputPath, overlayPath });
  if (overlay === null && options.localOutputPath === undefined && (await fileExists(overlayPath))) {
    await fs.promises.rm(overlayPath, { force: true });
    logInfo(TAG, `Removed stale local overlay ${overlayPath}`);
  }

  return {
    primary,
    overlay,
    outputPath: options.outputPath,
    ...(overlay ? { overlayPath } : {}),
  };
}
