/**
 * Proxy Sheets – Asset Fetcher
 *
 * PURPOSE:
 *   Downloads every distinct image a sheet needs, decodes it and crops it to the drawable
 *   rectangle's pixel size, using a bounded pool of workers.
 *
 * CONTEXT:
 *   - `http(s):` URLs go through fetch with a per-request timeout; `file:` URLs are read from disk.
 *   - Results are keyed by URL, so what a slot receives never depends on completion order.
 *   - A failure for one URL becomes an AssetError result for that URL only.
 *   - Aborting the signal cancels outstanding requests and rejects the whole acquisition.
 */

import fs from 'fs';
import sharp from 'sharp';
import { fileURLToPath } from 'url';

import { AssetError, GenerationAbortedError } from '../utils/errors';
import { logDebug, logWarn } from '../utils/fileHelpers';

const TAG = 'assetFetcher';

export type AssetResult = { ok: true; png: Buffer } | { ok: false; error: AssetError };

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface FetchAssetsOptions {
  widthPx: number;
  heightPx: number;
  concurrency: number;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}

export function abortedError(signal: AbortSignal): GenerationAbortedError {
  const error = new GenerationAbortedError('sheet generation was aborted', { cause: signal.reason });
  error.name = 'AbortError';
  return error;
}

async function readSource(url: string, options: FetchAssetsOptions, signal: AbortSignal): Promise<Buffer> {
  if (url.startsWith('file:')) {
    return fs.promises.readFile(fileURLToPath(url), { signal });
  }
  if (!/^https?:/.test(url)) {
    throw new AssetError(`unsupported image URL scheme: ${url}`, { ids: [url] });
  }

  const fetchImpl: FetchLike = options.fetchImpl ?? ((target, init) => fetch(target, init));
  const response = await fetchImpl(url, {
    signal: AbortSignal.any([signal, AbortSignal.timeout(options.timeoutMs)]),
  });
  if (!response.ok) {
    throw new AssetError(`image request failed with HTTP ${response.status}`, { ids: [url] });
  }
  return Buffer.from(await response.arrayBuffer());
}

/** Decodes any format sharp reads and centre-crops it to exactly width × height pixels. */
export async function cropToSlot(source: Buffer, widthPx: number, heightPx: number): Promise<Buffer> {
  return sharp(source)
    .resize(widthPx, heightPx, { fit: 'cover', position: 'centre' })
    .png()
    .toBuffer();
}

async function acquire(url: string, options: FetchAssetsOptions, signal: AbortSignal): Promise<AssetResult> {
  try {
    const source = await readSource(url, options, signal);
    const png = await cropToSlot(source, options.widthPx, options.heightPx);
    logDebug(TAG, `Fetched ${url} (${source.length} bytes)`);
    return { ok: true, png };
  } catch (err) {
    if (signal.aborted) throw abortedError(signal);
    const error =
      err instanceof AssetError
        ? err
        : new AssetError(`cannot load image: ${err instanceof Error ? err.message : String(err)}`, {
            ids: [url],
            cause: err,
          });
    logWarn(TAG, `${error.message} (${url})`);
    return { ok: false, error };
  }
}

/**
 * Fetches each distinct URL once. Resolves to one result per URL, or rejects with an
 * AbortError-named AssetError when the signal fires.
 */
export async function fetchAssets(
  urls: ReadonlyArray<string>,
  options: FetchAssetsOptions
): Promise<Map<string, AssetResult>> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) throw abortedError(options.signal);
  options.signal?.addEventListener('abort', onAbort, { once: true });

  const results = new Map<string, AssetResult>();
  const queue = Array.from(new Set(urls));
  const workerCount = Math.max(1, Math.min(options.concurrency, queue.length));

  const workers = Array.from({ length: workerCount }, async () => {
    while (queue.length > 0) {
      if (controller.signal.aborted) throw abortedError(controller.signal);
      const url = queue.shift();
      if (url === undefined) continue;
      results.set(url, await acquire(url, options, controller.signal));
    }
  });

  try {
    await Promise.all(workers);
    if (controller.signal.aborted) throw abortedError(controller.signal);
  } catch (err) {
    controller.abort();
    throw err;
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
  }

  return results;
}
