/**
 * Proxy Sheets – Sheet Generation Pipeline
 *
 * PURPOSE:
 *   layout -> fetch assets -> render -> (optionally) write, for one ordered selection.
 *
 * CONTEXT:
 *   - LayoutError surfaces before any request is made.
 *   - A failed image degrades its slots to placeholders; the rest of the document is unaffected.
 *   - Cancelling through the signal rejects with an AbortError and writes nothing.
 */

import { getEnv } from '../utils/config';
import { logInfo } from '../utils/fileHelpers';
import { abortedError, fetchAssets, type FetchLike } from './assetFetcher';
import { mmToPixels, type SheetProfile } from './geometry';
import { planSheets } from './layout';
import { PdfKitCanvas, renderSheets, writePdfAtomic, type RenderSummary } from './pdfEmitter';
import { entryLabel, type SelectionEntry } from './selection';

const TAG = 'generateSheets';

export interface GenerateSheetsOptions {
  profile: SheetProfile;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  /** Defaults come from FETCH_CONCURRENCY, FETCH_TIMEOUT_MS and PRINT_DPI. */
  concurrency?: number;
  timeoutMs?: number;
  dpi?: number;
}

export interface GeneratedSheets extends RenderSummary {
  pdf: Buffer;
  /** Labels of the entries that were rendered as placeholders. */
  failed: string[];
}

export async function generateSheets(
  entries: ReadonlyArray<SelectionEntry>,
  options: GenerateSheetsOptions
): Promise<GeneratedSheets> {
  const env = getEnv();
  const plan = planSheets(entries, options.profile);
  const dpi = options.dpi ?? env.PRINT_DPI;
  const firstSlot = plan.pages[0]?.slots[0];
  const drawable = firstSlot ? firstSlot.drawable : { width: options.profile.cardWidth, height: options.profile.cardHeight };

  const assets = await fetchAssets(
    entries.map((entry) => entry.imageUrl),
    {
      widthPx: mmToPixels(drawable.width, dpi),
      heightPx: mmToPixels(drawable.height, dpi),
      concurrency: options.concurrency ?? env.FETCH_CONCURRENCY,
      timeoutMs: options.timeoutMs ?? env.FETCH_TIMEOUT_MS,
      signal: options.signal,
      fetchImpl: options.fetchImpl,
    }
  );

  const canvas = new PdfKitCanvas();
  const summary = renderSheets(plan, assets, canvas);
  const pdf = await canvas.finish();
  const failed = entries.filter((entry) => !assets.get(entry.imageUrl)?.ok).map(entryLabel);

  logInfo(
    TAG,
    `Rendered ${summary.pages} pages, ${summary.images} images, ${summary.placeholders} placeholders`
  );
  return { ...summary, pdf, failed };
}

/**
 * Generates the sheets and writes them to `outputPath` via `<outputPath>.partial`.
 */
export async function writeSheets(
  entries: ReadonlyArray<SelectionEntry>,
  outputPath: string,
  options: GenerateSheetsOptions
): Promise<GeneratedSheets> {
  const result = await generateSheets(entries, options);
  if (options.signal?.aborted) throw abortedError(options.signal);
  await writePdfAtomic(outputPath, result.pdf);
  logInfo(TAG, `Wrote ${outputPath}`);
  return result;
}
