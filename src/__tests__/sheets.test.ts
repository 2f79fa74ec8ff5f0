import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import sharp from 'sharp';
import { describe, expect, it } from 'vitest';

import { fetchAssets, type AssetResult, type FetchLike } from '../sheets/assetFetcher';
import { generateSheets, writeSheets } from '../sheets/generateSheets';
import { buildProfile } from '../sheets/geometry';
import { planSheets, type Rect, type Segment } from '../sheets/layout';
import { PLACEHOLDER_NOTE, renderSheets, type SheetCanvas } from '../sheets/pdfEmitter';
import { SelectionBuilder, type SelectionEntry } from '../sheets/selection';
import { AssetError, GenerationAbortedError } from '../utils/errors';
import { makeTempDir, sampleCatalog, solidPng, stubFetch } from './fixtures';

const fetchOptions = { widthPx: 10, heightPx: 14, concurrency: 3, timeoutMs: 5000 };

type CanvasCall =
  | { op: 'page' }
  | { op: 'image'; rect: Rect }
  | { op: 'placeholder'; rect: Rect; label: string }
  | { op: 'segment'; segment: Segment };

class RecordingCanvas implements SheetCanvas {
  readonly calls: CanvasCall[] = [];

  addPage(): void {
    this.calls.push({ op: 'page' });
  }

  drawImage(_png: Buffer, rect: Rect): void {
    this.calls.push({ op: 'image', rect });
  }

  drawPlaceholder(rect: Rect, label: string): void {
    this.calls.push({ op: 'placeholder', rect, label });
  }

  drawSegment(segment: Segment): void {
    this.calls.push({ op: 'segment', segment });
  }
}

/** Twenty-odd entries whose first slot has its own image URL. */
function selection(): ReadonlyArray<SelectionEntry> {
  const catalog = sampleCatalog();
  const builder = new SelectionBuilder(catalog);
  builder.addPrinting('20037');
  const twins = catalog.findCard('english', 'the_twins');
  if (!twins) throw new Error('missing card');
  for (let i = 0; i < 10; i++) builder.addCard(twins);
  return builder.entries;
}

describe('fetchAssets', () => {
  it('keys results by URL whatever order requests complete in', async () => {
    const png = await solidPng();
    const delays: Record<string, number> = { 'https://img.test/a': 40, 'https://img.test/b': 0, 'https://img.test/c': 20 };
    const fetchImpl: FetchLike = async (url) => {
      await new Promise((resolve) => setTimeout(resolve, delays[url] ?? 0));
      return new Response(new Uint8Array(png));
    };

    const results = await fetchAssets(
      ['https://img.test/a', 'https://img.test/b', 'https://img.test/a', 'https://img.test/c'],
      { ...fetchOptions, fetchImpl }
    );

    expect(Array.from(results.keys()).sort()).toEqual(['https://img.test/a', 'https://img.test/b', 'https://img.test/c']);
    for (const result of results.values()) {
      if (!result.ok) throw result.error;
      const meta = await sharp(result.png).metadata();
      expect([meta.width, meta.height]).toEqual([10, 14]);
    }
  });

  it('reads file URLs from disk', async () => {
    const dir = await makeTempDir();
    const file = path.join(dir, 'art.png');
    await fs.promises.writeFile(file, await solidPng(40, 40));
    const url = pathToFileURL(file).href;

    const results = await fetchAssets([url], fetchOptions);
    expect(results.get(url)?.ok).toBe(true);
  });

  it('turns a failed request into an AssetError for that URL only', async () => {
    const results = await fetchAssets(['https://img.test/ok', 'https://img.test/broken', 'ftp://img.test/x'], {
      ...fetchOptions,
      fetchImpl: stubFetch(await solidPng(), ['broken']),
    });

    expect(results.get('https://img.test/ok')?.ok).toBe(true);
    const broken = results.get('https://img.test/broken');
    expect(broken?.ok).toBe(false);
    if (broken && !broken.ok) {
      expect(broken.error).toBeInstanceOf(AssetError);
      expect(broken.error.message).toBe('image request failed with HTTP 500');
    }
    expect(results.get('ftp://img.test/x')?.ok).toBe(false);
  });

  it('rejects with an AbortError when the signal fires mid-flight', async () => {
    const controller = new AbortController();
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });

    const pending = fetchAssets(['https://img.test/slow'], { ...fetchOptions, signal: controller.signal, fetchImpl });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toBeInstanceOf(GenerationAbortedError);
    await expect(pending).rejects.toMatchObject({ name: 'AbortError' });
  });
});

describe('renderSheets', () => {
  it('draws a placeholder for a failed image and renders every other slot', async () => {
    const entries = selection();
    const plan = planSheets(entries, buildProfile({ cut: 'none' }));
    const assets = new Map<string, AssetResult>();
    for (const entry of entries) assets.set(entry.imageUrl, { ok: true, png: Buffer.from('png') });
    assets.set('https://img.test/cards/english/card/20037.webp', {
      ok: false,
      error: new AssetError('image request failed with HTTP 500'),
    });

    const canvas = new RecordingCanvas();
    const summary = renderSheets(plan, assets, canvas);

    expect(summary).toEqual({ pages: 2, images: 10, placeholders: 1 });
    expect(canvas.calls[1]).toEqual({ op: 'placeholder', rect: plan.pages[0]?.slots[0]?.drawable, label: 'Noise' });
    expect(canvas.calls.filter((call) => call.op === 'page')).toHaveLength(2);
  });
});

describe('generateSheets', () => {
  it('produces a complete document when the first image fails', async () => {
    const result = await generateSheets(selection(), {
      profile: buildProfile(),
      dpi: 30,
      fetchImpl: stubFetch(await solidPng(), ['20037']),
    });

    expect(result.pages).toBe(2);
    expect(result.images).toBe(10);
    expect(result.placeholders).toBe(1);
    expect(result.failed).toEqual(['20037']);
    expect(result.pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(PLACEHOLDER_NOTE).toBe('image unavailable');
  });

  it('writes nothing when aborted', async () => {
    const dir = await makeTempDir();
    const outputPath = path.join(dir, 'sheets.pdf');
    const controller = new AbortController();
    controller.abort();

    await expect(
      writeSheets(selection(), outputPath, {
        profile: buildProfile(),
        dpi: 30,
        signal: controller.signal,
        fetchImpl: stubFetch(await solidPng()),
      })
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(fs.existsSync(outputPath)).toBe(false);
    expect(fs.existsSync(`${outputPath}.partial`)).toBe(false);
  });

  it('writes the PDF atomically', async () => {
    const dir = await makeTempDir();
    const outputPath = path.join(dir, 'out', 'sheets.pdf');
    await writeSheets(selection(), outputPath, { profile: buildProfile(), dpi: 30, fetchImpl: stubFetch(await solidPng()) });

    expect(fs.readFileSync(outputPath).subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(fs.existsSync(`${outputPath}.partial`)).toBe(false);
  });
});
