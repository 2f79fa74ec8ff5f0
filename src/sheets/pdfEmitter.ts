/**
 * Proxy Sheets – PDF Emitter
 *
 * PURPOSE:
 *   Draws a sheet plan page by page: images into their drawable rectangles, a visible
 *   placeholder for every slot whose image failed, then the cut guides on top.
 *
 * CONTEXT:
 *   - Drawing goes through the small SheetCanvas interface. PdfKitCanvas renders with pdfkit;
 *     tests record the calls instead.
 *   - The document is built in memory and written once, atomically, at the very end.
 *   - Document metadata carries a fixed creation date.
 */

import PDFDocument from 'pdfkit';

import { SerializationError } from '../utils/errors';
import { writeFileAtomic } from '../utils/fileHelpers';
import type { AssetResult } from './assetFetcher';
import type { Rect, Segment, SheetPlan } from './layout';
import type { SelectionEntry } from './selection';

const MM_TO_PT = 72 / 25.4;

/** Cut guides are drawn half a point wide. */
export const CUT_GUIDE_THICKNESS_MM = 0.5 / MM_TO_PT;

export const PLACEHOLDER_NOTE = 'image unavailable';

export interface SheetCanvas {
  addPage(widthMm: number, heightMm: number): void;
  drawImage(png: Buffer, rect: Rect): void;
  drawPlaceholder(rect: Rect, label: string): void;
  drawSegment(segment: Segment, thicknessMm: number): void;
}

export class PdfKitCanvas implements SheetCanvas {
  private readonly doc: PDFKit.PDFDocument;
  private readonly chunks: Buffer[] = [];
  private readonly done: Promise<Buffer>;

  constructor(title = 'Proxy sheets') {
    this.doc = new PDFDocument({
      autoFirstPage: false,
      margin: 0,
      info: { Title: title, CreationDate: new Date(0) },
    });
    this.done = new Promise<Buffer>((resolve, reject) => {
      this.doc.on('data', (chunk: Buffer) => this.chunks.push(chunk));
      this.doc.on('end', () => resolve(Buffer.concat(this.chunks)));
      this.doc.on('error', reject);
    });
  }

  addPage(widthMm: number, heightMm: number): void {
    this.doc.addPage({ size: [widthMm * MM_TO_PT, heightMm * MM_TO_PT], margin: 0 });
  }

  drawImage(png: Buffer, rect: Rect): void {
    this.doc.image(png, rect.x * MM_TO_PT, rect.y * MM_TO_PT, {
      width: rect.width * MM_TO_PT,
      height: rect.height * MM_TO_PT,
    });
  }

  drawPlaceholder(rect: Rect, label: string): void {
    const x = rect.x * MM_TO_PT;
    const y = rect.y * MM_TO_PT;
    const width = rect.width * MM_TO_PT;
    const height = rect.height * MM_TO_PT;

    this.doc.save();
    this.doc.rect(x, y, width, height).fill('#d9d9d9');
    this.doc.rect(x, y, width, height).lineWidth(1).stroke('#555555');
    this.doc
      .fillColor('#222222')
      .fontSize(10)
      .text(label, x + 6, y + height / 2 - 14, { width: width - 12, align: 'center', lineBreak: false });
    this.doc
      .fillColor('#555555')
      .fontSize(8)
      .text(PLACEHOLDER_NOTE, x + 6, y + height / 2 + 2, { width: width - 12, align: 'center', lineBreak: false });
    this.doc.restore();
  }

  drawSegment(segment: Segment, thicknessMm: number): void {
    this.doc
      .moveTo(segment.x1 * MM_TO_PT, segment.y1 * MM_TO_PT)
      .lineTo(segment.x2 * MM_TO_PT, segment.y2 * MM_TO_PT)
      .lineWidth(thicknessMm * MM_TO_PT)
      .stroke('#000000');
  }

  /** Ends the document and resolves to its bytes. */
  finish(): Promise<Buffer> {
    this.doc.end();
    return this.done;
  }
}

export interface RenderSummary {
  pages: number;
  images: number;
  placeholders: number;
}

/**
 * Draws every page of the plan onto the canvas, in page and slot order.
 */
export function renderSheets(
  plan: SheetPlan<SelectionEntry>,
  assets: ReadonlyMap<string, AssetResult>,
  canvas: SheetCanvas
): RenderSummary {
  const summary: RenderSummary = { pages: 0, images: 0, placeholders: 0 };

  for (const page of plan.pages) {
    canvas.addPage(plan.profile.pageWidth, plan.profile.pageHeight);
    summary.pages++;

    for (const slot of page.slots) {
      if (!slot) continue;
      const asset = assets.get(slot.entry.imageUrl);
      if (asset?.ok) {
        canvas.drawImage(asset.png, slot.drawable);
        summary.images++;
      } else {
        canvas.drawPlaceholder(slot.drawable, slot.entry.name);
        summary.placeholders++;
      }
    }

    for (const segment of page.cutGuides) {
      canvas.drawSegment(segment, CUT_GUIDE_THICKNESS_MM);
    }
  }

  return summary;
}

export async function writePdfAtomic(outputPath: string, pdf: Buffer): Promise<void> {
  try {
    await writeFileAtomic(outputPath, pdf);
  } catch (err) {
    throw new SerializationError(`cannot write PDF ${outputPath}`, { ids: [outputPath], cause: err });
  }
}
