/**
 * Proxy Sheets – Sheet Generation Route
 *
 * POST /api/sheets
 *   body: { deckList?: string, printings?: string[], profile?: { paper, bleed, cut, rows, columns, ... } }
 *   200:  application/pdf
 *   400:  { error, ids } for a bad body, an unknown reference or an unusable layout
 *
 * Key Details:
 * - Printings listed in `printings` come first, then the deck list, in order.
 * - When the client disconnects mid-generation, outstanding image fetches are aborted.
 */

import express from 'express';
import { z } from 'zod';
import { fromError } from 'zod-validation-error';

import type { Catalog } from '../catalog/catalog';
import { buildProfile, profileOptionsSchema } from '../sheets/geometry';
import type { FetchLike } from '../sheets/assetFetcher';
import { generateSheets } from '../sheets/generateSheets';
import { SelectionBuilder } from '../sheets/selection';
import { BaseError, GenerationAbortedError, LayoutError, LoadError, describeError } from '../utils/errors';
import { logError, logInfo } from '../utils/fileHelpers';

const TAG = 'routes/sheets';

export const sheetRequestSchema = z
  .object({
    deckList: z.string().optional(),
    printings: z.array(z.string().min(1)).optional(),
    profile: profileOptionsSchema.optional(),
  })
  .strict();

export interface SheetsRouterOptions {
  fetchImpl?: FetchLike;
}

export function createSheetsRouter(catalog: Catalog, options: SheetsRouterOptions = {}): express.Router {
  const router = express.Router();

  router.post('/sheets', async (req, res) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const parsed = sheetRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: fromError(parsed.error).message, ids: [] });
        return;
      }

      const selection = new SelectionBuilder(catalog);
      for (const id of parsed.data.printings ?? []) selection.addPrinting(id);
      if (parsed.data.deckList) selection.parseDeckList(parsed.data.deckList);

      const result = await generateSheets(selection.entries, {
        profile: buildProfile(parsed.data.profile),
        signal: controller.signal,
        fetchImpl: options.fetchImpl,
      });

      logInfo(TAG, `Generated ${result.pages} pages for ${selection.size} entries`);
      res
        .status(200)
        .type('application/pdf')
        .setHeader('Content-Disposition', 'attachment; filename="proxy-sheets.pdf"');
      res.send(result.pdf);
    } catch (err) {
      if (err instanceof GenerationAbortedError) {
        logInfo(TAG, 'Client disconnected; sheet generation aborted');
        return;
      }
      if (err instanceof LoadError || err instanceof LayoutError) {
        res.status(400).json({ error: err.message, ids: err.ids });
        return;
      }
      logError(TAG, describeError(err));
      res.status(500).json({
        error: 'Server error while generating sheets.',
        ids: err instanceof BaseError ? err.ids : [],
      });
    }
  });

  return router;
}
