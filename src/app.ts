/**
 * Proxy Sheets – Express Application
 *
 * Builds the HTTP surface the card browser talks to. Kept separate from the entry point so
 * tests can mount it on an ephemeral port with a catalog of their own.
 */

import express from 'express';
import cors = require('cors');

import path from 'path';

import type { Catalog } from './catalog/catalog';
import { LOCAL_ASSETS_DIR } from './models/Manifest';
import { createManifestRouter } from './routes/manifest';
import { createSheetsRouter, type SheetsRouterOptions } from './routes/sheets';

export interface AppOptions extends SheetsRouterOptions {
  catalog: Catalog;
  /** Path of the primary manifest; local assets are served from beside it. */
  manifestPath: string;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();

  // Local-only images referenced by the overlay
  app.use(
    `/${LOCAL_ASSETS_DIR}`,
    express.static(path.join(path.dirname(path.resolve(options.manifestPath)), LOCAL_ASSETS_DIR))
  );

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', createManifestRouter(options.catalog));
  app.use('/api', createSheetsRouter(options.catalog, { fetchImpl: options.fetchImpl }));

  // Health check endpoint for hosting providers
  app.get('/health', (_req, res) => res.status(200).send('OK'));

  return app;
}
