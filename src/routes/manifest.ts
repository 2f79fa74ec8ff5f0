/**
 * Proxy Sheets – Manifest API Routes
 *
 * - `/api/manifest`       : the compiled primary manifest as JSON
 * - `/api/manifest/local` : the local overlay as JSON, or 404 when there is none
 *
 * Both are served from the catalog loaded at startup; nothing here reads the disk.
 */

import express from 'express';

import type { Catalog } from '../catalog/catalog';

export function createManifestRouter(catalog: Catalog): express.Router {
  const router = express.Router();

  /**
   * GET /api/manifest
   */
  router.get('/manifest', (_req, res) => {
    res.json(catalog.primary);
  });

  /**
   * GET /api/manifest/local
   */
  router.get('/manifest/local', (_req, res) => {
    if (!catalog.overlay) {
      res.status(404).json({ error: 'No local overlay manifest is loaded.' });
      return;
    }
    res.json(catalog.overlay);
  });

  return router;
}
