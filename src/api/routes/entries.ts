/**
 * Entry Catalog Routes
 *
 * GET /api/entries      - every entry in the catalog
 * GET /api/entries/:id  - one entry, 404 if unknown
 */

import { Hono } from 'hono';
import type { EntryCatalog } from '@/core/catalog/entry-catalog';
import { success } from '../utils/response';

export function entriesRoutes(catalog: EntryCatalog): Hono {
  const router = new Hono();

  router.get('/', (c) => success(c, catalog.list()));

  router.get('/:id', (c) => success(c, catalog.get(c.req.param('id'))));

  return router;
}
