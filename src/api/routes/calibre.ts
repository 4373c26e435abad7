// ---------------------------------------------------------------------------
// Calibre mirror routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { CatalogMirrorService } from "../../catalog/catalog-mirror-service.js";
import type { CatalogMirrorRepository } from "../../storage/repositories/catalog-mirror-repository.js";
import type { AppEnv } from "../env.js";
import { TakeQuerySchema, validate } from "../schemas.js";

export interface CalibreRouteDeps {
  mirrorService: Pick<CatalogMirrorService, "sync" | "isSyncing">;
  mirror: CatalogMirrorRepository;
}

/**
 * - `POST /calibre/sync`   -- re-read the library now.
 * - `GET  /calibre/books`  -- mirrored books, newest first (`?take=`).
 * - `GET  /calibre/state`  -- last snapshot metadata.
 */
export function calibreRoutes(deps: CalibreRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post("/sync", async (c) => {
    const result = await deps.mirrorService.sync();
    return c.json(result);
  });

  app.get("/books", (c) => {
    const { take } = validate(TakeQuerySchema, c.req.query());
    const books = deps.mirror.getBooks(take ?? 0);
    return c.json({ count: books.length, books });
  });

  app.get("/state", (c) => {
    return c.json({ ...deps.mirror.getState(), syncing: deps.mirrorService.isSyncing });
  });

  return app;
}
