// ---------------------------------------------------------------------------
// Suggested store routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import { HiddenFlag } from "../../core/types.js";
import type { RankingService } from "../../ranking/ranking-service.js";
import type { SuggestedRepository } from "../../storage/repositories/suggested-repository.js";
import type { AppEnv } from "../env.js";
import { HideBodySchema, IdsBodySchema, readJsonBody, toValidIds, validate } from "../schemas.js";

export interface SuggestedRouteDeps {
  suggested: SuggestedRepository;
  ranking: Pick<RankingService, "rankVisible">;
}

/**
 * - `GET    /suggested`          -- visible suggestions, most recently updated first.
 * - `GET    /suggested/ranked`   -- visible suggestions scored against the library;
 *                                   owned ones are deleted on the way.
 * - `GET    /suggested/hidden`   -- hidden suggestions.
 * - `GET    /suggested/ignored`  -- ignored suggestions.
 * - `POST   /suggested/hide`     -- `{ ids, hidden?: 1 | 2 }`.
 * - `POST   /suggested/ignore`   -- `{ ids }`.
 * - `POST   /suggested/unhide`   -- `{ ids }`.
 * - `DELETE /suggested`          -- `{ ids }`.
 */
export function suggestedRoutes(deps: SuggestedRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    const suggestions = deps.suggested.getAll();
    return c.json({ count: suggestions.length, suggestions });
  });

  app.get("/ranked", (c) => {
    const { suggestions, removedOwnedIds } = deps.ranking.rankVisible();
    return c.json({ count: suggestions.length, removedOwned: removedOwnedIds.length, suggestions });
  });

  app.get("/hidden", (c) => {
    const suggestions = deps.suggested.getByHidden(HiddenFlag.HIDDEN);
    return c.json({ count: suggestions.length, suggestions });
  });

  app.get("/ignored", (c) => {
    const suggestions = deps.suggested.getByHidden(HiddenFlag.IGNORED);
    return c.json({ count: suggestions.length, suggestions });
  });

  app.post("/hide", async (c) => {
    const body = validate(HideBodySchema, await readJsonBody(c));
    const updated = deps.suggested.hide(toValidIds(body.ids), body.hidden);
    return c.json({ updated });
  });

  app.post("/ignore", async (c) => {
    const body = validate(IdsBodySchema, await readJsonBody(c));
    const updated = deps.suggested.hide(toValidIds(body.ids), HiddenFlag.IGNORED);
    return c.json({ updated });
  });

  app.post("/unhide", async (c) => {
    const body = validate(IdsBodySchema, await readJsonBody(c));
    const updated = deps.suggested.unhide(toValidIds(body.ids));
    return c.json({ updated });
  });

  app.delete("/", async (c) => {
    const body = validate(IdsBodySchema, await readJsonBody(c));
    const deleted = deps.suggested.deleteByIds(toValidIds(body.ids));
    return c.json({ deleted });
  });

  return app;
}
