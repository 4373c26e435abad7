// ---------------------------------------------------------------------------
// User settings routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { UserSettingsStore } from "../../config/user-settings.js";
import type { AppEnv } from "../env.js";
import { readJsonBody } from "../schemas.js";

/**
 * - `GET /settings` -- current settings snapshot.
 * - `PUT /settings` -- merge a partial update and persist it.
 */
export function settingsRoutes(deps: { settings: UserSettingsStore }): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => c.json(deps.settings.get()));

  app.put("/", async (c) => {
    return c.json(deps.settings.update(await readJsonBody(c)));
  });

  return app;
}
