// ---------------------------------------------------------------------------
// Background job routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Scheduler } from "../../scheduler/periodic-task.js";
import type { AppEnv } from "../env.js";

/**
 * - `GET  /jobs`           -- status of every background task.
 * - `POST /jobs/:name/run` -- start a run now; answers before it finishes.
 */
export function jobRoutes(deps: { scheduler: Pick<Scheduler, "get" | "statuses"> }): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => c.json({ jobs: deps.scheduler.statuses() }));

  app.post("/:name/run", (c) => {
    const name = c.req.param("name");
    const task = deps.scheduler.get(name);
    if (!task) {
      return c.json({ error: `Unknown job: ${name}`, type: "not_found" }, 404);
    }
    if (task.status().running) {
      return c.json({ name, status: "already_running" }, 409);
    }
    // runNow() records its own failures and never rejects.
    void task.runNow();
    return c.json({ name, status: "started" }, 202);
  });

  return app;
}
