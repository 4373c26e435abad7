// ---------------------------------------------------------------------------
// Activity log route.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { ActivityLog } from "../../activity/activity-log.js";
import type { AppEnv } from "../env.js";
import { TakeQuerySchema, validate } from "../schemas.js";

/** `GET /activity?take=` -- newest entries first. */
export function activityRoutes(deps: { activity: Pick<ActivityLog, "recent"> }): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    const { take } = validate(TakeQuerySchema, c.req.query());
    const entries = deps.activity.recent(take);
    return c.json({ count: entries.length, entries });
  });

  return app;
}
