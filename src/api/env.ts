// ---------------------------------------------------------------------------
// Hono environment shared by the middleware and route factories.
// ---------------------------------------------------------------------------

import type pino from "pino";

export interface AppEnv {
  Variables: {
    requestId: string;
    logger: pino.Logger;
  };
}
