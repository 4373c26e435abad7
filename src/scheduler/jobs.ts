// ---------------------------------------------------------------------------
// The four background jobs and their schedules.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { ActivityLevel, type ScheduleConfig } from "../core/types.js";
import { CatalogSourceError } from "../core/errors.js";
import type { CatalogMirrorService } from "../catalog/catalog-mirror-service.js";
import type { HardcoverApi } from "../hardcover/hardcover-api.js";
import type { WantListService } from "../hardcover/want-list-service.js";
import type { BookshelfResolver } from "../hardcover/bookshelf-resolver.js";
import type { SuggestedDedup } from "../ranking/suggested-dedup.js";
import { CALIBRE_ACTIVITY_SOURCE } from "../catalog/catalog-mirror-service.js";
import { WANT_ACTIVITY_SOURCE } from "../hardcover/want-list-service.js";
import { BOOKSHELF_ACTIVITY_SOURCE } from "../hardcover/bookshelf-resolver.js";
import type { TaskDefinition } from "./periodic-task.js";

export const JobName = {
  CALIBRE_SYNC: "calibre-sync",
  WANT_SYNC: "want-sync",
  BOOKSHELF_SYNC: "bookshelf-sync",
  SUGGESTED_DEDUP: "suggested-dedup",
} as const;

export type JobName = (typeof JobName)[keyof typeof JobName];

export const SUGGESTED_ACTIVITY_SOURCE = "Suggested";

export interface JobDependencies {
  mirrorService: Pick<CatalogMirrorService, "sync">;
  hardcover: Pick<HardcoverApi, "isConfigured">;
  wantList: Pick<WantListService, "refresh">;
  bookshelf: Pick<BookshelfResolver, "run">;
  dedup: Pick<SuggestedDedup, "run">;
  schedule: ScheduleConfig;
  logger: pino.Logger;
}

const minutes = (value: number): number => Math.round(value * 60_000);

export function createJobs(deps: JobDependencies): TaskDefinition[] {
  const { schedule, logger } = deps;

  return [
    {
      name: JobName.CALIBRE_SYNC,
      source: CALIBRE_ACTIVITY_SOURCE,
      intervalMs: minutes(schedule.calibreSyncMinutes),
      runOnStart: true,
      async run() {
        try {
          await deps.mirrorService.sync();
        } catch (err) {
          // The mirror service has already written the activity entry.
          if (err instanceof CatalogSourceError) {
            logger.warn({ reason: err.reason }, "calibre sync skipped");
            return;
          }
          throw err;
        }
      },
    },
    {
      name: JobName.WANT_SYNC,
      source: WANT_ACTIVITY_SOURCE,
      intervalMs: minutes(schedule.wantSyncMinutes),
      async run(signal) {
        await deps.wantList.refresh(signal);
      },
    },
    {
      name: JobName.BOOKSHELF_SYNC,
      source: BOOKSHELF_ACTIVITY_SOURCE,
      intervalMs: minutes(schedule.bookshelfSyncMinutes),
      async run(signal) {
        if (!deps.hardcover.isConfigured) {
          logger.debug("hardcover not configured, skipping bookshelf sync");
          return;
        }
        await deps.bookshelf.run(signal);
      },
    },
    {
      name: JobName.SUGGESTED_DEDUP,
      source: SUGGESTED_ACTIVITY_SOURCE,
      intervalMs: minutes(schedule.suggestedDedupMinutes),
      async run() {
        const { removedOwned, hiddenDuplicates } = deps.dedup.run();
        if (removedOwned === 0 && hiddenDuplicates === 0) {
          return { level: ActivityLevel.INFO, message: "Checked for duplicate suggestions; none found." };
        }
        return {
          level: ActivityLevel.SUCCESS,
          message: `Removed ${removedOwned} owned and hid ${hiddenDuplicates} duplicate suggestions.`,
          details: { removedOwned, hiddenDuplicates },
        };
      },
    },
  ];
}
