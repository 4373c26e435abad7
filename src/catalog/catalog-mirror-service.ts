// ---------------------------------------------------------------------------
// Catalog mirror: snapshots the Calibre library into the local database.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { CatalogEntry, MirrorSyncResult, UserSettings } from "../core/types.js";
import { ActivityLevel } from "../core/types.js";
import { CatalogSourceError, errorMessage } from "../core/errors.js";
import type { ActivitySink } from "../activity/activity-log.js";
import type { CatalogReader } from "./calibre-reader.js";
import type { CatalogMirrorRepository } from "../storage/repositories/catalog-mirror-repository.js";
import type { ListCacheRepository } from "../storage/repositories/list-cache-repository.js";

export const CALIBRE_ACTIVITY_SOURCE = "Calibre sync";

export class CatalogMirrorService {
  private inFlight: Promise<MirrorSyncResult> | null = null;

  constructor(
    private readonly reader: CatalogReader,
    private readonly mirror: CatalogMirrorRepository,
    private readonly listCache: ListCacheRepository,
    private readonly settings: () => Readonly<UserSettings>,
    private readonly activity: ActivitySink,
    private readonly logger: pino.Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Re-read the whole catalog and replace the mirror atomically.
   *
   * Concurrent callers share one run. A read failure throws
   * {@link CatalogSourceError} and leaves the previous mirror untouched.
   */
  sync(): Promise<MirrorSyncResult> {
    if (this.inFlight) {
      this.logger.debug("calibre sync already running; joining");
      return this.inFlight;
    }

    this.inFlight = this.runSync().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  get isSyncing(): boolean {
    return this.inFlight !== null;
  }

  private async runSync(): Promise<MirrorSyncResult> {
    const sourcePath = this.settings().calibreLibraryPath;
    if (!sourcePath) {
      const err = new CatalogSourceError("Calibre path not configured.", "not_configured");
      this.activity.record(CALIBRE_ACTIVITY_SOURCE, ActivityLevel.WARNING, err.message);
      throw err;
    }

    const started = performance.now();
    let entries: CatalogEntry[];
    try {
      entries = this.reader.read(sourcePath);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn({ sourcePath, err: message }, "calibre read failed; mirror unchanged");
      this.activity.record(CALIBRE_ACTIVITY_SOURCE, ActivityLevel.ERROR, message, { sourcePath });
      throw err;
    }

    const snapshotTime = this.now().toISOString();
    const { addedIds, removedIds } = this.mirror.replaceAll(entries, sourcePath, snapshotTime);
    const reconciled = this.listCache.reconcile(entries);

    const result: MirrorSyncResult = {
      count: entries.length,
      addedIds,
      removedIds,
      snapshotTime,
    };

    this.logger.info(
      {
        count: result.count,
        added: addedIds.length,
        removed: removedIds.length,
        cache: reconciled,
        durationMs: Math.round(performance.now() - started),
      },
      "calibre mirror replaced",
    );
    this.activity.record(
      CALIBRE_ACTIVITY_SOURCE,
      ActivityLevel.SUCCESS,
      `Mirrored ${result.count} books (+${addedIds.length} / -${removedIds.length}).`,
      { added: addedIds.length, removed: removedIds.length, snapshot: snapshotTime },
    );

    return result;
  }
}
