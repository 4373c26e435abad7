// ---------------------------------------------------------------------------
// User settings store.
// Reads a YAML settings file, validates with Zod, and hands out an immutable
// snapshot. `reload()` and `update()` are the only ways the snapshot changes.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse, stringify } from "yaml";
import type pino from "pino";
import type { UserSettings } from "../core/types.js";
import { ValidationError } from "../core/errors.js";

// ── Zod schema ──────────────────────────────────────────────────────────────

export const UserSettingsSchema = z.object({
  calibreLibraryPath: z
    .string()
    .trim()
    .transform((v) => (v === "" ? null : v))
    .nullable()
    .default(null),
  hardcoverListId: z.number().int().positive().nullable().default(null),
});

export const UserSettingsPatchSchema = UserSettingsSchema.partial();

export type UserSettingsPatch = z.input<typeof UserSettingsPatchSchema>;

const DEFAULT_SETTINGS: Readonly<UserSettings> = Object.freeze({
  calibreLibraryPath: null,
  hardcoverListId: null,
});

// ── Store ───────────────────────────────────────────────────────────────────

export class UserSettingsStore {
  private current: Readonly<UserSettings> = DEFAULT_SETTINGS;

  constructor(
    private readonly filePath: string,
    private readonly logger: pino.Logger,
  ) {
    this.reload();
  }

  /** The current settings snapshot. */
  get(): Readonly<UserSettings> {
    return this.current;
  }

  /**
   * Re-read the settings file. A missing file yields defaults; an invalid
   * file keeps the previous snapshot and logs the problem.
   */
  reload(): Readonly<UserSettings> {
    if (!fs.existsSync(this.filePath)) {
      this.current = DEFAULT_SETTINGS;
      return this.current;
    }

    try {
      const raw = fs.readFileSync(this.filePath, "utf-8");
      const parsed: unknown = parse(raw) ?? {};
      this.current = Object.freeze(UserSettingsSchema.parse(parsed));
    } catch (err) {
      this.logger.error({ err, filePath: this.filePath }, "user settings file is invalid; keeping previous settings");
    }

    return this.current;
  }

  /** Merge `patch` into the settings, persist them, and return the new snapshot. */
  update(patch: unknown): Readonly<UserSettings> {
    const result = UserSettingsPatchSchema.safeParse(patch);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ValidationError(
        issue ? `Invalid settings: ${issue.path.join(".")} ${issue.message}` : "Invalid settings",
      );
    }

    const next: UserSettings = { ...this.current };
    if (result.data.calibreLibraryPath !== undefined) {
      next.calibreLibraryPath = result.data.calibreLibraryPath;
    }
    if (result.data.hardcoverListId !== undefined) {
      next.hardcoverListId = result.data.hardcoverListId;
    }

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, stringify(next), "utf-8");
    this.current = Object.freeze(next);
    this.logger.info({ filePath: this.filePath }, "user settings updated");
    return this.current;
  }
}
