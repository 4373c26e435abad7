// ---------------------------------------------------------------------------
// Periodic background tasks: single-flight, timer-driven, outcome recorded
// to the activity log.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { ActivityLevel, type JsonValue } from "../core/types.js";
import { errorMessage } from "../core/errors.js";
import type { ActivitySink } from "../activity/activity-log.js";

// ── Types ──────────────────────────────────────────────────────────────────

/** What a task run wants written to the activity log, if anything. */
export interface TaskOutcome {
  level: ActivityLevel;
  message: string;
  details?: JsonValue;
}

export interface TaskDefinition {
  name: string;
  /** Activity-log source for outcomes and failures. */
  source: string;
  /** ≤ 0 disables the timer; `runNow()` still works. */
  intervalMs: number;
  runOnStart?: boolean;
  run(signal: AbortSignal): Promise<TaskOutcome | void>;
}

export type TaskRunStatus = "completed" | "failed" | "skipped";

export interface TaskStatus {
  name: string;
  intervalMs: number;
  enabled: boolean;
  running: boolean;
  runs: number;
  lastStartedAt: string | null;
  lastFinishedAt: string | null;
  lastStatus: TaskRunStatus | null;
  lastError: string | null;
}

// ── PeriodicTask ───────────────────────────────────────────────────────────

export class PeriodicTask {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private started = false;
  private controller = new AbortController();
  private runs = 0;
  private lastStartedAt: string | null = null;
  private lastFinishedAt: string | null = null;
  private lastStatus: TaskRunStatus | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly definition: TaskDefinition,
    private readonly activity: ActivitySink,
    private readonly logger: pino.Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get name(): string {
    return this.definition.name;
  }

  get enabled(): boolean {
    return this.definition.intervalMs > 0;
  }

  start(): void {
    if (this.started) return;
    if (!this.enabled) {
      this.logger.info({ task: this.name }, "task disabled");
      return;
    }
    this.started = true;
    this.controller = new AbortController();
    this.schedule(this.definition.runOnStart ? 0 : this.definition.intervalMs);
    this.logger.info({ task: this.name, intervalMs: this.definition.intervalMs }, "task scheduled");
  }

  /** Cancel the timer and signal any in-flight run to stop. */
  stop(): void {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller.abort();
  }

  /**
   * Run the task once now. A run already in progress makes this a no-op
   * reporting `skipped`. Never rejects.
   */
  async runNow(): Promise<TaskRunStatus> {
    if (this.running) {
      this.logger.debug({ task: this.name }, "previous run still active; skipping");
      return "skipped";
    }

    this.running = true;
    this.runs++;
    this.lastStartedAt = this.now().toISOString();
    const started = performance.now();
    let status: TaskRunStatus;

    try {
      const outcome = await this.definition.run(this.controller.signal);
      if (outcome) {
        this.activity.record(this.definition.source, outcome.level, outcome.message, outcome.details);
      }
      status = "completed";
      this.lastError = null;
    } catch (err) {
      status = "failed";
      this.lastError = errorMessage(err);
      this.logger.error({ task: this.name, err }, "task failed");
      this.activity.record(this.definition.source, ActivityLevel.ERROR, this.lastError, {
        task: this.name,
      });
    } finally {
      this.running = false;
    }

    this.lastStatus = status;
    this.lastFinishedAt = this.now().toISOString();
    this.logger.debug(
      { task: this.name, status, durationMs: Math.round(performance.now() - started) },
      "task run finished",
    );
    return status;
  }

  status(): TaskStatus {
    return {
      name: this.name,
      intervalMs: this.definition.intervalMs,
      enabled: this.enabled,
      running: this.running,
      runs: this.runs,
      lastStartedAt: this.lastStartedAt,
      lastFinishedAt: this.lastFinishedAt,
      lastStatus: this.lastStatus,
      lastError: this.lastError,
    };
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runNow().then(() => {
        if (this.started) this.schedule(this.definition.intervalMs);
      });
    }, delayMs);

    // Allow the process to exit even if the timer is still pending.
    if (typeof this.timer === "object" && "unref" in this.timer) {
      this.timer.unref();
    }
  }
}

// ── Scheduler ──────────────────────────────────────────────────────────────

/** Owns the background tasks; no task waits on another. */
export class Scheduler {
  private readonly tasks = new Map<string, PeriodicTask>();

  constructor(
    definitions: readonly TaskDefinition[],
    activity: ActivitySink,
    logger: pino.Logger,
    now?: () => Date,
  ) {
    for (const definition of definitions) {
      this.tasks.set(
        definition.name,
        new PeriodicTask(definition, activity, logger.child({ task: definition.name }), now),
      );
    }
  }

  start(): void {
    for (const task of this.tasks.values()) task.start();
  }

  stop(): void {
    for (const task of this.tasks.values()) task.stop();
  }

  get(name: string): PeriodicTask | undefined {
    return this.tasks.get(name);
  }

  statuses(): TaskStatus[] {
    return [...this.tasks.values()].map((t) => t.status());
  }
}
