import {mkdir, readFile, rename, rm, writeFile} from "node:fs/promises";
import {dirname} from "node:path";
import {z} from "zod";
import {ISchedulerStateStore} from "../interfaces/ISchedulerStateStore";
import {SchedulerState} from "../types/scheduler.types";

const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), {message: "invalid ISO-8601 timestamp"})
  .transform((value) => new Date(value));

const persistedStateSchema = z.object({
  run_count: z.number().int().nonnegative(),
  last_run_time: isoTimestamp.nullable(),
  next_run_time: isoTimestamp.nullable(),
  last_run_success: z.boolean().nullable(),
  schedule_interval_hours: z.number().positive(),
  last_run_stats: z
    .object({
      processed: z.number().int().nonnegative(),
      succeeded: z.number().int().nonnegative(),
      failed: z.number().int().nonnegative(),
      cancelled: z.boolean()
    })
    .optional()
});

export type PersistedSchedulerState = z.input<typeof persistedStateSchema>;

export function serializeSchedulerState(state: SchedulerState): PersistedSchedulerState {
  return {
    run_count: state.runCount,
    last_run_time: state.lastRunTime ? state.lastRunTime.toISOString() : null,
    next_run_time: state.nextRunTime ? state.nextRunTime.toISOString() : null,
    last_run_success: state.lastRunSuccess,
    schedule_interval_hours: state.scheduleIntervalHours,
    ...(state.lastRunStats ? {last_run_stats: state.lastRunStats} : {})
  };
}

export function parseSchedulerState(raw: unknown): SchedulerState {
  const parsed = persistedStateSchema.parse(raw);
  return {
    runCount: parsed.run_count,
    lastRunTime: parsed.last_run_time,
    nextRunTime: parsed.next_run_time,
    lastRunSuccess: parsed.last_run_success,
    scheduleIntervalHours: parsed.schedule_interval_hours,
    ...(parsed.last_run_stats ? {lastRunStats: parsed.last_run_stats} : {})
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Scheduler state as a JSON file. Writes go to a sibling temp file that is
 * renamed over the target, so a crash leaves either the old or the new state.
 */
export class JsonSchedulerStateStore implements ISchedulerStateStore {
  constructor(private readonly path: string) { }

  async load(): Promise<SchedulerState | null> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const raw: unknown = JSON.parse(text);
    return parseSchedulerState(raw);
  }

  async save(state: SchedulerState): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`;
    await mkdir(dirname(this.path), {recursive: true});

    try {
      await writeFile(tempPath, `${JSON.stringify(serializeSchedulerState(state), null, 2)}\n`, "utf8");
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, {force: true});
      throw error;
    }
  }
}
