import {PassResult} from "../types/run.types";
import {ScheduleDecision, SchedulerState} from "../types/scheduler.types";

const HOUR_MS = 3_600_000;
const MAX_PROGRESS_STEP_MS = 5 * 60_000;
const MIN_PROGRESS_STEP_MS = 1_000;

export function intervalMs(intervalHours: number): number {
  return Math.round(intervalHours * HOUR_MS);
}

export function initialState(intervalHours: number): SchedulerState {
  return {
    runCount: 0,
    lastRunTime: null,
    nextRunTime: null,
    lastRunSuccess: null,
    scheduleIntervalHours: intervalHours
  };
}

/**
 * Applies the configured interval to a state loaded from disk. The next run is
 * always derived from the last run, so a changed interval takes effect on
 * restart and a run is never scheduled earlier than lastRun + interval.
 */
export function reconcileLoadedState(state: SchedulerState, intervalHours: number): SchedulerState {
  return {
    ...state,
    scheduleIntervalHours: intervalHours,
    nextRunTime: state.lastRunTime ? new Date(state.lastRunTime.getTime() + intervalMs(intervalHours)) : null
  };
}

export function decide(state: SchedulerState, now: Date, runNowRequested: boolean): ScheduleDecision {
  if (runNowRequested || !state.nextRunTime) {
    return {kind: "run"};
  }

  const waitMs = state.nextRunTime.getTime() - now.getTime();
  return waitMs <= 0 ? {kind: "run"} : {kind: "wait", waitMs};
}

/** State after a pass that started at `startedAt`; pass duration does not shift the schedule. */
export function completeRun(state: SchedulerState, startedAt: Date, result: PassResult): SchedulerState {
  return {
    runCount: state.runCount + 1,
    lastRunTime: startedAt,
    nextRunTime: new Date(startedAt.getTime() + intervalMs(state.scheduleIntervalHours)),
    lastRunSuccess: result.ok,
    scheduleIntervalHours: state.scheduleIntervalHours,
    lastRunStats: {
      processed: result.statistics.processed,
      succeeded: result.statistics.succeeded,
      failed: result.statistics.failed,
      cancelled: result.finalState === "cancelled"
    }
  };
}

export function progressStepMs(totalWaitMs: number): number {
  return Math.max(MIN_PROGRESS_STEP_MS, Math.min(MAX_PROGRESS_STEP_MS, totalWaitMs / 10));
}

export function formatRemaining(ms: number): string {
  const hours = ms / HOUR_MS;
  if (hours >= 1) {
    return `${hours.toFixed(1)} hours`;
  }
  return `${(ms / 60_000).toFixed(1)} minutes`;
}
