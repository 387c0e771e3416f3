export interface LastRunStats {
  processed: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
}

export interface SchedulerState {
  runCount: number;
  lastRunTime: Date | null;
  nextRunTime: Date | null;
  lastRunSuccess: boolean | null;
  scheduleIntervalHours: number;
  lastRunStats?: LastRunStats;
}

export type ScheduleDecision = {kind: "run"} | {kind: "wait"; waitMs: number};
