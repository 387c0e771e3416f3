import {ISchedulerStateStore} from "../interfaces/ISchedulerStateStore";
import {describeError} from "../shared/errors";
import {createLogger} from "../shared/logger";
import {Sleep, sleep as defaultSleep} from "../shared/sleep";
import {PassResult} from "../types/run.types";
import {SchedulerState} from "../types/scheduler.types";
import {abortedPass} from "./ClaimPass";
import {completeRun, decide, formatRemaining, initialState, progressStepMs, reconcileLoadedState} from "./schedulePlanner";

export type SchedulerPhase = "idle" | "loaded" | "waiting" | "running" | "shutting-down";

export interface SchedulerDeps {
  stateStore: ISchedulerStateStore;
  runPass: (signal: AbortSignal) => Promise<PassResult>;
  now?: () => Date;
  sleep?: Sleep;
}

export interface SchedulerOptions {
  intervalHours: number;
  runNow?: boolean;
}

const logger = createLogger("Scheduler");

/**
 * Runs one claim pass per interval and persists its state after every pass.
 * Aborting the signal ends the current wait immediately; a pass in flight
 * winds down on the same signal and its state is saved before `start` returns.
 */
export class Scheduler {
  private currentPhase: SchedulerPhase = "idle";
  private runNowRequested: boolean;
  private wakeController: AbortController | null = null;
  private readonly now: () => Date;
  private readonly sleep: Sleep;

  constructor(private readonly deps: SchedulerDeps, private readonly options: SchedulerOptions) {
    this.runNowRequested = options.runNow ?? false;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get phase(): SchedulerPhase {
    return this.currentPhase;
  }

  /** Start a pass as soon as possible, cutting the current wait short. */
  requestRunNow(): void {
    this.runNowRequested = true;
    this.wakeController?.abort();
  }

  async start(signal: AbortSignal): Promise<SchedulerState> {
    logger.info("scheduler-starting", {intervalHours: this.options.intervalHours});
    let state = await this.loadState();
    this.currentPhase = "loaded";

    while (!signal.aborted) {
      const decision = decide(state, this.now(), this.runNowRequested);
      if (decision.kind === "run") {
        this.runNowRequested = false;
        state = await this.runOnce(state, signal);
        continue;
      }

      await this.waitUntilDue(decision.waitMs, signal);
    }

    this.currentPhase = "shutting-down";
    logger.info("scheduler-shutting-down", {runCount: state.runCount});
    return state;
  }

  private async loadState(): Promise<SchedulerState> {
    try {
      const loaded = await this.deps.stateStore.load();
      if (!loaded) {
        logger.info("no-previous-state");
        return initialState(this.options.intervalHours);
      }

      const state = reconcileLoadedState(loaded, this.options.intervalHours);
      logger.info("loaded-previous-state", {
        runCount: state.runCount,
        lastRunTime: state.lastRunTime?.toISOString() ?? null,
        nextRunTime: state.nextRunTime?.toISOString() ?? null
      });
      return state;
    } catch (error) {
      logger.error("state-load-failed", {detail: describeError(error)});
      return initialState(this.options.intervalHours);
    }
  }

  private async runOnce(state: SchedulerState, signal: AbortSignal): Promise<SchedulerState> {
    this.currentPhase = "running";
    const startedAt = this.now();
    logger.info("run-started", {run: state.runCount + 1, at: startedAt.toISOString()});

    let result: PassResult;
    try {
      result = await this.deps.runPass(signal);
    } catch (error) {
      logger.error("run-threw", {run: state.runCount + 1, error});
      result = abortedPass(error instanceof Error ? error : new Error(describeError(error)));
    }

    const next = completeRun(state, startedAt, result);
    await this.persist(next);

    if (result.ok) {
      logger.info("run-completed", {run: next.runCount, finalState: result.finalState, ...next.lastRunStats});
    } else {
      logger.error("run-failed", {run: next.runCount, finalState: result.finalState, detail: result.error?.message});
    }
    logger.info("next-run-scheduled", {nextRunTime: next.nextRunTime?.toISOString() ?? null});
    return next;
  }

  private async persist(state: SchedulerState): Promise<void> {
    try {
      await this.deps.stateStore.save(state);
    } catch (error) {
      logger.error("state-save-failed", {detail: describeError(error)});
    }
  }

  private async waitUntilDue(waitMs: number, signal: AbortSignal): Promise<void> {
    this.currentPhase = "waiting";
    const deadline = this.now().getTime() + waitMs;
    const step = progressStepMs(waitMs);
    logger.info("waiting-for-next-run", {remaining: formatRemaining(waitMs)});

    const wake = new AbortController();
    const onShutdown = () => wake.abort();
    signal.addEventListener("abort", onShutdown, {once: true});
    this.wakeController = wake;

    try {
      while (!wake.signal.aborted) {
        const remaining = deadline - this.now().getTime();
        if (remaining <= 0) {
          return;
        }

        await this.sleep(Math.min(step, remaining), wake.signal);

        const left = deadline - this.now().getTime();
        if (left > 0 && !wake.signal.aborted) {
          logger.info("next-run-in", {remaining: formatRemaining(left)});
        }
      }
    } finally {
      signal.removeEventListener("abort", onShutdown);
      this.wakeController = null;
    }
  }
}
