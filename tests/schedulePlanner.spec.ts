import {expect} from "chai";
import {
  completeRun,
  decide,
  formatRemaining,
  initialState,
  intervalMs,
  progressStepMs,
  reconcileLoadedState
} from "../src/services/schedulePlanner";
import {SchedulerState} from "../src/types/scheduler.types";
import {donePass} from "./helpers";

const T = new Date("2026-03-10T08:00:00.000Z");
const HOUR = 3_600_000;

function stateAfterRun(lastRunTime: Date, intervalHours = 24): SchedulerState {
  return {
    runCount: 3,
    lastRunTime,
    nextRunTime: new Date(lastRunTime.getTime() + intervalHours * HOUR),
    lastRunSuccess: true,
    scheduleIntervalHours: intervalHours
  };
}

describe("schedulePlanner", function () {
  it("converts fractional hours to whole milliseconds", function () {
    expect(intervalMs(24)).to.equal(86_400_000);
    expect(intervalMs(0.5)).to.equal(1_800_000);
  });

  it("runs immediately from a fresh state", function () {
    expect(decide(initialState(24), T, false)).to.deep.equal({kind: "run"});
  });

  it("waits until the next run time", function () {
    const state = stateAfterRun(new Date(T.getTime() - 20 * HOUR));

    expect(decide(state, T, false)).to.deep.equal({kind: "wait", waitMs: 4 * HOUR});
  });

  it("runs when the next run time has passed or a run is requested", function () {
    const overdue = stateAfterRun(new Date(T.getTime() - 30 * HOUR));
    const pending = stateAfterRun(new Date(T.getTime() - HOUR));

    expect(decide(overdue, T, false)).to.deep.equal({kind: "run"});
    expect(decide(pending, T, true)).to.deep.equal({kind: "run"});
  });

  it("schedules the next run from the start of the pass", function () {
    const next = completeRun(initialState(24), T, donePass({processed: 4, succeeded: 3, failed: 1}));

    expect(next).to.deep.equal({
      runCount: 1,
      lastRunTime: T,
      nextRunTime: new Date("2026-03-11T08:00:00.000Z"),
      lastRunSuccess: true,
      scheduleIntervalHours: 24,
      lastRunStats: {processed: 4, succeeded: 3, failed: 1, cancelled: false}
    });
  });

  it("records a cancelled pass and a failed pass", function () {
    const cancelled = completeRun(initialState(24), T, {...donePass({processed: 2, succeeded: 2}), finalState: "cancelled"});
    const failed = completeRun(initialState(24), T, {...donePass(), ok: false, finalState: "aborted", error: new Error("down")});

    expect(cancelled.lastRunSuccess).to.equal(true);
    expect(cancelled.lastRunStats?.cancelled).to.equal(true);
    expect(failed.lastRunSuccess).to.equal(false);
    expect(failed.nextRunTime?.toISOString()).to.equal("2026-03-11T08:00:00.000Z");
  });

  it("recomputes the next run from the last run with the configured interval", function () {
    const loaded = stateAfterRun(T, 24);

    const reconciled = reconcileLoadedState(loaded, 6);

    expect(reconciled.scheduleIntervalHours).to.equal(6);
    expect(reconciled.nextRunTime?.toISOString()).to.equal("2026-03-10T14:00:00.000Z");
    expect(reconciled.runCount).to.equal(3);
  });

  it("leaves a never-run state due immediately", function () {
    expect(reconcileLoadedState(initialState(24), 12).nextRunTime).to.equal(null);
  });

  it("reports progress every tenth of the wait, between one second and five minutes", function () {
    expect(progressStepMs(HOUR)).to.equal(300_000);
    expect(progressStepMs(60_000)).to.equal(6_000);
    expect(progressStepMs(5_000)).to.equal(1_000);
  });

  it("formats the remaining wait in hours or minutes", function () {
    expect(formatRemaining(5.25 * HOUR)).to.equal("5.3 hours");
    expect(formatRemaining(90_000)).to.equal("1.5 minutes");
  });
});
