import {SchedulerState} from "../types/scheduler.types";

export interface ISchedulerStateStore {
  load(): Promise<SchedulerState | null>;
  save(state: SchedulerState): Promise<void>;
}
