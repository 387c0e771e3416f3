import {ISchedulerStateStore} from "../interfaces/ISchedulerStateStore";
import {SchedulerState} from "../types/scheduler.types";

export class InMemorySchedulerStateStore implements ISchedulerStateStore {
  readonly saved: SchedulerState[] = [];

  constructor(private state: SchedulerState | null = null) { }

  async load(): Promise<SchedulerState | null> {
    return this.state;
  }

  async save(state: SchedulerState): Promise<void> {
    this.state = state;
    this.saved.push(state);
  }
}
