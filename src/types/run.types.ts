export interface BatchStatistics {
  pageNumber: number;
  processed: number;
  succeeded: number;
  failed: number;
  elapsedMs: number;
}

export interface RunStatistics {
  pages: number;
  processed: number;
  succeeded: number;
  failed: number;
  successRate: number;
  elapsedMs: number;
  claimsPerSecond: number;
}

export type BatchDriverState = "idle" | "paging" | "claiming" | "delaying" | "done" | "cancelled";

export type PassFinalState = "done" | "cancelled" | "aborted";

export interface PassResult {
  ok: boolean;
  finalState: PassFinalState;
  statistics: RunStatistics;
  error?: Error;
}
