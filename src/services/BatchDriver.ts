import {IAccountStore} from "../interfaces/IAccountStore";
import {ClaimAbortedError, describeError} from "../shared/errors";
import {createLogger} from "../shared/logger";
import {Sleep, sleep as defaultSleep} from "../shared/sleep";
import {Account} from "../types/account.types";
import {AccountOutcome, ClaimOutcome, isSuccessfulOutcome} from "../types/claim.types";
import {BatchDriverState, BatchStatistics, RunStatistics} from "../types/run.types";

export const DEFAULT_PAGE_SIZE = 500;

export interface ClaimRunner {
  execute(account: Account, signal?: AbortSignal): Promise<ClaimOutcome>;
}

export interface BatchDriverOptions {
  pageSize: number;
  delayMs: number;
  maxAccounts?: number | null;
  onOutcome?: (record: AccountOutcome) => void;
  sleep?: Sleep;
  now?: () => number;
}

export interface BatchDriverResult {
  finalState: "done" | "cancelled";
  statistics: RunStatistics;
}

const logger = createLogger("BatchDriver");

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function summarizeRun(
  totals: {pages: number; processed: number; succeeded: number; failed: number},
  elapsedMs: number
): RunStatistics {
  return {
    ...totals,
    successRate: totals.processed > 0 ? round((totals.succeeded / totals.processed) * 100, 1) : 0,
    elapsedMs,
    claimsPerSecond: elapsedMs > 0 ? round(totals.processed / (elapsedMs / 1000), 2) : 0
  };
}

/**
 * One sequential pass over the account store:
 * idle → paging → claiming → delaying → (paging | done | cancelled).
 */
export class BatchDriver {
  private currentState: BatchDriverState = "idle";
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private startedAt = 0;
  private finishedAt: number | null = null;
  private totals = {pages: 0, processed: 0, succeeded: 0, failed: 0};

  constructor(
    private readonly store: IAccountStore,
    private readonly executor: ClaimRunner,
    private readonly options: BatchDriverOptions
  ) {
    if (!Number.isInteger(options.pageSize) || options.pageSize < 1) {
      throw new RangeError(`invalid page size: ${options.pageSize}`);
    }
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get state(): BatchDriverState {
    return this.currentState;
  }

  /** Statistics so far; final once `run` has settled. */
  get statistics(): RunStatistics {
    if (this.currentState === "idle") {
      return summarizeRun(this.totals, 0);
    }
    const elapsedMs = (this.finishedAt ?? this.now()) - this.startedAt;
    return summarizeRun(this.totals, elapsedMs);
  }

  async run(signal?: AbortSignal): Promise<BatchDriverResult> {
    if (this.currentState !== "idle") {
      throw new Error(`batch-driver-already-used: ${this.currentState}`);
    }

    this.startedAt = this.now();
    logger.info("pass-started", {
      pageSize: this.options.pageSize,
      delayMs: this.options.delayMs,
      maxAccounts: this.options.maxAccounts ?? null
    });

    try {
      return await this.drive(signal);
    } catch (error) {
      // Store failure: still report what was done before rethrowing.
      this.finishedAt = this.now();
      logger.error("pass-interrupted", {state: this.currentState, error});
      this.logSummary();
      throw error;
    }
  }

  private async drive(signal?: AbortSignal): Promise<BatchDriverResult> {
    const maxAccounts = this.options.maxAccounts ?? null;
    let after: number | null = null;

    for (;;) {
      if (signal?.aborted) {
        return this.finish("cancelled");
      }

      if (maxAccounts !== null && this.totals.processed >= maxAccounts) {
        return this.finish("done");
      }

      this.currentState = "paging";
      const page = this.store.listPage({first: this.options.pageSize, after});
      if (page.length === 0) {
        return this.finish("done");
      }

      this.totals.pages += 1;
      const batch: BatchStatistics = {pageNumber: this.totals.pages, processed: 0, succeeded: 0, failed: 0, elapsedMs: 0};
      const batchStartedAt = this.now();
      logger.info("processing-batch", {pageNumber: batch.pageNumber, size: page.length});

      let stop: "done" | "cancelled" | null = null;
      for (const account of page) {
        if (signal?.aborted) {
          stop = "cancelled";
          break;
        }

        this.currentState = "claiming";
        const outcome = await this.claim(account, signal);
        if (!outcome) {
          stop = "cancelled";
          break;
        }

        this.record(batch, account, outcome);
        after = account.id;

        // No delay and no further page once the ceiling is reached.
        if (maxAccounts !== null && this.totals.processed >= maxAccounts) {
          logger.info("max-accounts-reached", {maxAccounts});
          stop = "done";
          break;
        }
        if (this.options.delayMs > 0) {
          this.currentState = "delaying";
          await this.sleep(this.options.delayMs, signal);
        }
      }

      batch.elapsedMs = this.now() - batchStartedAt;
      this.logBatch(batch);

      if (stop) {
        return this.finish(stop);
      }
    }
  }

  // null when shutdown was requested before the transaction was broadcast
  private async claim(account: Account, signal?: AbortSignal): Promise<ClaimOutcome | null> {
    try {
      return await this.executor.execute(account, signal);
    } catch (error) {
      if (error instanceof ClaimAbortedError) {
        logger.info("claim-aborted-before-broadcast", {accountId: account.id, address: account.address});
        return null;
      }
      logger.error("claim-unexpected-error", {accountId: account.id, address: account.address, error});
      return {kind: "unexpected-error", detail: describeError(error)};
    }
  }

  private record(batch: BatchStatistics, account: Account, outcome: ClaimOutcome): void {
    const succeeded = isSuccessfulOutcome(outcome);
    batch.processed += 1;
    this.totals.processed += 1;
    if (succeeded) {
      batch.succeeded += 1;
      this.totals.succeeded += 1;
    } else {
      batch.failed += 1;
      this.totals.failed += 1;
    }

    this.options.onOutcome?.({accountId: account.id, address: account.address, outcome});
  }

  private logBatch(batch: BatchStatistics): void {
    logger.info("batch-completed", {...batch});
    const progress = this.statistics;
    logger.info("run-progress", {
      processed: progress.processed,
      successRate: progress.successRate,
      claimsPerSecond: progress.claimsPerSecond
    });
  }

  private finish(finalState: "done" | "cancelled"): BatchDriverResult {
    this.currentState = finalState;
    this.finishedAt = this.now();
    if (finalState === "cancelled") {
      logger.warn("pass-cancelled");
    }
    const statistics = this.logSummary();
    return {finalState, statistics};
  }

  private logSummary(): RunStatistics {
    const statistics = this.statistics;
    logger.info("run-summary", {...statistics, state: this.currentState});
    return statistics;
  }
}
