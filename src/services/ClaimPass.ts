import {IAccountStore} from "../interfaces/IAccountStore";
import {IChainClient} from "../interfaces/IChainClient";
import {ContractUnavailableError, describeError} from "../shared/errors";
import {createLogger} from "../shared/logger";
import {Sleep} from "../shared/sleep";
import {AccountOutcome} from "../types/claim.types";
import {PassResult} from "../types/run.types";
import {BatchDriver, summarizeRun} from "./BatchDriver";
import {ClaimExecutor} from "./ClaimExecutor";
import {ClaimTransactionBuilder} from "./ClaimTransactionBuilder";
import {TransactionSigner} from "./TransactionSigner";

export interface ClaimPassDeps {
  chain: IChainClient;
  store: IAccountStore;
  builder: ClaimTransactionBuilder;
  signer?: TransactionSigner;
  sleep?: Sleep;
  now?: () => number;
}

export interface ClaimPassOptions {
  pageSize: number;
  delayMs: number;
  maxAccounts?: number | null;
  gasLimit: bigint;
  gasPriceGwei: number;
  chainId: number;
  receiptTimeoutMs: number;
  onOutcome?: (record: AccountOutcome) => void;
}

const logger = createLogger("ClaimPass");

export function abortedPass(error: Error): PassResult {
  return {ok: false, finalState: "aborted", statistics: summarizeRun({pages: 0, processed: 0, succeeded: 0, failed: 0}, 0), error};
}

/**
 * One full pass: connectivity and contract checks, then the batch driver.
 * Only those two checks (and a failing account store) abort the pass; every
 * per-account failure is folded into the statistics.
 */
export async function runClaimPass(deps: ClaimPassDeps, options: ClaimPassOptions, signal?: AbortSignal): Promise<PassResult> {
  try {
    const health = await deps.chain.checkHealth();
    logger.info("connected", {chainId: health.chainId, latestBlock: health.latestBlock});
    if (!health.chainIdMatches) {
      logger.warn("proceeding-despite-chain-id-mismatch", {expected: options.chainId, actual: health.chainId});
    }
  } catch (error) {
    logger.error("connectivity-check-failed", {detail: describeError(error)});
    return abortedPass(error instanceof Error ? error : new Error(describeError(error)));
  }

  if (!deps.builder.isConfigured) {
    const error = new ContractUnavailableError(deps.builder.unavailableReason ?? "contract-not-configured");
    logger.error("contract-not-initialized", {detail: error.message});
    return abortedPass(error);
  }

  const executor = new ClaimExecutor(deps.chain, deps.builder, deps.signer ?? new TransactionSigner(), {
    gasLimit: options.gasLimit,
    gasPriceGwei: options.gasPriceGwei,
    chainId: options.chainId,
    receiptTimeoutMs: options.receiptTimeoutMs
  });
  const driver = new BatchDriver(deps.store, executor, {
    pageSize: options.pageSize,
    delayMs: options.delayMs,
    maxAccounts: options.maxAccounts,
    onOutcome: options.onOutcome,
    sleep: deps.sleep,
    now: deps.now
  });

  try {
    const result = await driver.run(signal);
    return {ok: true, finalState: result.finalState, statistics: result.statistics};
  } catch (error) {
    return {
      ok: false,
      finalState: "aborted",
      statistics: driver.statistics,
      error: error instanceof Error ? error : new Error(describeError(error))
    };
  }
}
