import {IChainClient} from "../interfaces/IChainClient";
import {BroadcastError, ClaimAbortedError, ReceiptTimeoutError, describeError} from "../shared/errors";
import {createLogger} from "../shared/logger";
import {Account} from "../types/account.types";
import {UnsignedClaimTransaction} from "../types/chain.types";
import {ClaimAttempt, ClaimOutcome} from "../types/claim.types";
import {ClaimTransactionBuilder, gweiToWei} from "./ClaimTransactionBuilder";
import {TransactionSigner} from "./TransactionSigner";

export interface ClaimExecutorOptions {
  gasLimit: bigint;
  gasPriceGwei: number;
  chainId: number;
  receiptTimeoutMs: number;
}

export const DEFAULT_RECEIPT_TIMEOUT_MS = 30_000;

const logger = createLogger("ClaimExecutor");

function logOutcome(account: Account, outcome: ClaimOutcome): void {
  const base = {accountId: account.id, address: account.address};
  switch (outcome.kind) {
    case "confirmed":
      logger.info("claim-confirmed", {...base, txHash: outcome.txHash, gasUsed: outcome.gasUsed});
      return;
    case "submitted-unconfirmed":
      logger.warn("claim-submitted-unconfirmed", {...base, txHash: outcome.txHash});
      return;
    case "on-chain-revert":
      logger.error("claim-reverted", {...base, txHash: outcome.txHash, gasUsed: outcome.gasUsed});
      return;
    default:
      logger.error("claim-failed", {...base, kind: outcome.kind, detail: outcome.detail});
  }
}

/**
 * Runs exactly one on-chain attempt for one account and classifies it.
 * Never retries; every per-account failure becomes an outcome instead of a
 * thrown error. The only exception is ClaimAbortedError, raised when shutdown
 * is requested before the transaction leaves the process.
 */
export class ClaimExecutor {
  private readonly gasPriceWei: bigint;

  constructor(
    private readonly chain: IChainClient,
    private readonly builder: ClaimTransactionBuilder,
    private readonly signer: TransactionSigner,
    private readonly options: ClaimExecutorOptions
  ) {
    this.gasPriceWei = gweiToWei(options.gasPriceGwei);
  }

  async execute(account: Account, signal?: AbortSignal): Promise<ClaimOutcome> {
    const outcome = await this.attempt(account, signal);
    logOutcome(account, outcome);
    return outcome;
  }

  private async attempt(account: Account, signal?: AbortSignal): Promise<ClaimOutcome> {
    const lookup = await this.chain.getNonce(account.address);
    const attempt: ClaimAttempt = {account, nonce: lookup.nonce, nonceDefaulted: lookup.defaulted};

    let tx: UnsignedClaimTransaction;
    try {
      tx = this.builder.build({
        from: account.address,
        nonce: attempt.nonce,
        gasLimit: this.options.gasLimit,
        gasPriceWei: this.gasPriceWei,
        chainId: this.options.chainId
      });
    } catch (error) {
      return {kind: "contract-unavailable", detail: describeError(error)};
    }

    let signedTx: string;
    try {
      signedTx = await this.signer.sign(tx, account.privateKey);
    } catch (error) {
      return {kind: "unexpected-error", detail: `signing-failed: ${describeError(error)}`};
    }

    if (signal?.aborted) {
      throw new ClaimAbortedError(account.address);
    }

    let txHash: string;
    try {
      txHash = await this.chain.broadcast(signedTx);
    } catch (error) {
      if (!(error instanceof BroadcastError)) {
        return {kind: "unexpected-error", detail: describeError(error)};
      }
      if (attempt.nonceDefaulted) {
        return {kind: "nonce-unavailable", detail: `nonce lookup failed, fallback nonce 0 rejected: ${error.detail}`};
      }
      return {kind: "broadcast-failed", detail: error.detail};
    }

    logger.info("transaction-sent", {accountId: account.id, address: account.address, txHash, nonce: attempt.nonce});

    try {
      const receipt = await this.chain.awaitReceipt(txHash, this.options.receiptTimeoutMs);
      if (receipt.status === 1) {
        return {kind: "confirmed", txHash, gasUsed: receipt.gasUsed};
      }
      return {kind: "on-chain-revert", txHash, gasUsed: receipt.gasUsed};
    } catch (error) {
      if (error instanceof ReceiptTimeoutError) {
        return {kind: "submitted-unconfirmed", txHash};
      }
      return {kind: "unexpected-error", detail: describeError(error), txHash};
    }
  }
}
