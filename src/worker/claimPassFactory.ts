import {existsSync} from "node:fs";
import {Database} from "sql.js";
import {FaucetConfig} from "../config";
import {loadContractDescriptor} from "../config/contract";
import {openWalletDb} from "../db/db";
import {WalletRepo} from "../db/repo";
import {EthersChainClient, connectChainClient} from "../infrastructure/EthersChainClient";
import {abortedPass, ClaimPassOptions, runClaimPass} from "../services/ClaimPass";
import {ClaimTransactionBuilder} from "../services/ClaimTransactionBuilder";
import {ConfigurationError, describeError} from "../shared/errors";
import {createLogger} from "../shared/logger";
import {PassResult} from "../types/run.types";

const logger = createLogger("claimPassFactory");

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

export function passOptionsFromConfig(config: FaucetConfig): ClaimPassOptions {
  return {
    pageSize: config.batchSize,
    delayMs: Math.round(config.delaySeconds * 1000),
    maxAccounts: config.maxWallets ?? null,
    gasLimit: BigInt(config.gasLimit),
    gasPriceGwei: config.gasPriceGwei,
    chainId: config.chainId,
    receiptTimeoutMs: Math.round(config.receiptTimeoutSeconds * 1000)
  };
}

/**
 * A pass bound to the on-disk wallet store and the configured RPC endpoint.
 * Each call reopens the store so a pass sees wallets added since the last one.
 * Missing files fail the pass before any network traffic.
 */
export function createConfiguredClaimPass(config: FaucetConfig): (signal: AbortSignal) => Promise<PassResult> {
  return async (signal) => {
    if (!existsSync(config.abiPath)) {
      const error = new ConfigurationError(`abi-file-not-found: ${config.abiPath}`);
      logger.error("preflight-failed", {detail: error.message});
      return abortedPass(error);
    }

    let db: Database;
    try {
      db = await openWalletDb(config.dbPath);
    } catch (error) {
      logger.error("preflight-failed", {detail: describeError(error)});
      return abortedPass(toError(error));
    }

    let chain: EthersChainClient;
    try {
      chain = connectChainClient({rpcUrl: config.rpcUrl, expectedChainId: config.chainId});
    } catch (error) {
      db.close();
      logger.error("preflight-failed", {detail: describeError(error)});
      return abortedPass(toError(error));
    }

    try {
      const builder = new ClaimTransactionBuilder(
        loadContractDescriptor(config.abiPath, config.contractAddress),
        config.claimMethod
      );
      const store = new WalletRepo(db);
      logger.info("wallet-store-opened", {dbPath: config.dbPath, wallets: store.count()});
      return await runClaimPass({chain, store, builder}, passOptionsFromConfig(config), signal);
    } finally {
      chain.destroy();
      db.close();
    }
  };
}
