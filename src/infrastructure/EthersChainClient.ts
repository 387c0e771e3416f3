import {JsonRpcProvider, Network, isHexString, keccak256} from "ethers";
import {IChainClient} from "../interfaces/IChainClient";
import {BroadcastError, ConnectivityError, describeError} from "../shared/errors";
import {createLogger} from "../shared/logger";
import {ChainHealth, NonceLookup, TxReceiptView} from "../types/chain.types";
import {pollForReceipt} from "./receiptPolling";

export interface EthersChainClientConfig {
  rpcUrl: string;
  expectedChainId: number;
  receiptPollIntervalMs?: number;
}

const DEFAULT_RECEIPT_POLL_INTERVAL_MS = 1_000;
const logger = createLogger("EthersChainClient");

function rpcErrorDetail(error: unknown): string {
  if (error instanceof Error && "shortMessage" in error && typeof error.shortMessage === "string") {
    return error.shortMessage;
  }
  return describeError(error);
}

function parseQuantity(value: unknown, label: string): number {
  if (typeof value !== "string" || !/^0x[0-9a-fA-F]+$/.test(value)) {
    throw new ConnectivityError(`invalid-${label}-response: ${String(value)}`);
  }
  return Number(BigInt(value));
}

export class EthersChainClient implements IChainClient {
  private readonly provider: JsonRpcProvider;
  private readonly expectedChainId: number;
  private readonly receiptPollIntervalMs: number;

  constructor(config: EthersChainClientConfig) {
    // Static network: no background chain detection.
    this.provider = new JsonRpcProvider(config.rpcUrl, Network.from(config.expectedChainId), {staticNetwork: true});
    this.expectedChainId = config.expectedChainId;
    this.receiptPollIntervalMs = config.receiptPollIntervalMs ?? DEFAULT_RECEIPT_POLL_INTERVAL_MS;
  }

  async checkHealth(): Promise<ChainHealth> {
    let rawChainId: unknown;
    let latestBlock: number;
    try {
      rawChainId = await this.provider.send("eth_chainId", []);
      latestBlock = await this.provider.getBlockNumber();
    } catch (error) {
      throw new ConnectivityError(`rpc-unreachable: ${rpcErrorDetail(error)}`, {cause: error});
    }

    const chainId = parseQuantity(rawChainId, "chain-id");
    const chainIdMatches = chainId === this.expectedChainId;
    if (!chainIdMatches) {
      logger.warn("chain-id-mismatch", {expected: this.expectedChainId, actual: chainId});
    }

    return {chainId, latestBlock, chainIdMatches};
  }

  async getNonce(address: string): Promise<NonceLookup> {
    try {
      const nonce = await this.provider.getTransactionCount(address, "latest");
      return {nonce, defaulted: false};
    } catch (error) {
      logger.error("nonce-lookup-failed", {address, detail: rpcErrorDetail(error)});
      return {nonce: 0, defaulted: true};
    }
  }

  /**
   * Sends the raw transaction and nothing else: once the node has accepted it,
   * the hash is returned even if the node's reply carries none.
   */
  async broadcast(signedTx: string): Promise<string> {
    let result: unknown;
    try {
      result = await this.provider.send("eth_sendRawTransaction", [signedTx]);
    } catch (error) {
      throw new BroadcastError(rpcErrorDetail(error), {cause: error});
    }

    if (typeof result === "string" && isHexString(result, 32)) {
      return result;
    }
    return keccak256(signedTx);
  }

  async getReceipt(txHash: string): Promise<TxReceiptView | null> {
    const receipt = await this.provider.getTransactionReceipt(txHash);
    if (!receipt) {
      return null;
    }

    return {
      txHash,
      status: receipt.status === 1 ? 1 : 0,
      gasUsed: receipt.gasUsed,
      blockNumber: receipt.blockNumber
    };
  }

  awaitReceipt(txHash: string, timeoutMs: number): Promise<TxReceiptView> {
    return pollForReceipt(txHash, (hash) => this.getReceipt(hash), {
      timeoutMs,
      intervalMs: this.receiptPollIntervalMs
    });
  }

  destroy(): void {
    this.provider.destroy();
  }
}

/**
 * Validates the endpoint and builds a client. Building the provider opens no
 * connection; liveness is established by `checkHealth`.
 */
export function connectChainClient(config: EthersChainClientConfig): EthersChainClient {
  let url: URL;
  try {
    url = new URL(config.rpcUrl);
  } catch (error) {
    throw new ConnectivityError(`invalid-rpc-url: ${config.rpcUrl}`, {cause: error});
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConnectivityError(`unsupported-rpc-protocol: ${url.protocol}`);
  }

  return new EthersChainClient(config);
}
