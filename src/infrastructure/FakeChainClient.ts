import {Transaction} from "ethers";
import {IChainClient} from "../interfaces/IChainClient";
import {BroadcastError, ConnectivityError} from "../shared/errors";
import {ChainHealth, NonceLookup, TxReceiptView} from "../types/chain.types";
import {pollForReceipt} from "./receiptPolling";

export type FakeReceiptBehavior = "confirm" | "revert" | "pending" | "error";

export interface FakeBroadcast {
  from: string;
  nonce: number;
  txHash: string;
  to: string | null;
  data: string;
}

export interface FakeChainClientOptions {
  chainId?: number;
  expectedChainId?: number;
  latestBlock?: number;
  gasUsed?: bigint;
  pollIntervalMs?: number;
}

const key = (address: string) => address.toLowerCase();

/**
 * Deterministic in-memory chain. Decodes the signed transactions it receives,
 * enforces per-address nonces like a node would, and resolves receipts on a
 * virtual clock so receipt timeouts elapse instantly.
 */
export class FakeChainClient implements IChainClient {
  readonly broadcasts: FakeBroadcast[] = [];
  readonly nonceCalls: string[] = [];
  readonly receiptWaits: Array<{txHash: string; timeoutMs: number}> = [];
  healthError: Error | null = null;

  private readonly chainId: number;
  private readonly expectedChainId: number;
  private readonly latestBlock: number;
  private readonly gasUsed: bigint;
  private readonly pollIntervalMs: number;
  private readonly nonces = new Map<string, number>();
  private readonly nonceFailures = new Set<string>();
  private readonly broadcastFailures = new Map<string, string>();
  private readonly receiptBehavior = new Map<string, FakeReceiptBehavior>();
  private readonly receipts = new Map<string, TxReceiptView>();
  private readonly failingReceipts = new Set<string>();
  private clockMs = 0;

  constructor(options: FakeChainClientOptions = {}) {
    this.chainId = options.chainId ?? 421614;
    this.expectedChainId = options.expectedChainId ?? this.chainId;
    this.latestBlock = options.latestBlock ?? 1_000;
    this.gasUsed = options.gasUsed ?? 46_000n;
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
  }

  /** Test helper: current on-chain transaction count of an address */
  setNonce(address: string, nonce: number): void {
    this.nonces.set(key(address), nonce);
  }

  /** Test helper: make the nonce RPC fail for an address */
  failNonceLookup(address: string): void {
    this.nonceFailures.add(key(address));
  }

  /** Test helper: reject every broadcast from an address */
  failBroadcast(address: string, detail: string): void {
    this.broadcastFailures.set(key(address), detail);
  }

  /** Test helper: how receipts for an address's transactions behave */
  setReceiptBehavior(address: string, behavior: FakeReceiptBehavior): void {
    this.receiptBehavior.set(key(address), behavior);
  }

  get virtualTimeMs(): number {
    return this.clockMs;
  }

  async checkHealth(): Promise<ChainHealth> {
    if (this.healthError) {
      throw new ConnectivityError(`rpc-unreachable: ${this.healthError.message}`, {cause: this.healthError});
    }

    return {
      chainId: this.chainId,
      latestBlock: this.latestBlock,
      chainIdMatches: this.chainId === this.expectedChainId
    };
  }

  async getNonce(address: string): Promise<NonceLookup> {
    this.nonceCalls.push(address);
    if (this.nonceFailures.has(key(address))) {
      return {nonce: 0, defaulted: true};
    }
    return {nonce: this.nonces.get(key(address)) ?? 0, defaulted: false};
  }

  async broadcast(signedTx: string): Promise<string> {
    const tx = Transaction.from(signedTx);
    const from = tx.from;
    const txHash = tx.hash;
    if (!from || !txHash) {
      throw new BroadcastError("transaction is not signed");
    }

    const failure = this.broadcastFailures.get(key(from));
    if (failure) {
      throw new BroadcastError(failure);
    }

    const expectedNonce = this.nonces.get(key(from)) ?? 0;
    if (tx.nonce < expectedNonce) {
      throw new BroadcastError(`nonce too low: next nonce ${expectedNonce}, tx nonce ${tx.nonce}`);
    }
    if (tx.nonce > expectedNonce) {
      throw new BroadcastError(`nonce too high: next nonce ${expectedNonce}, tx nonce ${tx.nonce}`);
    }

    this.nonces.set(key(from), expectedNonce + 1);
    this.broadcasts.push({from, nonce: tx.nonce, txHash, to: tx.to, data: tx.data});

    const behavior = this.receiptBehavior.get(key(from)) ?? "confirm";
    if (behavior === "confirm" || behavior === "revert") {
      this.receipts.set(txHash, {
        txHash,
        status: behavior === "confirm" ? 1 : 0,
        gasUsed: this.gasUsed,
        blockNumber: this.latestBlock + this.broadcasts.length
      });
    } else if (behavior === "error") {
      this.failingReceipts.add(txHash);
    }

    return txHash;
  }

  async getReceipt(txHash: string): Promise<TxReceiptView | null> {
    if (this.failingReceipts.has(txHash)) {
      throw new Error("receipt-lookup-failed");
    }
    return this.receipts.get(txHash) ?? null;
  }

  awaitReceipt(txHash: string, timeoutMs: number): Promise<TxReceiptView> {
    this.receiptWaits.push({txHash, timeoutMs});
    return pollForReceipt(txHash, (hash) => this.getReceipt(hash), {
      timeoutMs,
      intervalMs: this.pollIntervalMs,
      now: () => this.clockMs,
      sleep: async (ms) => {
        this.clockMs += ms;
      }
    });
  }
}
