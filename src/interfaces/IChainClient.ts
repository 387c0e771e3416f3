import {ChainHealth, NonceLookup, TxReceiptView} from "../types/chain.types";

/**
 * Interface for blockchain interaction
 * Implementations: FakeChainClient (tests), EthersChainClient (production)
 */
export interface IChainClient {
  /**
   * Query chain id and latest block height. A chain id that differs from the
   * expected one is reported through `chainIdMatches`, not thrown.
   * @throws ConnectivityError when the endpoint cannot be reached
   */
  checkHealth(): Promise<ChainHealth>;

  /**
   * Transaction count of `address`. RPC failures resolve to nonce 0 with
   * `defaulted` set.
   */
  getNonce(address: string): Promise<NonceLookup>;

  /**
   * Submit a signed, serialized transaction
   * @returns Transaction hash
   * @throws BroadcastError
   */
  broadcast(signedTx: string): Promise<string>;

  /**
   * Get transaction receipt
   * @returns Receipt or null if not mined yet
   */
  getReceipt(txHash: string): Promise<TxReceiptView | null>;

  /**
   * Poll for the receipt until it appears or `timeoutMs` elapses
   * @throws ReceiptTimeoutError
   */
  awaitReceipt(txHash: string, timeoutMs: number): Promise<TxReceiptView>;
}
