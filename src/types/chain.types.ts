export interface ChainHealth {
  chainId: number;
  latestBlock: number;
  chainIdMatches: boolean;
}

export interface NonceLookup {
  nonce: number;
  // true when the RPC lookup failed and 0 was substituted
  defaulted: boolean;
}

export type ReceiptStatus = 0 | 1;

export interface TxReceiptView {
  txHash: string;
  status: ReceiptStatus;
  gasUsed: bigint;
  blockNumber: number;
}

export interface UnsignedClaimTransaction {
  type: 0;
  to: string;
  from: string;
  data: string;
  nonce: number;
  gasLimit: bigint;
  gasPrice: bigint;
  chainId: bigint;
  value: bigint;
}

export interface BuildClaimInput {
  from: string;
  nonce: number;
  gasLimit: bigint;
  gasPriceWei: bigint;
  chainId: number;
}
