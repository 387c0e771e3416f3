import {Wallet} from "ethers";
import {UnsignedClaimTransaction} from "../types/chain.types";

// Keys exported by some wallet tools omit the 0x prefix.
function normalizePrivateKey(privateKey: string): string {
  const trimmed = privateKey.trim();
  return trimmed.startsWith("0x") ? trimmed : `0x${trimmed}`;
}

/**
 * Signs locally. The key lives only for the duration of `sign` and is never
 * logged or retained.
 */
export class TransactionSigner {
  async sign(tx: UnsignedClaimTransaction, privateKey: string): Promise<string> {
    const wallet = new Wallet(normalizePrivateKey(privateKey));
    return wallet.signTransaction(tx);
  }
}
