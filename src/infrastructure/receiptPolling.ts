import {ReceiptTimeoutError} from "../shared/errors";
import {Sleep, sleep as defaultSleep} from "../shared/sleep";
import {TxReceiptView} from "../types/chain.types";

export interface PollForReceiptOptions {
  timeoutMs: number;
  intervalMs: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Calls `fetchReceipt` until it yields a receipt or the deadline passes.
 * Lookup errors propagate; only an absent receipt is retried.
 */
export async function pollForReceipt(
  txHash: string,
  fetchReceipt: (txHash: string) => Promise<TxReceiptView | null>,
  options: PollForReceiptOptions
): Promise<TxReceiptView> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const intervalMs = Math.max(1, options.intervalMs);
  const deadline = now() + options.timeoutMs;

  for (;;) {
    const receipt = await fetchReceipt(txHash);
    if (receipt) {
      return receipt;
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      throw new ReceiptTimeoutError(txHash, options.timeoutMs);
    }

    await sleep(Math.min(intervalMs, remaining));
  }
}
