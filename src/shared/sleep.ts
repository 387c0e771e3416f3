import {setTimeout as delay} from "node:timers/promises";

// Largest delay a Node timer honours; longer ones fire after 1 ms.
export const MAX_SLEEP_MS = 2_147_483_647;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

// Resolves early (without throwing) when the signal aborts.
export const sleep: Sleep = async (ms, signal) => {
  if (ms <= 0 || signal?.aborted) {
    return;
  }

  try {
    await delay(ms, undefined, {signal});
  } catch (error) {
    if (signal?.aborted) {
      return;
    }
    throw error;
  }
};
