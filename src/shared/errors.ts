export type FaucetErrorCode =
  | "connectivity"
  | "contract-unavailable"
  | "contract-not-configured"
  | "broadcast"
  | "receipt-timeout"
  | "claim-aborted"
  | "configuration";

export class FaucetError extends Error {
  constructor(readonly code: FaucetErrorCode, message: string, options?: {cause?: unknown}) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The RPC endpoint cannot be reached or validated. Aborts a pass. */
export class ConnectivityError extends FaucetError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("connectivity", message, options);
  }
}

/** No usable contract descriptor or address. Aborts a pass. */
export class ContractUnavailableError extends FaucetError {
  constructor(message: string) {
    super("contract-unavailable", message);
  }
}

export class ContractNotConfiguredError extends FaucetError {
  constructor(message = "contract-not-configured") {
    super("contract-not-configured", message);
  }
}

export class BroadcastError extends FaucetError {
  constructor(readonly detail: string, options?: {cause?: unknown}) {
    super("broadcast", `broadcast-failed: ${detail}`, options);
  }
}

export class ReceiptTimeoutError extends FaucetError {
  constructor(readonly txHash: string, readonly timeoutMs: number) {
    super("receipt-timeout", `receipt-timeout: ${txHash} after ${timeoutMs}ms`);
  }
}

/** Cancellation observed before a transaction left the process. */
export class ClaimAbortedError extends FaucetError {
  constructor(readonly address: string) {
    super("claim-aborted", `claim-aborted-before-broadcast: ${address}`);
  }
}

export class ConfigurationError extends FaucetError {
  constructor(message: string) {
    super("configuration", message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
