import {Account} from "./account.types";

export type ClaimOutcome =
  | {kind: "confirmed"; txHash: string; gasUsed: bigint}
  | {kind: "submitted-unconfirmed"; txHash: string}
  | {kind: "on-chain-revert"; txHash: string; gasUsed: bigint}
  | {kind: "broadcast-failed"; detail: string}
  | {kind: "nonce-unavailable"; detail: string}
  | {kind: "contract-unavailable"; detail: string}
  | {kind: "unexpected-error"; detail: string; txHash?: string};

export type ClaimOutcomeKind = ClaimOutcome["kind"];

export interface ClaimAttempt {
  account: Account;
  nonce: number;
  nonceDefaulted: boolean;
}

export interface AccountOutcome {
  accountId: number;
  address: string;
  outcome: ClaimOutcome;
}

// A receipt timeout still counts: the network accepted the transaction.
const SUCCESS_KINDS: ReadonlySet<ClaimOutcomeKind> = new Set<ClaimOutcomeKind>(["confirmed", "submitted-unconfirmed"]);

export function isSuccessfulOutcome(outcome: ClaimOutcome): boolean {
  return SUCCESS_KINDS.has(outcome.kind);
}

export function outcomeTxHash(outcome: ClaimOutcome): string | null {
  switch (outcome.kind) {
    case "confirmed":
    case "submitted-unconfirmed":
    case "on-chain-revert":
      return outcome.txHash;
    case "unexpected-error":
      return outcome.txHash ?? null;
    default:
      return null;
  }
}
