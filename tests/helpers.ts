import {Interface, Wallet} from "ethers";
import {ContractDescriptor} from "../src/config/contract";
import {createDb} from "../src/db/db";
import {WalletRepo} from "../src/db/repo";
import {Sleep} from "../src/shared/sleep";
import {Account} from "../src/types/account.types";
import {PassResult, RunStatistics} from "../src/types/run.types";

export const FAUCET_ADDRESS = "0x00000000000000000000000000000000000000fa";
export const TEST_CHAIN_ID = 421614;

export function testPrivateKey(index: number): string {
  return `0x${index.toString(16).padStart(64, "0")}`;
}

export function testDescriptor(abi: string[] = ["function requestTokens()"]): ContractDescriptor {
  return {address: FAUCET_ADDRESS, abi: new Interface(abi)};
}

export async function seedWallets(count: number): Promise<{repo: WalletRepo; accounts: Account[]}> {
  const repo = new WalletRepo(await createDb());
  const accounts: Account[] = [];
  for (let index = 1; index <= count; index += 1) {
    const privateKey = testPrivateKey(index);
    accounts.push(repo.create({address: new Wallet(privateKey).address, privateKey}));
  }
  return {repo, accounts};
}

export function statistics(overrides: Partial<RunStatistics> = {}): RunStatistics {
  return {
    pages: 0,
    processed: 0,
    succeeded: 0,
    failed: 0,
    successRate: 0,
    elapsedMs: 0,
    claimsPerSecond: 0,
    ...overrides
  };
}

export function donePass(overrides: Partial<RunStatistics> = {}): PassResult {
  return {ok: true, finalState: "done", statistics: statistics(overrides)};
}

/** Virtual clock whose sleep advances time instantly unless the signal is aborted. */
export class FakeClock {
  readonly sleeps: number[] = [];
  onSleep: (() => void) | null = null;

  constructor(public ms: number) { }

  now = (): Date => new Date(this.ms);

  nowMs = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }

  sleep: Sleep = async (ms, signal) => {
    this.onSleep?.();
    if (signal?.aborted) {
      return;
    }
    this.sleeps.push(ms);
    this.ms += ms;
  };
}
