import {FunctionFragment, parseUnits} from "ethers";
import {ContractDescriptor} from "../config/contract";
import {ContractNotConfiguredError} from "../shared/errors";
import {BuildClaimInput, UnsignedClaimTransaction} from "../types/chain.types";

export const DEFAULT_CLAIM_METHOD = "requestTokens";

export const MAX_GAS_PRICE_GWEI = 1_000_000;

/** Exact Gwei → wei conversion (9 fractional digits). */
export function gweiToWei(gwei: number): bigint {
  if (!Number.isFinite(gwei) || gwei < 0 || gwei > MAX_GAS_PRICE_GWEI) {
    throw new RangeError(`invalid gas price: ${gwei} gwei`);
  }
  return parseUnits(gwei.toFixed(9), "gwei");
}

interface ResolvedClaimCall {
  to: string;
  data: string;
}

function resolveClaimCall(descriptor: ContractDescriptor | null, method: string): ResolvedClaimCall | string {
  if (!descriptor) {
    return "contract-not-configured";
  }

  const fragment: FunctionFragment | null = descriptor.abi.getFunction(method);
  if (!fragment) {
    return `claim-method-not-in-abi: ${method}`;
  }
  if (fragment.inputs.length > 0) {
    return `claim-method-takes-arguments: ${fragment.format()}`;
  }

  return {to: descriptor.address, data: descriptor.abi.encodeFunctionData(fragment, [])};
}

/**
 * Builds the legacy (type 0) transaction that calls the faucet's zero-argument
 * claim method. The calldata is identical for every account and is encoded
 * once at construction.
 */
export class ClaimTransactionBuilder {
  private readonly call: ResolvedClaimCall | null;
  readonly unavailableReason: string | null;

  constructor(descriptor: ContractDescriptor | null, method: string = DEFAULT_CLAIM_METHOD) {
    const resolved = resolveClaimCall(descriptor, method);
    if (typeof resolved === "string") {
      this.call = null;
      this.unavailableReason = resolved;
    } else {
      this.call = resolved;
      this.unavailableReason = null;
    }
  }

  get isConfigured(): boolean {
    return this.call !== null;
  }

  build(input: BuildClaimInput): UnsignedClaimTransaction {
    if (!this.call) {
      throw new ContractNotConfiguredError(this.unavailableReason ?? undefined);
    }

    return {
      type: 0,
      to: this.call.to,
      from: input.from,
      data: this.call.data,
      nonce: input.nonce,
      gasLimit: input.gasLimit,
      gasPrice: input.gasPriceWei,
      chainId: BigInt(input.chainId),
      value: 0n
    };
  }
}
