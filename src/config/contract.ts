import {existsSync, readFileSync} from "node:fs";
import {Interface, getAddress, isAddress} from "ethers";
import {describeError} from "../shared/errors";
import {createLogger} from "../shared/logger";

export interface ContractDescriptor {
  address: string;
  abi: Interface;
}

const logger = createLogger("contract");

/**
 * Reads the faucet ABI and pairs it with the contract address. Every problem
 * is logged as a warning and yields null: claims then fail as
 * contract-unavailable instead of crashing the process.
 */
export function loadContractDescriptor(abiPath: string, contractAddress: string): ContractDescriptor | null {
  if (!existsSync(abiPath)) {
    logger.warn("abi-file-not-found", {abiPath});
    return null;
  }

  let abi: Interface;
  try {
    const text = readFileSync(abiPath, "utf8");
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
      logger.warn("abi-file-not-an-array", {abiPath});
      return null;
    }
    abi = new Interface(text);
  } catch (error) {
    logger.error("abi-load-failed", {abiPath, detail: describeError(error)});
    return null;
  }

  if (!contractAddress) {
    logger.warn("contract-address-missing");
    return null;
  }
  // Checksum casing is normalized, not enforced.
  const lowered = contractAddress.toLowerCase();
  if (!isAddress(lowered)) {
    logger.warn("contract-address-invalid", {contractAddress});
    return null;
  }

  const address = getAddress(lowered);
  logger.info("contract-loaded", {address, abiPath});
  return {address, abi};
}
