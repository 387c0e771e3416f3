#!/usr/bin/env node
import {config as loadDotenv} from "dotenv";
import {formatUsage, loadConfig} from "../config";
import {closeLogFile, createLogger, openLogFile} from "../shared/logger";
import {createConfiguredClaimPass} from "./claimPassFactory";

const logger = createLogger("runClaimPass");

async function main() {
  loadDotenv();
  const {help, config} = loadConfig(process.argv.slice(2));
  if (help) {
    process.stdout.write(`${formatUsage("faucet-claim")}\n`);
    return;
  }

  const logFile = openLogFile(config.logDir, "faucet_claims");
  logger.info("faucet-claimer-initialized", {logFile});

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn("shutdown-requested", {signal});
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const result = await createConfiguredClaimPass(config)(controller.signal);
    if (!result.ok) {
      logger.error("claim-pass-aborted", {detail: result.error?.message});
      process.exitCode = 1;
    }
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await closeLogFile();
  }
}

main().catch((error) => {
  logger.error("claim-pass-process-failed", {error});
  process.exitCode = 1;
});
