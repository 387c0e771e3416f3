#!/usr/bin/env node
import {config as loadDotenv} from "dotenv";
import {formatUsage, loadConfig} from "../config";
import {JsonSchedulerStateStore} from "../infrastructure/JsonSchedulerStateStore";
import {Scheduler} from "../services/Scheduler";
import {closeLogFile, createLogger, openLogFile} from "../shared/logger";
import {createConfiguredClaimPass} from "./claimPassFactory";

const logger = createLogger("runScheduler");

async function main() {
  loadDotenv();
  const {help, config} = loadConfig(process.argv.slice(2));
  if (help) {
    process.stdout.write(`${formatUsage("faucet-scheduler")}\n`);
    return;
  }

  const logFile = openLogFile(config.logDir, "scheduler");
  logger.info("faucet-scheduler-initialized", {
    logFile,
    intervalHours: config.intervalHours,
    contractAddress: config.contractAddress,
    batchSize: config.batchSize,
    delaySeconds: config.delaySeconds
  });

  const controller = new AbortController();
  const scheduler = new Scheduler(
    {
      stateStore: new JsonSchedulerStateStore(config.statePath),
      runPass: createConfiguredClaimPass(config)
    },
    {intervalHours: config.intervalHours, runNow: config.runNow}
  );

  const onShutdown = (signal: NodeJS.Signals) => {
    logger.warn("shutdown-requested", {signal});
    controller.abort();
  };
  const onRunNow = () => {
    logger.info("run-now-requested");
    scheduler.requestRunNow();
  };
  process.once("SIGINT", onShutdown);
  process.once("SIGTERM", onShutdown);
  process.on("SIGUSR2", onRunNow);

  try {
    await scheduler.start(controller.signal);
  } finally {
    process.off("SIGINT", onShutdown);
    process.off("SIGTERM", onShutdown);
    process.off("SIGUSR2", onRunNow);
    await closeLogFile();
  }
}

main().catch((error) => {
  logger.error("scheduler-process-failed", {error});
  process.exitCode = 1;
});
