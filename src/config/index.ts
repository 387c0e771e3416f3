import {parseArgs} from "node:util";
import {z} from "zod";
import {MAX_GAS_PRICE_GWEI} from "../services/ClaimTransactionBuilder";
import {ConfigurationError} from "../shared/errors";
import {MAX_SLEEP_MS} from "../shared/sleep";

export const DEFAULT_RPC_URL = "https://sepolia-rollup.arbitrum.io/rpc";
export const DEFAULT_CHAIN_ID = 421614;
export const DEFAULT_CONTRACT_ADDRESS = "0x1bA1526CF49Eb9ECcA86bDC015C4263300E21656";

const booleanish = z.union([
  z.boolean(),
  z.enum(["true", "false", "1", "0"]).transform((value) => value === "true" || value === "1")
]);

const configSchema = z.object({
  dbPath: z.string().min(1).default("wallets.db"),
  rpcUrl: z.string().url().default(DEFAULT_RPC_URL),
  chainId: z.coerce.number().int().positive().default(DEFAULT_CHAIN_ID),
  abiPath: z.string().min(1).default("abi/faucet.json"),
  contractAddress: z.string().default(DEFAULT_CONTRACT_ADDRESS),
  claimMethod: z.string().min(1).default("requestTokens"),
  batchSize: z.coerce.number().int().positive().default(500),
  delaySeconds: z.coerce.number().nonnegative().max(Math.floor(MAX_SLEEP_MS / 1000)).default(2),
  gasLimit: z.coerce.number().int().positive().default(100_000),
  gasPriceGwei: z.coerce.number().nonnegative().max(MAX_GAS_PRICE_GWEI).default(0.1),
  maxWallets: z.coerce.number().int().positive().optional(),
  intervalHours: z.coerce.number().positive().default(24),
  receiptTimeoutSeconds: z.coerce.number().positive().default(30),
  statePath: z.string().min(1).default("scheduler_stats.json"),
  logDir: z.string().min(1).default("logs"),
  runNow: booleanish.default(false)
});

export type FaucetConfig = z.output<typeof configSchema>;
type ConfigKey = keyof FaucetConfig;

interface Setting {
  flag: string;
  env: string;
  description: string;
  boolean?: true;
}

const SETTINGS: Record<ConfigKey, Setting> = {
  dbPath: {flag: "db-path", env: "WALLET_DB_PATH", description: "Path to the SQLite wallet database"},
  rpcUrl: {flag: "rpc-url", env: "CHAIN_RPC_URL", description: "JSON-RPC endpoint URL"},
  chainId: {flag: "chain-id", env: "CHAIN_ID", description: "Expected chain id, also used to sign"},
  abiPath: {flag: "abi-path", env: "FAUCET_ABI_PATH", description: "Path to the faucet contract ABI file"},
  contractAddress: {flag: "contract-address", env: "FAUCET_CONTRACT_ADDRESS", description: "Faucet contract address"},
  claimMethod: {flag: "claim-method", env: "FAUCET_CLAIM_METHOD", description: "Zero-argument claim function"},
  batchSize: {flag: "batch-size", env: "BATCH_SIZE", description: "Wallets read per page"},
  delaySeconds: {flag: "delay", env: "CLAIM_DELAY_SECONDS", description: "Delay between claims (seconds)"},
  gasLimit: {flag: "gas-limit", env: "GAS_LIMIT", description: "Gas limit per transaction"},
  gasPriceGwei: {flag: "gas-price", env: "GAS_PRICE_GWEI", description: "Gas price in Gwei"},
  maxWallets: {flag: "max-wallets", env: "MAX_WALLETS", description: "Maximum wallets processed per run"},
  intervalHours: {flag: "interval-hours", env: "SCHEDULE_INTERVAL_HOURS", description: "Hours between scheduled runs"},
  receiptTimeoutSeconds: {flag: "receipt-timeout", env: "RECEIPT_TIMEOUT_SECONDS", description: "Receipt wait per claim (seconds)"},
  statePath: {flag: "state-path", env: "SCHEDULER_STATE_PATH", description: "Scheduler state file"},
  logDir: {flag: "log-dir", env: "LOG_DIR", description: "Directory for per-run log files"},
  runNow: {flag: "run-now", env: "RUN_NOW", description: "Start a run immediately on startup", boolean: true}
};

const SETTING_ENTRIES = Object.entries(SETTINGS);

function flagForPath(path: ReadonlyArray<string | number>): string {
  const entry = SETTING_ENTRIES.find(([key]) => key === path[0]);
  return entry ? `--${entry[1].flag}` : path.join(".");
}

function parseOptions() {
  const options: Record<string, {type: "string" | "boolean"; short?: string}> = {
    help: {type: "boolean", short: "h"}
  };
  for (const [, setting] of SETTING_ENTRIES) {
    options[setting.flag] = {type: setting.boolean ? "boolean" : "string"};
  }
  return options;
}

export interface ParsedCommandLine {
  help: boolean;
  config: FaucetConfig;
}

/**
 * Command-line flags override environment variables, which override the
 * defaults. Empty environment values count as unset.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCommandLine {
  let flags: Record<string, unknown>;
  try {
    flags = parseArgs({args: argv, options: parseOptions(), strict: true, allowPositionals: false}).values;
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : "invalid-arguments");
  }

  const raw: Record<string, string | boolean> = {};
  for (const [key, setting] of SETTING_ENTRIES) {
    const fromFlag = flags[setting.flag];
    const fromEnv = env[setting.env];
    if (typeof fromFlag === "string" || typeof fromFlag === "boolean") {
      raw[key] = fromFlag;
    } else if (fromEnv !== undefined && fromEnv.trim() !== "") {
      raw[key] = fromEnv.trim();
    }
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${flagForPath(issue.path)}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid-configuration: ${detail}`);
  }

  return {help: flags.help === true, config: parsed.data};
}

export function formatUsage(command: string): string {
  const lines = [`Usage: ${command} [options]`, "", "Options:"];
  for (const [, setting] of SETTING_ENTRIES) {
    const name = setting.boolean ? `--${setting.flag}` : `--${setting.flag} <value>`;
    lines.push(`  ${name.padEnd(28)}${setting.description} (env ${setting.env})`);
  }
  lines.push(`  ${"--help, -h".padEnd(28)}Show this help message`);
  return lines.join("\n");
}
