import {expect} from "chai";
import {mkdtemp, rm, writeFile} from "node:fs/promises";
import {tmpdir} from "node:os";
import {join} from "node:path";
import {loadConfig} from "../src/config";
import {createDb} from "../src/db/db";
import {WalletRepo} from "../src/db/repo";
import {ConfigurationError, ConnectivityError} from "../src/shared/errors";
import {createConfiguredClaimPass, passOptionsFromConfig} from "../src/worker/claimPassFactory";
import {FAUCET_ADDRESS, testPrivateKey} from "./helpers";

describe("claimPassFactory", function () {
  let dir: string;

  beforeEach(async function () {
    dir = await mkdtemp(join(tmpdir(), "claim-pass-"));
  });

  afterEach(async function () {
    await rm(dir, {recursive: true, force: true});
  });

  it("derives pass options from the configuration", function () {
    const {config} = loadConfig(["--delay", "1.5", "--receipt-timeout", "45", "--max-wallets", "20"], {});

    expect(passOptionsFromConfig(config)).to.deep.equal({
      pageSize: 500,
      delayMs: 1_500,
      maxAccounts: 20,
      gasLimit: 100_000n,
      gasPriceGwei: 0.1,
      chainId: 421614,
      receiptTimeoutMs: 45_000
    });
  });

  it("fails the pass when the ABI file is missing", async function () {
    const abiPath = join(dir, "missing.json");
    const {config} = loadConfig(["--abi-path", abiPath], {});

    const result = await createConfiguredClaimPass(config)(new AbortController().signal);

    expect(result.ok).to.equal(false);
    expect(result.finalState).to.equal("aborted");
    expect(result.error).to.be.instanceOf(ConfigurationError);
    expect(result.error?.message).to.equal(`abi-file-not-found: ${abiPath}`);
  });

  it("fails the pass when the wallet database is missing", async function () {
    const dbPath = join(dir, "wallets.db");
    const {config} = loadConfig(["--db-path", dbPath], {});

    const result = await createConfiguredClaimPass(config)(new AbortController().signal);

    expect(result.finalState).to.equal("aborted");
    expect(result.error).to.be.instanceOf(ConfigurationError);
    expect(result.error?.message).to.equal(`wallet-db-not-found: ${dbPath}`);
  });

  it("fails the pass for an endpoint it cannot speak to", async function () {
    const dbPath = join(dir, "wallets.db");
    const db = await createDb();
    new WalletRepo(db).create({address: FAUCET_ADDRESS, privateKey: testPrivateKey(1)});
    await writeFile(dbPath, db.export());
    db.close();
    const {config} = loadConfig(["--db-path", dbPath, "--rpc-url", "ftp://localhost:8545"], {});

    const result = await createConfiguredClaimPass(config)(new AbortController().signal);

    expect(result.finalState).to.equal("aborted");
    expect(result.error).to.be.instanceOf(ConnectivityError);
    expect(result.error?.message).to.equal("unsupported-rpc-protocol: ftp:");
  });
});
