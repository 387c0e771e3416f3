import {expect} from "chai";
import {getAddress} from "ethers";
import {mkdtempSync, rmSync, writeFileSync} from "node:fs";
import {tmpdir} from "node:os";
import {join} from "node:path";
import {DEFAULT_CONTRACT_ADDRESS} from "../src/config";
import {loadContractDescriptor} from "../src/config/contract";

describe("loadContractDescriptor", function () {
  let dir: string;

  beforeEach(function () {
    dir = mkdtempSync(join(tmpdir(), "faucet-abi-"));
  });

  afterEach(function () {
    rmSync(dir, {recursive: true, force: true});
  });

  function writeAbi(content: string): string {
    const path = join(dir, "faucet.json");
    writeFileSync(path, content, "utf8");
    return path;
  }

  it("loads the bundled faucet ABI", function () {
    const descriptor = loadContractDescriptor("abi/faucet.json", DEFAULT_CONTRACT_ADDRESS);

    expect(descriptor?.address).to.equal(getAddress(DEFAULT_CONTRACT_ADDRESS.toLowerCase()));
    expect(descriptor?.abi.getFunction("requestTokens")?.inputs).to.have.length(0);
    expect(descriptor?.abi.getFunction("lastRequestTime")?.inputs).to.have.length(1);
  });

  it("accepts an address whose checksum casing is wrong", function () {
    const path = writeAbi(JSON.stringify(["function requestTokens()"]));
    const miscased = "0x1BA1526CF49Eb9ECcA86bDC015C4263300E21656";

    const descriptor = loadContractDescriptor(path, miscased);

    expect(descriptor?.address).to.equal(getAddress(miscased.toLowerCase()));
  });

  it("returns null for a missing file", function () {
    expect(loadContractDescriptor(join(dir, "absent.json"), DEFAULT_CONTRACT_ADDRESS)).to.equal(null);
  });

  it("returns null when the file is not a JSON array", function () {
    expect(loadContractDescriptor(writeAbi(JSON.stringify({abi: []})), DEFAULT_CONTRACT_ADDRESS)).to.equal(null);
  });

  it("returns null for malformed JSON", function () {
    expect(loadContractDescriptor(writeAbi("[{"), DEFAULT_CONTRACT_ADDRESS)).to.equal(null);
  });

  it("returns null without a usable address", function () {
    const path = writeAbi(JSON.stringify(["function requestTokens()"]));

    expect(loadContractDescriptor(path, "")).to.equal(null);
    expect(loadContractDescriptor(path, "0x1234")).to.equal(null);
  });
});
