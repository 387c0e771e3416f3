import {expect} from "chai";
import {createDb} from "../src/db/db";
import {WalletRepo} from "../src/db/repo";
import {seedWallets} from "./helpers";

describe("WalletRepo", function () {
  it("lists wallets in ascending id order in pages", async function () {
    const {repo, accounts} = await seedWallets(5);

    const first = repo.listPage({first: 2});
    const second = repo.listPage({first: 2, after: first[first.length - 1].id});
    const third = repo.listPage({first: 2, after: second[second.length - 1].id});
    const fourth = repo.listPage({first: 2, after: third[third.length - 1].id});

    expect(first.map((row) => row.id)).to.deep.equal([1, 2]);
    expect(second.map((row) => row.id)).to.deep.equal([3, 4]);
    expect(third.map((row) => row.id)).to.deep.equal([5]);
    expect(fourth).to.deep.equal([]);
    expect(third[0]).to.deep.equal(accounts[4]);
  });

  it("yields the same sequence when paged again from the start", async function () {
    const {repo} = await seedWallets(4);

    const read = () => [...repo.listPage({first: 3}), ...repo.listPage({first: 3, after: 3})];

    expect(read()).to.deep.equal(read());
    expect(read().map((row) => row.id)).to.deep.equal([1, 2, 3, 4]);
  });

  it("returns an empty page for an empty store", async function () {
    const repo = new WalletRepo(await createDb());

    expect(repo.listPage({first: 500})).to.deep.equal([]);
    expect(repo.count()).to.equal(0);
  });

  it("clamps a non-positive page size to one row", async function () {
    const {repo} = await seedWallets(3);

    expect(repo.listPage({first: 0}).map((row) => row.id)).to.deep.equal([1]);
  });

  it("rejects a duplicate address", async function () {
    const {repo, accounts} = await seedWallets(1);

    expect(() => repo.create({address: accounts[0].address, privateKey: "0x01"})).to.throw(/UNIQUE/);
    expect(repo.count()).to.equal(1);
  });

  it("reads a wallet back by id", async function () {
    const {repo, accounts} = await seedWallets(2);

    expect(repo.getById(2)).to.deep.equal(accounts[1]);
    expect(repo.getById(99)).to.equal(null);
  });
});
