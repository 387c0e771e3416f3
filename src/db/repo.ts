import {Database, SqlValue} from "sql.js";
import {IAccountStore} from "../interfaces/IAccountStore";
import {Account, CreateAccountInput, ListAccountsInput} from "../types/account.types";

const MAX_PAGE_SIZE = 10_000;

function readInteger(value: SqlValue, column: string): number {
  if (typeof value === "number" && Number.isInteger(value)) {
    return value;
  }
  throw new Error(`wallet-row-invalid-${column}`);
}

function readText(value: SqlValue, column: string): string {
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  throw new Error(`wallet-row-invalid-${column}`);
}

function mapRow(values: SqlValue[]): Account {
  return {
    id: readInteger(values[0], "id"),
    address: readText(values[1], "address"),
    privateKey: readText(values[2], "private_key")
  };
}

export class WalletRepo implements IAccountStore {
  constructor(private readonly db: Database) { }

  create(input: CreateAccountInput): Account {
    this.db.run(
      `INSERT INTO wallets (address, private_key, created_at)
       VALUES (?, ?, COALESCE(?, CURRENT_TIMESTAMP))`,
      [input.address, input.privateKey, input.createdAt ?? null]
    );

    const stmt = this.db.prepare("SELECT last_insert_rowid()");
    stmt.step();
    const id = readInteger(stmt.get()[0], "id");
    stmt.free();

    const created = this.getById(id);
    if (!created) {
      throw new Error("wallet-insert-not-visible");
    }
    return created;
  }

  getById(id: number): Account | null {
    const stmt = this.db.prepare("SELECT id, address, private_key FROM wallets WHERE id = ?");
    stmt.bind([id]);
    if (!stmt.step()) {
      stmt.free();
      return null;
    }
    const row = mapRow(stmt.get());
    stmt.free();
    return row;
  }

  /**
   * Next page of wallets with id greater than `after`, ascending.
   * An empty result means the cursor is exhausted.
   */
  listPage(input: ListAccountsInput): Account[] {
    const first = Math.max(1, Math.min(MAX_PAGE_SIZE, Math.floor(input.first)));
    const params: SqlValue[] = [];
    let where = "";

    if (input.after != null) {
      where = "WHERE id > ?";
      params.push(input.after);
    }

    const stmt = this.db.prepare(
      `SELECT id, address, private_key FROM wallets ${where} ORDER BY id ASC LIMIT ?`
    );
    stmt.bind([...params, first]);

    const rows: Account[] = [];
    while (stmt.step()) {
      rows.push(mapRow(stmt.get()));
    }
    stmt.free();
    return rows;
  }

  count(): number {
    const stmt = this.db.prepare("SELECT COUNT(*) FROM wallets");
    stmt.step();
    const total = readInteger(stmt.get()[0], "count");
    stmt.free();
    return total;
  }
}
