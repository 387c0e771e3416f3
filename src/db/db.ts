import {existsSync, readFileSync} from "node:fs";
import {join} from "node:path";
import initSqlJs, {Database, SqlJsStatic} from "sql.js";
import {ConfigurationError} from "../shared/errors";

let SQL: SqlJsStatic | null = null;

async function loadSqlJs(): Promise<SqlJsStatic> {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

/** Empty in-memory wallet store with the schema applied. */
export async function createDb(): Promise<Database> {
  const sql = await loadSqlJs();
  const db = new sql.Database();
  const schema = readFileSync(join(process.cwd(), "src/db/schema.sql"), "utf8");
  db.run(schema);
  return db;
}

/**
 * Opens an existing SQLite wallet file. sql.js works on an in-memory copy, so
 * the file on disk is never written.
 */
export async function openWalletDb(path: string): Promise<Database> {
  if (!existsSync(path)) {
    throw new ConfigurationError(`wallet-db-not-found: ${path}`);
  }

  const sql = await loadSqlJs();
  return new sql.Database(readFileSync(path));
}
