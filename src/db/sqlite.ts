/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import type { DatabaseBackend, Row, SqlParam } from "./backend.js";
import { SQLITE_SCHEMA_SQL } from "./schema.js";

export class SQLiteBackend implements DatabaseBackend {
  private db: Database.Database;

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    this.db.exec(SQLITE_SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    this.db.prepare(sql).run(...params);
  }

  async query<T extends Row>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return this.db.prepare<SqlParam[], T>(sql).all(...params);
  }

  async queryOne<T extends Row>(sql: string, params: SqlParam[] = []): Promise<T | null> {
    return this.db.prepare<SqlParam[], T>(sql).get(...params) ?? null;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
