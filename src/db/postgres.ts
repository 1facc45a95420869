/**
 * PostgreSQL database backend using postgres-js.
 */
import postgres from "postgres";
import type { DatabaseBackend, Row, SqlParam } from "./backend.js";
import { POSTGRES_SCHEMA_SQL } from "./schema.js";

/** Rewrite `?` placeholders to postgres' `$1, $2, ...`. */
export function toPositional(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

export class PostgresBackend implements DatabaseBackend {
  private sql: postgres.Sql;

  constructor(connectionString: string) {
    this.sql = postgres(connectionString);
  }

  async initialize(): Promise<void> {
    await this.sql.unsafe(POSTGRES_SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    await this.sql.unsafe(toPositional(sql), params);
  }

  async query<T extends Row>(sql: string, params: SqlParam[] = []): Promise<T[]> {
    return await this.sql.unsafe<T[]>(toPositional(sql), params);
  }

  async queryOne<T extends Row>(sql: string, params: SqlParam[] = []): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
