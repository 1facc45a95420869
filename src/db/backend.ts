/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL with `?` placeholders, no ORM.
 */
export type SqlParam = string | number | null;

export type Row = Record<string, unknown>;

export interface DatabaseBackend {
  /** Create tables / indexes. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlParam[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query<T extends Row>(sql: string, params?: SqlParam[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T extends Row>(sql: string, params?: SqlParam[]): Promise<T | null>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
