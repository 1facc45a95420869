/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { DatabaseJournal, type TaskJournal } from "./core/journal.js";
import type { PollingOptions } from "./core/types.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { DiskStorage } from "./storage/disk.js";
import { S3Storage } from "./storage/s3.js";
import type { StorageBackend } from "./storage/backend.js";
import { ApiConnection } from "./transport/connection.js";
import { ApiRoutes } from "./transport/routes.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const ConnectionConfigSchema = z.object({
  endpoint: z.string().url(),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  basePath: z.string().default(""),
  tokenPath: z.string().default("/oauth2/token"),
});

const PollingConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(10),
  delayMs: z.number().int().nonnegative().default(5_000),
});

const StorageConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("disk"),
    config: z.object({ basePath: z.string().default("./data") }).default({}),
  }),
  z.object({
    provider: z.literal("s3"),
    config: z.object({
      bucket: z.string().min(1),
      accessKeyId: z.string().min(1),
      secretAccessKey: z.string().min(1),
      endpoint: z.string().url().optional(),
      region: z.string().optional(),
      prefix: z.string().optional(),
    }),
  }),
]);

const JournalConfigSchema = z.discriminatedUnion("provider", [
  z.object({ provider: z.literal("none") }),
  z.object({
    provider: z.literal("sqlite"),
    config: z.object({ path: z.string().default(":memory:") }).default({}),
  }),
  z.object({
    provider: z.literal("postgres"),
    config: z.object({ connectionString: z.string().min(1) }),
  }),
]);

export const ConfigSchema = z.object({
  connection: ConnectionConfigSchema,
  polling: PollingConfigSchema.default({}),
  storage: StorageConfigSchema.default({ provider: "disk" }),
  journal: JournalConfigSchema.default({ provider: "none" }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type JournalConfig = z.infer<typeof JournalConfigSchema>;

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function buildStorage(config: StorageConfig): StorageBackend {
  switch (config.provider) {
    case "disk":
      return new DiskStorage(config.config.basePath);
    case "s3":
      return new S3Storage(config.config);
  }
}

export function buildJournal(config: JournalConfig): TaskJournal | undefined {
  switch (config.provider) {
    case "none":
      return undefined;
    case "sqlite":
      return new DatabaseJournal(new SQLiteBackend(config.config.path));
    case "postgres":
      return new DatabaseJournal(
        new PostgresBackend(config.config.connectionString),
      );
  }
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export interface ParsedConfig {
  connection: ApiConnection;
  routes: ApiRoutes;
  storage: StorageBackend;
  journal: TaskJournal | undefined;
  polling: PollingOptions;
}

export function parseConfig(raw: unknown): ParsedConfig {
  const config = ConfigSchema.parse(raw);
  return {
    connection: new ApiConnection(config.connection),
    routes: new ApiRoutes(config.connection.basePath),
    storage: buildStorage(config.storage),
    journal: buildJournal(config.journal),
    polling: config.polling,
  };
}
