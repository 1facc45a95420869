/**
 * Unit tests for configuration parsing and backend selection.
 */
import { describe, test, expect } from "vitest";
import { ZodError } from "zod";
import { ConfigSchema, parseConfig } from "../src/config.js";
import { DatabaseJournal } from "../src/core/journal.js";
import { DiskStorage } from "../src/storage/disk.js";
import { S3Storage } from "../src/storage/s3.js";
import { ApiConnection } from "../src/transport/connection.js";

const connection = {
  endpoint: "https://dam.example.com",
  clientId: "test-client",
  clientSecret: "test-secret",
};

describe("ConfigSchema", () => {
  test("fills in defaults", () => {
    expect(ConfigSchema.parse({ connection })).toEqual({
      connection: { ...connection, basePath: "", tokenPath: "/oauth2/token" },
      polling: { maxAttempts: 10, delayMs: 5_000 },
      storage: { provider: "disk", config: { basePath: "./data" } },
      journal: { provider: "none" },
    });
  });

  test("endpoint must be a URL", () => {
    expect(() =>
      ConfigSchema.parse({ connection: { ...connection, endpoint: "dam" } }),
    ).toThrow(ZodError);
  });

  test("polling must be positive", () => {
    expect(() =>
      ConfigSchema.parse({ connection, polling: { maxAttempts: 0 } }),
    ).toThrow(ZodError);
  });

  test("s3 storage needs a bucket", () => {
    const result = ConfigSchema.safeParse({
      connection,
      storage: {
        provider: "s3",
        config: { accessKeyId: "test-key", secretAccessKey: "test-secret" },
      },
    });
    expect(result.success).toBe(false);
  });

  test("unknown journal provider is rejected", () => {
    expect(() =>
      ConfigSchema.parse({ connection, journal: { provider: "mysql" } }),
    ).toThrow(ZodError);
  });
});

describe("parseConfig", () => {
  test("builds default backends", () => {
    const parsed = parseConfig({ connection, polling: { delayMs: 0 } });

    expect(parsed.connection).toBeInstanceOf(ApiConnection);
    expect(parsed.connection.host).toBe("https://dam.example.com");
    expect(parsed.storage).toBeInstanceOf(DiskStorage);
    expect(parsed.journal).toBeUndefined();
    expect(parsed.polling).toEqual({ maxAttempts: 10, delayMs: 0 });
  });

  test("base path flows into routes", () => {
    const parsed = parseConfig({
      connection: { ...connection, basePath: "/api/" },
    });
    expect(parsed.routes.uploads()).toBe("/api/uploads");
    expect(parsed.routes.backgroundTasks()).toBe("/api/me/background-tasks/");
  });

  test("selects s3 storage and a sqlite journal", async () => {
    const parsed = parseConfig({
      connection,
      storage: {
        provider: "s3",
        config: {
          bucket: "assets",
          accessKeyId: "test-key",
          secretAccessKey: "test-secret",
          endpoint: "http://localhost:9000",
        },
      },
      journal: { provider: "sqlite" },
    });

    expect(parsed.storage).toBeInstanceOf(S3Storage);
    expect(parsed.journal).toBeInstanceOf(DatabaseJournal);
    await parsed.journal?.close();
  });
});
