#!/usr/bin/env node
/**
 * CLI entrypoint for dam-changes.
 *
 * Usage:
 *   dam-changes --config dam.json --set /assets/123 --field 5 --value archived
 *   dam-changes --config dam.json --upload photo.jpg --to /archives/5000 --wait
 */
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { parseArgs } from "node:util";

import { ChangeManager } from "./index.js";
import { componentLogger, configureLogging } from "./log.js";
import { settleAndReport } from "./report.js";

const USAGE = `
dam-changes: submit changes to a digital-asset-management service

Usage:
  dam-changes --config <file.json> --set <assetHref> --field <id> --value <v>
  dam-changes --config <file.json> --move <assetHref> [--move ...] --to <collectionHref>
  dam-changes --config <file.json> --upload <file> [--upload ...] --to <collectionHref>
  dam-changes --config <file.json> --upload-zip <archive.zip> --to <collectionHref>

Options:
  --config <file>        JSON configuration (connection, polling, storage, journal)
  --set <assetHref>      Asset whose metadata field is set (with --field, --value)
  --move <assetHref>     Asset to move (repeatable, needs --to)
  --upload <file>        Local file to upload (repeatable, needs --to)
  --upload-zip <file>    Upload every file inside a ZIP archive (needs --to)
  --to <collectionHref>  Destination collection for moves and uploads
  --wait                 Wait for background jobs to finish
  --verbose              Debug logging
  --help                 Show this help

Environment:
  DAM_CLIENT_SECRET      Overrides connection.clientSecret from the config file
`.trim();

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    config: { type: "string" },
    set: { type: "string" },
    field: { type: "string" },
    value: { type: "string" },
    move: { type: "string", multiple: true },
    upload: { type: "string", multiple: true },
    "upload-zip": { type: "string" },
    to: { type: "string" },
    wait: { type: "boolean", default: false },
    verbose: { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const moves = values.move ?? [];
const uploads = values.upload ?? [];
const hasWork =
  values.set !== undefined ||
  moves.length > 0 ||
  uploads.length > 0 ||
  values["upload-zip"] !== undefined;

if (!values.config || !hasWork) {
  console.error(USAGE);
  process.exit(1);
}

await configureLogging(values.verbose ? "debug" : "info");
const logger = componentLogger("cli");

const config: unknown = JSON.parse(await readFile(values.config, "utf8"));
const secret = process.env.DAM_CLIENT_SECRET;
if (secret && typeof config === "object" && config !== null && "connection" in config) {
  const connection = config.connection;
  if (typeof connection === "object" && connection !== null) {
    Object.assign(connection, { clientSecret: secret });
  }
}

const manager = await ChangeManager.fromConfig(config);

try {
  if (values.set !== undefined) {
    if (values.field === undefined || values.value === undefined) {
      throw new Error("--set needs --field and --value");
    }
    manager.setValue(values.set, values.field, values.value);
  }

  const needsDestination =
    moves.length > 0 || uploads.length > 0 || values["upload-zip"] !== undefined;
  if (needsDestination) {
    if (!values.to) throw new Error("--move and --upload need --to");
    const destination = await manager.collection(values.to);

    if (moves.length > 0) manager.move(moves, destination);
    for (const path of uploads) {
      const payload = new Uint8Array(await readFile(path));
      manager.upload(payload, destination, {
        filename: basename(path),
      });
    }
    if (values["upload-zip"]) {
      await manager.uploadArchive(values["upload-zip"], destination);
    }
  }

  const committed = await manager.commit();
  logger.info("Committed: {done} done, {submitted} submitted, {failed} failed", {
    done: committed.done.length,
    submitted: committed.submitted.length,
    failed: committed.failed.length,
  });

  const report = await settleAndReport(manager, { wait: values.wait });
  for (const line of report.lines) {
    console.log(line);
  }
  process.exitCode = report.exitCode;
} finally {
  await manager.close();
}
