/**
 * dam-changes: batch, submit and reconcile changes against a
 * digital-asset-management API.
 */
import { unzipSync } from "fflate";
import { readFile } from "node:fs/promises";
import { posix } from "node:path";

import { parseConfig } from "./config.js";
import { ChangeDispatcher } from "./core/dispatcher.js";
import {
  CollectionNotMovableTo,
  CollectionNotUploadableTo,
  PollingTimeoutError,
} from "./core/exceptions.js";
import type { TaskJournal } from "./core/journal.js";
import { TaskRegistry } from "./core/registry.js";
import { downloadPreview, downloadRendition } from "./core/renditions.js";
import { DEFAULT_POLLING, wait } from "./core/retrier.js";
import { BackgroundTaskTracker } from "./core/tracker.js";
import {
  createTask,
  type AttributePatch,
  type ChangeTask,
  type CommitResult,
  type MetadataPatch,
  type MetadataValue,
  type PollingOptions,
  type ReconcileResult,
  type TaskStatus,
} from "./core/types.js";
import type {
  Asset,
  AssetPreview,
  AssetRendition,
  Collection,
  InstanceInfo,
} from "./model/schemas.js";
import { parseResponse } from "./model/parse.js";
import {
  AssetSchema,
  CollectionSchema,
  InstanceInfoSchema,
} from "./model/schemas.js";
import type { StorageBackend } from "./storage/backend.js";
import type { Transport } from "./transport/backend.js";
import { ApiRoutes } from "./transport/routes.js";

export * from "./core/exceptions.js";
export * from "./core/types.js";
export { findPreview, findRendition } from "./core/renditions.js";
export { pollUntilReady } from "./core/retrier.js";
export { ConfigSchema, parseConfig, type Config } from "./config.js";
export { ApiConnection } from "./transport/connection.js";
export type { Transport, RequestOptions } from "./transport/backend.js";
export type { StorageBackend } from "./storage/backend.js";
export type { TaskJournal } from "./core/journal.js";
export type {
  Asset,
  AssetPreview,
  AssetRendition,
  Collection,
  InstanceInfo,
} from "./model/schemas.js";

export interface UploadOptions {
  filename?: string;
  fields?: MetadataPatch[];
  attributes?: AttributePatch[];
}

export interface ChangeManagerOptions {
  transport: Transport;
  storage?: StorageBackend;
  journal?: TaskJournal;
  polling?: PollingOptions;
  routes?: ApiRoutes;
}

export class ChangeManager {
  private transport: Transport;
  private storage: StorageBackend | null;
  private journal: TaskJournal | null;
  private polling: PollingOptions;
  private routes: ApiRoutes;
  private registry = new TaskRegistry();
  private dispatcher: ChangeDispatcher;
  private tracker: BackgroundTaskTracker;

  constructor(opts: ChangeManagerOptions) {
    this.transport = opts.transport;
    this.storage = opts.storage ?? null;
    this.journal = opts.journal ?? null;
    this.polling = opts.polling ?? DEFAULT_POLLING;
    this.routes = opts.routes ?? new ApiRoutes();
    this.dispatcher = new ChangeDispatcher(this.registry, this.transport, {
      routes: this.routes,
      journal: opts.journal,
    });
    this.tracker = new BackgroundTaskTracker(
      this.registry,
      this.transport,
      opts.journal,
    );
  }

  /** Construct from a configuration object (validated with Zod). */
  static async fromConfig(config: unknown): Promise<ChangeManager> {
    const { connection, routes, storage, journal, polling } =
      parseConfig(config);
    const manager = new ChangeManager({
      transport: connection,
      routes,
      storage,
      journal,
      polling,
    });
    await manager.initialize();
    return manager;
  }

  /** Create journal tables, when a journal is configured. */
  async initialize(): Promise<void> {
    await this.journal?.initialize();
  }

  /** Close the transport and the journal database. */
  async close(): Promise<void> {
    await this.transport.close();
    await this.journal?.close();
  }

  // ------------------------------------------------------------------
  // Queue changes (no I/O)
  // ------------------------------------------------------------------

  /** Set one metadata field of an asset. */
  setValue(assetRef: string, field: number | string, value: MetadataValue): ChangeTask {
    return this.setValues(assetRef, { [String(field)]: value });
  }

  /** Set several metadata fields of an asset in one request. */
  setValues(assetRef: string, fields: Record<string, MetadataValue>): ChangeTask {
    return this.registry.add(
      createTask({ kind: "metadata", assetRef, fields: { ...fields } }),
    );
  }

  /** Move assets into another collection. */
  move(assetRefs: Iterable<string>, destination: Collection): ChangeTask {
    if (!destination.canMoveTo) {
      throw new CollectionNotMovableTo(destination.name);
    }
    return this.registry.add(
      createTask({
        kind: "move",
        assetRefs: [...new Set(assetRefs)],
        destination: destination.href,
      }),
    );
  }

  /** Upload a new asset from an in-memory payload. */
  upload(
    payload: Uint8Array,
    destination: Collection,
    opts: UploadOptions & { filename: string },
  ): ChangeTask {
    if (!destination.canUploadTo) {
      throw new CollectionNotUploadableTo(destination.name);
    }
    return this.registry.add(
      createTask({
        kind: "upload",
        payload: payload.slice(),
        destination: destination.href,
        filename: opts.filename,
        size: payload.byteLength,
        fields: opts.fields ?? [],
        attributes: opts.attributes ?? [],
      }),
    );
  }

  /** Upload a new asset read from the storage backend. */
  async uploadFromStorage(
    key: string,
    destination: Collection,
    opts: UploadOptions = {},
  ): Promise<ChangeTask> {
    const payload = await this.requireStorage().read(key);
    return this.upload(payload, destination, {
      ...opts,
      filename: opts.filename ?? posix.basename(key),
    });
  }

  /** Queue one upload per file in a ZIP archive, in archive order. */
  async uploadArchive(
    zipPath: string,
    destination: Collection,
    opts: Omit<UploadOptions, "filename"> = {},
  ): Promise<ChangeTask[]> {
    if (!destination.canUploadTo) {
      throw new CollectionNotUploadableTo(destination.name);
    }
    const files = unzipSync(new Uint8Array(await readFile(zipPath)));

    const tasks: ChangeTask[] = [];
    for (const [name, data] of Object.entries(files)) {
      // Skip directories (empty data with trailing /)
      if (name.endsWith("/")) continue;
      tasks.push(
        this.upload(data, destination, {
          ...opts,
          filename: posix.basename(posix.normalize(name)),
        }),
      );
    }
    return tasks;
  }

  // ------------------------------------------------------------------
  // Commit & reconcile
  // ------------------------------------------------------------------

  /** Submit every uncommitted change. This may take a while. */
  async commit(): Promise<CommitResult> {
    return this.dispatcher.commit();
  }

  /** Poll each submitted background job once. */
  async checkSubmitted(signal?: AbortSignal): Promise<ReconcileResult> {
    return this.tracker.checkSubmitted(signal);
  }

  /**
   * Reconcile until no task is left submitted, waiting `delayMs` between
   * passes. Raises PollingTimeoutError when `maxAttempts` passes are spent.
   */
  async settle(opts: Partial<PollingOptions> = {}): Promise<ReconcileResult> {
    const { maxAttempts, delayMs, signal } = { ...this.polling, ...opts };
    const total: ReconcileResult = {
      done: [],
      failed: [],
      pending: [],
      errors: [],
    };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const pass = await this.tracker.checkSubmitted(signal);
      total.done.push(...pass.done);
      total.failed.push(...pass.failed);
      total.errors.push(...pass.errors);
      total.pending = pass.pending;

      if (this.registry.byStatus("submitted").length === 0) {
        return total;
      }
      if (attempt < maxAttempts) {
        await wait(delayMs, signal);
      }
    }

    throw new PollingTimeoutError("submitted background tasks", maxAttempts);
  }

  // ------------------------------------------------------------------
  // Task access
  // ------------------------------------------------------------------

  task(id: string): ChangeTask | undefined {
    return this.registry.get(id);
  }

  tasks(status?: TaskStatus): ChangeTask[] {
    return status ? this.registry.byStatus(status) : this.registry.all();
  }

  /** Drop a task from the registry. Returns false if it was unknown. */
  forget(id: string): boolean {
    return this.registry.remove(id);
  }

  // ------------------------------------------------------------------
  // Reads
  // ------------------------------------------------------------------

  async collection(href: string): Promise<Collection> {
    return parseResponse(await this.transport.GET(href), CollectionSchema);
  }

  async asset(href: string): Promise<Asset> {
    return parseResponse(await this.transport.GET(href), AssetSchema);
  }

  /** The service descriptor, which names e.g. the rendition endpoint. */
  async instanceInfo(): Promise<InstanceInfo> {
    return parseResponse(
      await this.transport.GET(this.routes.me()),
      InstanceInfoSchema,
    );
  }

  /** Store a preview of `asset` under `key`. */
  async downloadPreview(
    asset: Asset,
    preview: AssetPreview,
    key: string,
  ): Promise<number> {
    return downloadPreview(
      this.transport,
      this.requireStorage(),
      asset,
      preview,
      key,
    );
  }

  /** Render `rendition`, wait for it, and store it under `key`. */
  async downloadRendition(
    rendition: AssetRendition,
    endpoint: string,
    key: string,
    opts: { signal?: AbortSignal } = {},
  ): Promise<number> {
    return downloadRendition(
      this.transport,
      this.requireStorage(),
      rendition,
      endpoint,
      key,
      { ...this.polling, signal: opts.signal },
    );
  }

  private requireStorage(): StorageBackend {
    if (!this.storage) throw new Error("Storage backend not configured");
    return this.storage;
  }
}
