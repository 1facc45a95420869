/**
 * Change dispatcher: commits uncommitted tasks, one variant at a time.
 *
 * Metadata changes resolve synchronously (done / failed). Moves and uploads
 * start a background job on the server; their tasks become `submitted` and
 * get a handle pointing at the job's status location.
 *
 * Every per-task failure is recorded on the task (`failed` + `error`), so a
 * commit pass always visits every uncommitted task.
 */
import { componentLogger } from "../log.js";
import { parseResponse } from "../model/parse.js";
import { MoveResponseSchema } from "../model/schemas.js";
import type { Transport } from "../transport/backend.js";
import { ApiRoutes, MediaType } from "../transport/routes.js";
import { errorMessage, InvalidTransitionError } from "./exceptions.js";
import { recordTask, type TaskJournal } from "./journal.js";
import type { TaskRegistry } from "./registry.js";
import {
  describeChange,
  type ChangeTask,
  type CommitResult,
  type MetadataChange,
  type MoveChange,
  type UploadChange,
} from "./types.js";
import { ChunkedUploadExecutor } from "./upload.js";

const logger = componentLogger("dispatcher");

export interface DispatcherOptions {
  routes?: ApiRoutes;
  journal?: TaskJournal;
  uploader?: ChunkedUploadExecutor;
}

export class ChangeDispatcher {
  private registry: TaskRegistry;
  private transport: Transport;
  private routes: ApiRoutes;
  private journal: TaskJournal | null;
  private uploader: ChunkedUploadExecutor;

  constructor(
    registry: TaskRegistry,
    transport: Transport,
    opts: DispatcherOptions = {},
  ) {
    this.registry = registry;
    this.transport = transport;
    this.routes = opts.routes ?? new ApiRoutes();
    this.journal = opts.journal ?? null;
    this.uploader =
      opts.uploader ?? new ChunkedUploadExecutor(transport, this.routes);
  }

  /** Commit every uncommitted task, in insertion order. */
  async commit(): Promise<CommitResult> {
    const result: CommitResult = {
      done: [],
      submitted: [],
      failed: [],
      errors: [],
    };

    for (const task of this.registry.byStatus("uncommitted")) {
      await this.commitUncommitted(task);
      switch (task.status) {
        case "done":
          result.done.push(task.id);
          break;
        case "submitted":
          result.submitted.push(task.id);
          break;
        case "failed":
          result.failed.push(task.id);
          result.errors.push({ taskId: task.id, message: task.error ?? "" });
          break;
      }
    }
    return result;
  }

  /** Commit a single task. The task must be uncommitted. */
  async commitUncommitted(task: ChangeTask): Promise<void> {
    if (task.status !== "uncommitted") {
      throw new InvalidTransitionError(task.id, task.status, "submitted");
    }

    const change = task.change;
    let statusLocation: string | undefined;
    try {
      switch (change.kind) {
        case "metadata":
          await this.patchMetadata(change);
          this.registry.transition(task.id, "done");
          break;
        case "move":
          statusLocation = await this.moveAssets(change);
          this.submitted(task, statusLocation);
          break;
        case "upload":
          statusLocation = await this.uploadAsset(change);
          this.submitted(task, statusLocation);
          break;
      }
      logger.info("Committed {change} ({status})", {
        change: describeChange(change),
        status: task.status,
      });
    } catch (err) {
      const message = errorMessage(err);
      this.registry.transition(task.id, "failed", message);
      logger.warn("{change} failed: {error}", {
        change: describeChange(change),
        error: message,
      });
    }

    await recordTask(this.journal, task, statusLocation);
  }

  private submitted(task: ChangeTask, statusLocation: string): void {
    this.registry.setHandle({ taskId: task.id, statusLocation });
    this.registry.transition(task.id, "submitted");
  }

  // ------------------------------------------------------------------
  // Variant submissions
  // ------------------------------------------------------------------

  private async patchMetadata(change: MetadataChange): Promise<void> {
    const metadata: Record<string, { value: MetadataChange["fields"][string] }> = {};
    for (const [field, value] of Object.entries(change.fields)) {
      metadata[field] = { value };
    }
    await this.transport.PATCH(change.assetRef, {
      headers: {
        "Content-Type": MediaType.assetUpdate,
        Accept: MediaType.json,
      },
      data: { metadata },
    });
  }

  /** Start a move job; returns its status location. */
  private async moveAssets(change: MoveChange): Promise<string> {
    const response = await this.transport.POST(this.routes.backgroundTasks(), {
      headers: { "Content-Type": MediaType.moveRequest },
      data: {
        assets: change.assetRefs.map((href) => ({ href })),
        "job-destination": change.destination,
      },
    });
    const { location } = await parseResponse(response, MoveResponseSchema);
    return location;
  }

  /** Upload all chunks; returns the upload session's status location. */
  private async uploadAsset(change: UploadChange): Promise<string> {
    const session = await this.uploader.uploadAsset(change);
    return this.routes.uploadStatus(session.id);
  }
}
