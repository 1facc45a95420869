/**
 * Background task tracker: advances submitted tasks by reading the status of
 * their server-side jobs. One GET per submitted task per call; callers repeat
 * the call (or use settle()) until nothing is left submitted.
 */
import { componentLogger } from "../log.js";
import { parseResponse } from "../model/parse.js";
import { MoveStatusSchema, UploadStatusSchema } from "../model/schemas.js";
import type { Transport } from "../transport/backend.js";
import { errorMessage } from "./exceptions.js";
import { recordTask, type TaskJournal } from "./journal.js";
import type { TaskRegistry } from "./registry.js";
import type {
  ChangeTask,
  ReconcileResult,
  TerminalStatus,
} from "./types.js";

const logger = componentLogger("tracker");

interface JobState {
  status: TerminalStatus | null;
  error?: string;
}

export class BackgroundTaskTracker {
  private registry: TaskRegistry;
  private transport: Transport;
  private journal: TaskJournal | null;

  constructor(
    registry: TaskRegistry,
    transport: Transport,
    journal?: TaskJournal,
  ) {
    this.registry = registry;
    this.transport = transport;
    this.journal = journal ?? null;
  }

  async checkSubmitted(signal?: AbortSignal): Promise<ReconcileResult> {
    const result: ReconcileResult = {
      done: [],
      failed: [],
      pending: [],
      errors: [],
    };

    for (const task of this.registry.byStatus("submitted")) {
      signal?.throwIfAborted();
      const handle = this.registry.handleFor(task.id);
      if (!handle) {
        // Submitted without a handle cannot be observed; leave it for the caller.
        result.pending.push(task.id);
        result.errors.push({ taskId: task.id, message: "no status location" });
        continue;
      }

      let state: JobState;
      try {
        const response = await this.transport.GET(handle.statusLocation, {
          signal,
        });
        state = await this.readJobState(task, response);
      } catch (err) {
        if (signal?.aborted) throw err;
        const message = errorMessage(err);
        logger.warn("Status check for task {taskId} failed: {error}", {
          taskId: task.id,
          error: message,
        });
        result.pending.push(task.id);
        result.errors.push({ taskId: task.id, message });
        continue;
      }

      if (state.status === null) {
        result.pending.push(task.id);
        continue;
      }

      this.registry.transition(task.id, state.status, state.error);
      this.registry.dropHandle(task.id);
      result[state.status].push(task.id);
      logger.info("Task {taskId} finished: {status}", {
        taskId: task.id,
        status: state.status,
      });
      await recordTask(this.journal, task);
    }

    return result;
  }

  private async readJobState(
    task: ChangeTask,
    response: Response,
  ): Promise<JobState> {
    switch (task.change.kind) {
      case "move": {
        const info = await parseResponse(response, MoveStatusSchema);
        logger.debug("Move job for task {taskId}: {status}", {
          taskId: task.id,
          status: info.task.status,
        });
        return {
          status: terminal(info.task.status),
          error: info.task.status === "failed" ? "move job failed" : undefined,
        };
      }
      case "upload": {
        const info = await parseResponse(response, UploadStatusSchema);
        logger.debug("Upload job for task {taskId}: {status}", {
          taskId: task.id,
          status: info.status,
        });
        return {
          status: terminal(info.status),
          error:
            info.status === "failed"
              ? (info.error?.message ?? "upload job failed")
              : undefined,
        };
      }
      case "metadata":
        // Metadata changes never go through a background job.
        return { status: null };
    }
  }
}

function terminal(status: string): TerminalStatus | null {
  return status === "done" || status === "failed" ? status : null;
}
