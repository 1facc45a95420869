/**
 * Task journal: an append-only history of committed tasks and their status
 * transitions, kept in a DatabaseBackend. Never read back into a registry.
 */
import type { DatabaseBackend } from "../db/backend.js";
import { componentLogger } from "../log.js";
import { errorMessage } from "./exceptions.js";
import { describeChange, type ChangeTask, type TaskStatus } from "./types.js";

const logger = componentLogger("journal");

export interface TaskJournal {
  initialize(): Promise<void>;

  /** Record the task's current status (and status location, if any). */
  record(task: ChangeTask, statusLocation?: string): Promise<void>;

  close(): Promise<void>;
}

/**
 * Record `task` in `journal`, if there is one. A failed write is logged and
 * dropped: the registry stays authoritative and the pass goes on.
 */
export async function recordTask(
  journal: TaskJournal | null,
  task: ChangeTask,
  statusLocation?: string,
): Promise<void> {
  if (!journal) return;
  try {
    await journal.record(task, statusLocation);
  } catch (err) {
    logger.warn("Could not journal task {taskId} ({status}): {error}", {
      taskId: task.id,
      status: task.status,
      error: errorMessage(err),
    });
  }
}

export type JournalEntry = {
  id: string;
  kind: string;
  summary: string;
  status: TaskStatus;
  status_location: string | null;
  error: string | null;
  created_at: string;
  updated_at: string;
};

export class DatabaseJournal implements TaskJournal {
  private db: DatabaseBackend;

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  async record(task: ChangeTask, statusLocation?: string): Promise<void> {
    const now = new Date().toISOString();
    await this.db.execute(
      `INSERT INTO change_tasks (id, kind, summary, status, status_location, error, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (id) DO UPDATE SET
         status = excluded.status,
         status_location = COALESCE(excluded.status_location, change_tasks.status_location),
         error = excluded.error,
         updated_at = excluded.updated_at`,
      [
        task.id,
        task.change.kind,
        describeChange(task.change),
        task.status,
        statusLocation ?? null,
        task.error ?? null,
        task.createdAt.toISOString(),
        now,
      ],
    );
    await this.db.execute(
      `INSERT INTO task_events (task_id, status, created_at) VALUES (?, ?, ?)`,
      [task.id, task.status, now],
    );
  }

  async entry(taskId: string): Promise<JournalEntry | null> {
    return this.db.queryOne<JournalEntry>(
      "SELECT * FROM change_tasks WHERE id = ?",
      [taskId],
    );
  }

  /** Recorded statuses of a task, oldest first. */
  async history(taskId: string): Promise<TaskStatus[]> {
    const rows = await this.db.query<{ status: TaskStatus }>(
      "SELECT status FROM task_events WHERE task_id = ? ORDER BY seq",
      [taskId],
    );
    return rows.map((r) => r.status);
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
