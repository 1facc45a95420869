/**
 * Change task types.
 */

/** A metadata field value as the remote service stores it. */
export type MetadataValue = string | boolean | string[];

/** A metadata edit directive sent along with a new upload. */
export interface MetadataPatch {
  id: number;
  action: "add" | "append" | "prepend" | "erase";
  value: string | string[];
}

/** A file-attribute edit directive sent along with a new upload. */
export interface AttributePatch {
  /** `mt` is the file's modification time. */
  key: "mt";
  value: string;
}

export interface MetadataChange {
  kind: "metadata";
  assetRef: string;
  fields: Record<string, MetadataValue>;
}

export interface MoveChange {
  kind: "move";
  assetRefs: readonly string[];
  destination: string;
}

export interface UploadChange {
  kind: "upload";
  payload: Uint8Array;
  destination: string;
  filename: string;
  size: number;
  fields: readonly MetadataPatch[];
  attributes: readonly AttributePatch[];
}

export type Change = MetadataChange | MoveChange | UploadChange;

export type ChangeKind = Change["kind"];

export type TaskStatus = "uncommitted" | "submitted" | "done" | "failed";

export type TerminalStatus = Extract<TaskStatus, "done" | "failed">;

/**
 * The unit of work held by the registry. Status and error only change
 * through TaskRegistry.transition().
 */
export interface ChangeTask {
  readonly id: string;
  readonly change: Change;
  readonly createdAt: Date;
  readonly status: TaskStatus;
  readonly error?: string;
}

/** Where the progress of a submitted move or upload job can be read. */
export interface BackgroundTaskHandle {
  taskId: string;
  statusLocation: string;
}

/** Server-declared shape of an open upload session. */
export interface UploadSession {
  id: string;
  chunkSize: number;
  numChunks: number;
}

export interface TaskError {
  taskId: string;
  message: string;
}

/** Result returned from commit(). */
export interface CommitResult {
  done: string[];
  submitted: string[];
  failed: string[];
  errors: TaskError[];
}

/** Result returned from checkSubmitted() and settle(). */
export interface ReconcileResult {
  done: string[];
  failed: string[];
  pending: string[];
  errors: TaskError[];
}

export interface PollingOptions {
  maxAttempts: number;
  delayMs: number;
  signal?: AbortSignal;
}

export function createTask(change: Change): ChangeTask {
  return {
    id: crypto.randomUUID(),
    change,
    createdAt: new Date(),
    status: "uncommitted",
  };
}

/** One-line description of a change, used in logs and the journal. */
export function describeChange(change: Change): string {
  switch (change.kind) {
    case "metadata":
      return `metadata ${change.assetRef} [${Object.keys(change.fields).join(", ")}]`;
    case "move":
      return `move ${change.assetRefs.length} asset(s) to ${change.destination}`;
    case "upload":
      return `upload ${change.filename} (${change.size} bytes) to ${change.destination}`;
  }
}
