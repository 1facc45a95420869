/**
 * Task registry: the ordered store of change tasks and their background
 * job handles for one commit session.
 */
import {
  DuplicateTaskError,
  InvalidTransitionError,
  UnknownTaskError,
} from "./exceptions.js";
import type { BackgroundTaskHandle, ChangeTask, TaskStatus } from "./types.js";

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  uncommitted: ["submitted", "done", "failed"],
  submitted: ["done", "failed"],
  done: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

interface TaskState {
  status: TaskStatus;
  error?: string;
}

/** A frozen view of `task` whose status and error read through to `state`. */
function trackedView(task: ChangeTask, state: TaskState): ChangeTask {
  return Object.freeze({
    id: task.id,
    change: task.change,
    createdAt: task.createdAt,
    get status(): TaskStatus {
      return state.status;
    },
    get error(): string | undefined {
      return state.error;
    },
  });
}

/**
 * Single-owner store. Iteration follows insertion order (Map semantics), which
 * is also the order tasks are committed and reconciled in.
 */
export class TaskRegistry {
  private tasks = new Map<string, { view: ChangeTask; state: TaskState }>();
  private handles = new Map<string, BackgroundTaskHandle>();

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Register `task` and return the registry's view of it. The view follows
   * every later transition and cannot be written to.
   */
  add(task: ChangeTask): ChangeTask {
    if (this.tasks.has(task.id)) {
      throw new DuplicateTaskError(task.id);
    }
    const state: TaskState = { status: task.status, error: task.error };
    const view = trackedView(task, state);
    this.tasks.set(task.id, { view, state });
    return view;
  }

  get(id: string): ChangeTask | undefined {
    return this.tasks.get(id)?.view;
  }

  all(): ChangeTask[] {
    return [...this.tasks.values()].map((t) => t.view);
  }

  byStatus(status: TaskStatus): ChangeTask[] {
    return this.all().filter((t) => t.status === status);
  }

  /** Move a task forward in its state machine. */
  transition(id: string, to: TaskStatus, error?: string): ChangeTask {
    const { view, state } = this.require(id);
    if (!canTransition(state.status, to)) {
      throw new InvalidTransitionError(id, state.status, to);
    }
    state.status = to;
    if (to === "failed" && error !== undefined) {
      state.error = error;
    }
    return view;
  }

  setHandle(handle: BackgroundTaskHandle): void {
    this.require(handle.taskId);
    if (this.handles.has(handle.taskId)) {
      throw new DuplicateTaskError(handle.taskId);
    }
    this.handles.set(handle.taskId, handle);
  }

  handleFor(id: string): BackgroundTaskHandle | undefined {
    return this.handles.get(id);
  }

  dropHandle(id: string): void {
    this.handles.delete(id);
  }

  /** Forget a task entirely. Returns false when it was not registered. */
  remove(id: string): boolean {
    this.handles.delete(id);
    return this.tasks.delete(id);
  }

  private require(id: string): { view: ChangeTask; state: TaskState } {
    const entry = this.tasks.get(id);
    if (!entry) throw new UnknownTaskError(id);
    return entry;
  }
}
