/**
 * Unit tests for committing tasks through the dispatcher.
 */
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { ChangeDispatcher } from "../src/core/dispatcher.js";
import { InvalidTransitionError } from "../src/core/exceptions.js";
import { DatabaseJournal, type TaskJournal } from "../src/core/journal.js";
import { TaskRegistry } from "../src/core/registry.js";
import { BackgroundTaskTracker } from "../src/core/tracker.js";
import { createTask, type ChangeTask } from "../src/core/types.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { FakeTransport, json, noContent, type Handler } from "./fixtures.js";

function metadata(ref: string, fields: Record<string, string>): ChangeTask {
  return createTask({ kind: "metadata", assetRef: ref, fields });
}

function move(refs: string[], destination = "/archives/5000/"): ChangeTask {
  return createTask({ kind: "move", assetRefs: refs, destination });
}

function upload(size: number): ChangeTask {
  return createTask({
    kind: "upload",
    payload: new Uint8Array(size),
    destination: "/archives/5000/",
    filename: "photo.jpg",
    size,
    fields: [],
    attributes: [],
  });
}

/** Accepts every request the dispatcher makes. */
const happyServer: Handler = (req) => {
  if (req.method === "PATCH") return json({ href: req.path });
  if (req.path === "/me/background-tasks/") {
    return json({ location: "/me/background-tasks/t-1" }, 202);
  }
  if (req.path === "/uploads") {
    return json({ id: "u-1", chunkSize: 100, numChunks: 1 });
  }
  return noContent();
};

describe("ChangeDispatcher", () => {
  let registry: TaskRegistry;

  beforeEach(() => {
    registry = new TaskRegistry();
  });

  test("metadata change is one PATCH and done", async () => {
    const transport = new FakeTransport(happyServer);
    const dispatcher = new ChangeDispatcher(registry, transport);
    const task = registry.add(metadata("/assets/1", { "5": "archived" }));

    const result = await dispatcher.commit();

    expect(transport.requests).toHaveLength(1);
    const [patch] = transport.sent("PATCH", "/assets/1");
    expect(patch.data).toEqual({ metadata: { "5": { value: "archived" } } });
    expect(patch.headers["Content-Type"]).toBe("application/vnd.asset-update+json");
    expect(task.status).toBe("done");
    expect(result).toEqual({
      done: [task.id],
      submitted: [],
      failed: [],
      errors: [],
    });
  });

  test("several fields go in one request", async () => {
    const transport = new FakeTransport(happyServer);
    const dispatcher = new ChangeDispatcher(registry, transport);
    registry.add(metadata("/assets/1", { "5": "a", "7": "b" }));

    await dispatcher.commit();

    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0].data).toEqual({
      metadata: { "5": { value: "a" }, "7": { value: "b" } },
    });
  });

  test("failed metadata change does not stop the pass", async () => {
    const transport = new FakeTransport((req) =>
      req.path === "/assets/1"
        ? new Response("boom", { status: 500 })
        : json({ href: req.path }),
    );
    const dispatcher = new ChangeDispatcher(registry, transport);
    const first = registry.add(metadata("/assets/1", { "5": "x" }));
    const second = registry.add(metadata("/assets/2", { "5": "y" }));

    const result = await dispatcher.commit();

    expect(first.status).toBe("failed");
    expect(first.error).toBe("HttpStatusError: HTTP 500 for /assets/1: boom");
    expect(second.status).toBe("done");
    expect(result.failed).toEqual([first.id]);
    expect(result.done).toEqual([second.id]);
    expect(result.errors).toEqual([{ taskId: first.id, message: first.error }]);
  });

  test("move starts a background job and keeps its location", async () => {
    const transport = new FakeTransport(happyServer);
    const dispatcher = new ChangeDispatcher(registry, transport);
    const task = registry.add(move(["/assets/1", "/assets/2"]));

    const result = await dispatcher.commit();

    const [post] = transport.sent("POST", "/me/background-tasks/");
    expect(post.data).toEqual({
      assets: [{ href: "/assets/1" }, { href: "/assets/2" }],
      "job-destination": "/archives/5000/",
    });
    expect(post.headers["Content-Type"]).toBe("application/vnd.move-request+json");
    expect(task.status).toBe("submitted");
    expect(registry.handleFor(task.id)?.statusLocation).toBe(
      "/me/background-tasks/t-1",
    );
    expect(result.submitted).toEqual([task.id]);
  });

  test("rejected move is failed and the next task still runs", async () => {
    const transport = new FakeTransport((req) =>
      req.path === "/me/background-tasks/"
        ? new Response("forbidden", { status: 403 })
        : json({ href: req.path }),
    );
    const dispatcher = new ChangeDispatcher(registry, transport);
    const moved = registry.add(move(["/assets/1"]));
    const edited = registry.add(metadata("/assets/2", { "5": "y" }));

    const result = await dispatcher.commit();

    expect(moved.status).toBe("failed");
    expect(registry.handleFor(moved.id)).toBeUndefined();
    expect(edited.status).toBe("done");
    expect(result.failed).toEqual([moved.id]);
  });

  test("upload is submitted with the session status location", async () => {
    const transport = new FakeTransport(happyServer);
    const dispatcher = new ChangeDispatcher(registry, transport);
    const task = registry.add(upload(10));

    await dispatcher.commit();

    expect(task.status).toBe("submitted");
    expect(registry.handleFor(task.id)?.statusLocation).toBe("/uploads/u-1/status");
    expect(transport.requests.map((r) => r.path)).toEqual([
      "/uploads",
      "/uploads/u-1/chunks/0",
    ]);
  });

  test("tasks are committed in insertion order", async () => {
    const transport = new FakeTransport(happyServer);
    const dispatcher = new ChangeDispatcher(registry, transport);
    registry.add(metadata("/assets/1", { "5": "x" }));
    registry.add(move(["/assets/2"]));
    registry.add(metadata("/assets/3", { "5": "z" }));

    await dispatcher.commit();

    expect(transport.requests.map((r) => r.path)).toEqual([
      "/assets/1",
      "/me/background-tasks/",
      "/assets/3",
    ]);
  });

  test("committing a committed task is rejected", async () => {
    const transport = new FakeTransport(happyServer);
    const dispatcher = new ChangeDispatcher(registry, transport);
    const task = registry.add(metadata("/assets/1", { "5": "x" }));
    await dispatcher.commit();

    await expect(dispatcher.commitUncommitted(task)).rejects.toThrow(
      InvalidTransitionError,
    );
    expect(transport.requests).toHaveLength(1);
  });

  test("second commit sends nothing", async () => {
    const transport = new FakeTransport(happyServer);
    const dispatcher = new ChangeDispatcher(registry, transport);
    registry.add(metadata("/assets/1", { "5": "x" }));
    registry.add(move(["/assets/2"]));

    await dispatcher.commit();
    const again = await dispatcher.commit();

    expect(transport.requests).toHaveLength(2);
    expect(again).toEqual({ done: [], submitted: [], failed: [], errors: [] });
  });

  test("empty registry commits nothing", async () => {
    const transport = new FakeTransport(happyServer);
    const result = await new ChangeDispatcher(registry, transport).commit();

    expect(transport.requests).toHaveLength(0);
    expect(result.done).toEqual([]);
  });
});

describe("ChangeDispatcher with a journal", () => {
  let journal: DatabaseJournal;

  beforeEach(async () => {
    journal = new DatabaseJournal(new SQLiteBackend(":memory:"));
    await journal.initialize();
  });

  afterEach(async () => {
    await journal.close();
  });

  test("records each status a task passes through", async () => {
    const registry = new TaskRegistry();
    const transport = new FakeTransport((req) =>
      req.method === "GET"
        ? json({ task: { status: "done" } })
        : happyServer(req),
    );
    const dispatcher = new ChangeDispatcher(registry, transport, { journal });
    const tracker = new BackgroundTaskTracker(registry, transport, journal);
    const edited = registry.add(metadata("/assets/1", { "5": "x" }));
    const moved = registry.add(move(["/assets/2"]));

    await dispatcher.commit();
    await tracker.checkSubmitted();

    expect(await journal.history(edited.id)).toEqual(["done"]);
    expect(await journal.history(moved.id)).toEqual(["submitted", "done"]);

    const entry = await journal.entry(moved.id);
    expect(entry?.status).toBe("done");
    expect(entry?.kind).toBe("move");
    expect(entry?.status_location).toBe("/me/background-tasks/t-1");
    expect(entry?.summary).toBe("move 1 asset(s) to /archives/5000/");
  });

  test("failed task is journaled with its error", async () => {
    const registry = new TaskRegistry();
    const transport = new FakeTransport(
      () => new Response("gone", { status: 410 }),
    );
    const dispatcher = new ChangeDispatcher(registry, transport, { journal });
    const task = registry.add(metadata("/assets/9", { "5": "x" }));

    await dispatcher.commit();

    const entry = await journal.entry(task.id);
    expect(entry?.status).toBe("failed");
    expect(entry?.error).toBe("HttpStatusError: HTTP 410 for /assets/9: gone");
  });
});

describe("ChangeDispatcher with a failing journal", () => {
  /** Every write rejects; counts the attempts. */
  class BrokenJournal implements TaskJournal {
    writes = 0;
    async initialize(): Promise<void> {}
    async record(): Promise<void> {
      this.writes++;
      throw new Error("disk full");
    }
    async close(): Promise<void> {}
  }

  test("commit still visits every task", async () => {
    const registry = new TaskRegistry();
    const journal = new BrokenJournal();
    const transport = new FakeTransport(happyServer);
    const dispatcher = new ChangeDispatcher(registry, transport, { journal });
    const first = registry.add(metadata("/assets/1", { "5": "x" }));
    const second = registry.add(metadata("/assets/2", { "5": "y" }));

    const result = await dispatcher.commit();

    expect(first.status).toBe("done");
    expect(second.status).toBe("done");
    expect(result.done).toEqual([first.id, second.id]);
    expect(journal.writes).toBe(2);
  });

  test("checkSubmitted still visits every task", async () => {
    const registry = new TaskRegistry();
    const journal = new BrokenJournal();
    const transport = new FakeTransport((req) =>
      req.method === "GET" ? json({ task: { status: "done" } }) : happyServer(req),
    );
    const dispatcher = new ChangeDispatcher(registry, transport, { journal });
    const tracker = new BackgroundTaskTracker(registry, transport, journal);
    const first = registry.add(move(["/assets/1"]));
    const second = registry.add(move(["/assets/2"]));
    await dispatcher.commit();

    const result = await tracker.checkSubmitted();

    expect(result.done).toEqual([first.id, second.id]);
    expect(second.status).toBe("done");
    expect(journal.writes).toBe(4);
  });
});
