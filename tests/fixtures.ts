/**
 * Shared test fixtures: in-process transport, collections, temp dirs, zips.
 */
import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { strToU8, zipSync } from "fflate";

import { HttpStatusError } from "../src/core/exceptions.js";
import type { Collection } from "../src/model/schemas.js";
import type { RequestOptions, Transport } from "../src/transport/backend.js";

// ---------------------------------------------------------------------------
// Fake transport
// ---------------------------------------------------------------------------

export interface RecordedRequest {
  method: "GET" | "POST" | "PATCH";
  path: string;
  headers: Record<string, string>;
  data?: unknown;
  form?: FormData;
}

export type Handler = (req: RecordedRequest) => Response | Promise<Response>;

/**
 * Stands in for ApiConnection: records every request and answers from
 * `handler`. Non-2xx answers raise HttpStatusError like the real transport.
 */
export class FakeTransport implements Transport {
  readonly requests: RecordedRequest[] = [];
  closed = false;
  private handler: Handler;

  constructor(handler: Handler = () => notFound()) {
    this.handler = handler;
  }

  async GET(path: string, opts: RequestOptions = {}): Promise<Response> {
    return this.handle("GET", path, opts);
  }

  async POST(path: string, opts: RequestOptions = {}): Promise<Response> {
    return this.handle("POST", path, opts);
  }

  async PATCH(path: string, opts: RequestOptions = {}): Promise<Response> {
    return this.handle("PATCH", path, opts);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Requests matching `method` (and `path`, when given). */
  sent(method: RecordedRequest["method"], path?: string): RecordedRequest[] {
    return this.requests.filter(
      (r) => r.method === method && (path === undefined || r.path === path),
    );
  }

  private async handle(
    method: RecordedRequest["method"],
    path: string,
    opts: RequestOptions,
  ): Promise<Response> {
    const req: RecordedRequest = {
      method,
      path,
      headers: opts.headers ?? {},
      data: opts.data,
      form: opts.form,
    };
    this.requests.push(req);
    const response = await this.handler(req);
    if (!response.ok) {
      throw new HttpStatusError(response.status, path, await response.text());
    }
    return response;
  }
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}

export function accepted(): Response {
  return new Response(null, { status: 202 });
}

export function notFound(): Response {
  return new Response("not found", { status: 404 });
}

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export function makeCollection(overrides: Partial<Collection> = {}): Collection {
  return {
    href: "/archives/5000/",
    name: "Photos",
    canMoveTo: true,
    canUploadTo: true,
    ...overrides,
  };
}

/** A payload whose byte at offset i is i % 251. */
export function patternBytes(size: number): Uint8Array {
  const data = new Uint8Array(size);
  for (let i = 0; i < size; i++) data[i] = i % 251;
  return data;
}

/** Read the single "chunk" part of a multipart request. */
export async function chunkBytes(req: RecordedRequest): Promise<Uint8Array> {
  const part = req.form?.get("chunk");
  if (!(part instanceof Blob)) {
    throw new Error(`request to ${req.path} has no chunk part`);
  }
  return new Uint8Array(await part.arrayBuffer());
}

// ---------------------------------------------------------------------------
// Temp dir + zip file helpers
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "dam-changes-test-"));
}

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, content] of Object.entries(files)) {
    entries[name] = typeof content === "string" ? strToU8(content) : content;
  }
  return zipSync(entries);
}
