/**
 * Abstract HTTP transport interface.
 *
 * Implementations own authentication; the change engine only ever sees
 * host-relative paths (or absolute URLs handed out by the server).
 */
export interface RequestOptions {
  headers?: Record<string, string>;
  /** JSON-serialisable request body. */
  data?: unknown;
  /** Multipart body; takes precedence over `data`. */
  form?: FormData;
  signal?: AbortSignal;
}

export interface Transport {
  /** GET a resource. Raises HttpStatusError on a non-2xx response. */
  GET(path: string, opts?: RequestOptions): Promise<Response>;

  /** POST to a resource. Raises HttpStatusError on a non-2xx response. */
  POST(path: string, opts?: RequestOptions): Promise<Response>;

  /** PATCH a resource. Raises HttpStatusError on a non-2xx response. */
  PATCH(path: string, opts?: RequestOptions): Promise<Response>;

  /** Release credentials; later requests fail. */
  close(): Promise<void>;
}
