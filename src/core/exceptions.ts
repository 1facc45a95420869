/**
 * Custom exceptions for change submission and reconciliation.
 */
import type { TaskStatus } from "./types.js";

export class ApiError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ApiError";
  }
}

/** A request answered with a non-2xx status. */
export class HttpStatusError extends ApiError {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(status: number, url: string, body = "") {
    super(`HTTP ${status} for ${url}${body ? `: ${body}` : ""}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

export class UnexpectedResponseError extends ApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UnexpectedResponseError";
  }
}

export class UploadFailedException extends ApiError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message ? `Upload failed: ${message}` : "Upload failed", options);
    this.name = "UploadFailedException";
  }
}

export class PollingTimeoutError extends ApiError {
  readonly location: string;
  readonly attempts: number;

  constructor(location: string, attempts: number) {
    super(`'${location}' was not ready after ${attempts} attempt(s)`);
    this.name = "PollingTimeoutError";
    this.location = location;
    this.attempts = attempts;
  }
}

export class CollectionNotMovableTo extends ApiError {
  constructor(collection: string) {
    super(`Assets cannot be moved to collection '${collection}'`);
    this.name = "CollectionNotMovableTo";
  }
}

export class CollectionNotUploadableTo extends ApiError {
  constructor(collection: string) {
    super(`Assets cannot be uploaded to collection '${collection}'`);
    this.name = "CollectionNotUploadableTo";
  }
}

export class ConnectionClosedError extends Error {
  constructor() {
    super("Connection is closed");
    this.name = "ConnectionClosedError";
  }
}

export class DuplicateTaskError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} is already registered`);
    this.name = "DuplicateTaskError";
    this.taskId = taskId;
  }
}

export class InvalidTransitionError extends Error {
  readonly taskId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

export class UnknownTaskError extends Error {
  constructor(taskId: string) {
    super(`Unknown task: ${taskId}`);
    this.name = "UnknownTaskError";
  }
}

/** Stringify anything thrown, keeping the error name when there is one. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
