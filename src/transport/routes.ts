/**
 * Remote API routes and media types used by the change engine.
 */

export const MediaType = {
  json: "application/json",
  assetUpdate: "application/vnd.asset-update+json",
  moveRequest: "application/vnd.move-request+json",
  renditionRequest: "application/vnd.rendition-request+json",
  renditionResponse: "application/vnd.rendition-response+json",
  octetStream: "application/octet-stream",
} as const;

export class ApiRoutes {
  readonly basePath: string;

  constructor(basePath = "") {
    this.basePath = basePath.replace(/\/+$/, "");
  }

  /** Service descriptor of the signed-in client. */
  me(): string {
    return `${this.basePath}/me`;
  }

  backgroundTasks(): string {
    return `${this.basePath}/me/background-tasks/`;
  }

  uploads(): string {
    return `${this.basePath}/uploads`;
  }

  uploadChunk(sessionId: string, index: number): string {
    return `${this.basePath}/uploads/${encodeURIComponent(sessionId)}/chunks/${index}`;
  }

  uploadStatus(sessionId: string): string {
    return `${this.basePath}/uploads/${encodeURIComponent(sessionId)}/status`;
  }
}
