/**
 * Chunked upload executor.
 *
 * Protocol: open an upload session, then send the payload in the chunk size
 * the server declared, one multipart request per chunk, in order.
 */
import { componentLogger } from "../log.js";
import { parseResponse } from "../model/parse.js";
import { UploadSessionSchema } from "../model/schemas.js";
import type { Transport } from "../transport/backend.js";
import { ApiRoutes, MediaType } from "../transport/routes.js";
import { HttpStatusError, UploadFailedException } from "./exceptions.js";
import type { UploadChange, UploadSession } from "./types.js";

const logger = componentLogger("upload");

/** Byte range [start, end) of chunk `index`, sliced by the bytes remaining. */
export function chunkRange(
  index: number,
  chunkSize: number,
  totalSize: number,
): { start: number; end: number } {
  const start = Math.min(index * chunkSize, totalSize);
  const length = Math.max(0, Math.min(chunkSize, totalSize - start));
  return { start, end: start + length };
}

export class ChunkedUploadExecutor {
  private transport: Transport;
  private routes: ApiRoutes;

  constructor(transport: Transport, routes: ApiRoutes = new ApiRoutes()) {
    this.transport = transport;
    this.routes = routes;
  }

  async uploadAsset(item: UploadChange): Promise<UploadSession> {
    const session = await this.openSession(item);
    logger.debug("Opened upload session {id} for {filename}: {numChunks} x {chunkSize} bytes", {
      ...session,
      filename: item.filename,
    });

    for (let i = 0; i < session.numChunks; i++) {
      await this.uploadChunk(i, session, item);
    }
    return session;
  }

  private async openSession(item: UploadChange): Promise<UploadSession> {
    const response = await this.transport.POST(this.routes.uploads(), {
      headers: { "Content-Type": MediaType.json },
      data: {
        destination: item.destination,
        filename: item.filename,
        hasXmp: false,
        fileSize: item.size,
        checkoutId: null,
        metadata: {
          fields: item.fields,
          attributes: item.attributes,
        },
        comment: null,
      },
    });
    return parseResponse(response, UploadSessionSchema);
  }

  private async uploadChunk(
    index: number,
    session: UploadSession,
    item: UploadChange,
  ): Promise<void> {
    const { start, end } = chunkRange(index, session.chunkSize, item.size);
    const form = new FormData();
    form.append(
      "chunk",
      new Blob([item.payload.subarray(start, end)], { type: MediaType.octetStream }),
      "chunk",
    );

    const path = this.routes.uploadChunk(session.id, index);
    let response: Response;
    try {
      response = await this.transport.POST(path, { form });
    } catch (err) {
      if (err instanceof HttpStatusError) {
        throw new UploadFailedException(
          `chunk ${index} of ${item.filename} rejected with ${err.status}`,
          { cause: err },
        );
      }
      throw err;
    }

    if (response.status !== 204) {
      throw new UploadFailedException(
        `chunk ${index} of ${item.filename} answered ${response.status}: ${await response.text()}`,
      );
    }
    logger.debug("Sent chunk {index} ({bytes} bytes) of session {id}", {
      index,
      bytes: end - start,
      id: session.id,
    });
  }
}
