/**
 * Rendition selection, request and download.
 *
 * A rendition is produced on demand: POST its href to the rendition endpoint,
 * then poll the returned location until the file is ready.
 */
import { componentLogger } from "../log.js";
import type { Asset, AssetPreview, AssetRendition } from "../model/schemas.js";
import type { StorageBackend } from "../storage/backend.js";
import type { Transport } from "../transport/backend.js";
import { MediaType } from "../transport/routes.js";
import { UnexpectedResponseError } from "./exceptions.js";
import { DEFAULT_POLLING, pollUntilReady } from "./retrier.js";
import type { PollingOptions } from "./types.js";

const logger = componentLogger("renditions");

export interface RenditionQuery {
  profile?: string;
  original?: boolean;
  /** Minimum length of the shortest side. */
  size?: number;
  width?: number;
  height?: number;
}

export interface PreviewQuery {
  size?: number;
  width?: number;
  height?: number;
  square?: boolean;
}

/** The first rendition of `asset` satisfying every constraint. */
export function findRendition(
  asset: Asset,
  query: RenditionQuery = {},
): AssetRendition | undefined {
  const { profile, original, size = 0, width = 0, height = 0 } = query;
  return (asset.renditions ?? []).find(
    (r) =>
      (profile === undefined || r.profile === profile) &&
      (original === undefined || (r.original ?? false) === original) &&
      size <= Math.min(r.width, r.height) &&
      width <= r.width &&
      height <= r.height,
  );
}

/** The first preview of `asset` satisfying every constraint. */
export function findPreview(
  asset: Asset,
  query: PreviewQuery = {},
): AssetPreview | undefined {
  const { size = 0, width = 0, height = 0, square } = query;
  return (asset.previews ?? []).find(
    (p) =>
      size <= p.size &&
      width <= p.width &&
      height <= p.height &&
      (square === undefined || p.square === square),
  );
}

/** Start rendering; returns the location the file will be served from. */
export async function requestRendition(
  transport: Transport,
  rendition: AssetRendition,
  endpoint: string,
): Promise<string> {
  const response = await transport.POST(endpoint, {
    headers: {
      "Content-Type": MediaType.renditionRequest,
      Accept: MediaType.renditionResponse,
    },
    data: { href: rendition.href },
  });
  const location = response.headers.get("Location");
  if (!location) {
    throw new UnexpectedResponseError(
      `Rendition request for ${rendition.href} returned no Location`,
    );
  }
  return location;
}

/**
 * Request a rendition, wait until it is ready and store it under `key`.
 * Returns the number of bytes written.
 */
export async function downloadRendition(
  transport: Transport,
  storage: StorageBackend,
  rendition: AssetRendition,
  endpoint: string,
  key: string,
  polling: PollingOptions = DEFAULT_POLLING,
): Promise<number> {
  const location = await requestRendition(transport, rendition, endpoint);
  const response = await pollUntilReady(transport, location, polling);
  const data = new Uint8Array(await response.arrayBuffer());
  await storage.write(key, data);
  logger.info("Stored rendition {href} as {key} ({bytes} bytes)", {
    href: rendition.href,
    key,
    bytes: data.byteLength,
  });
  return data.byteLength;
}

/**
 * Fetch a preview of `asset` and store it under `key`. Previews are served
 * directly, authorised by the asset's preview token when it has one.
 * Returns the number of bytes written.
 */
export async function downloadPreview(
  transport: Transport,
  storage: StorageBackend,
  asset: Asset,
  preview: AssetPreview,
  key: string,
): Promise<number> {
  const response = await transport.GET(preview.href, {
    headers: asset.previewToken
      ? { Authorization: `Bearer ${asset.previewToken}` }
      : undefined,
  });
  const data = new Uint8Array(await response.arrayBuffer());
  await storage.write(key, data);
  logger.info("Stored preview {href} as {key} ({bytes} bytes)", {
    href: preview.href,
    key,
    bytes: data.byteLength,
  });
  return data.byteLength;
}
