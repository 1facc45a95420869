/**
 * Zod schemas for the remote API payloads this library reads.
 */
import { z } from "zod";

// ---------------------------------------------------------------------------
// Authentication
// ---------------------------------------------------------------------------

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

// ---------------------------------------------------------------------------
// Background jobs
// ---------------------------------------------------------------------------

export const MoveResponseSchema = z.object({
  location: z.string().min(1),
  maxInterval: z.number().optional(),
  status: z.string().optional(),
});

export const MoveJobStatus = z.enum(["pending", "inProgress", "done", "failed"]);

export const MoveStatusSchema = z.object({
  task: z
    .object({
      status: MoveJobStatus,
      type: z.string().optional(),
      id: z.string().optional(),
    })
    .passthrough(),
  job: z.record(z.unknown()).optional(),
});

// ---------------------------------------------------------------------------
// Uploads
// ---------------------------------------------------------------------------

export const UploadSessionSchema = z.object({
  id: z.string().min(1),
  chunkSize: z.number().int().positive(),
  numChunks: z.number().int().nonnegative(),
});

export const UploadJobStatus = z.enum([
  "awaitingData",
  "pending",
  "inProgress",
  "done",
  "failed",
]);

export const UploadStatusSchema = z.object({
  status: UploadJobStatus,
  result: z
    .object({
      assetUrl: z.string().optional(),
      assetDetails: z.string().optional(),
    })
    .nullish(),
  error: z
    .object({
      value: z.string().optional(),
      message: z.string().optional(),
    })
    .nullish(),
});

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export const CollectionSchema = z.object({
  href: z.string(),
  name: z.string(),
  id: z.string().nullish(),
  description: z.string().nullish(),
  canMoveTo: z.boolean(),
  canUploadTo: z.boolean(),
  isSearchable: z.boolean().optional(),
  assetCount: z.number().optional(),
});

export const AssetPreviewSchema = z.object({
  href: z.string(),
  width: z.number().int(),
  height: z.number().int(),
  size: z.number().int(),
  square: z.boolean(),
});

export const AssetRenditionSchema = z.object({
  href: z.string(),
  width: z.number().int(),
  height: z.number().int(),
  size: z.number().int().optional(),
  original: z.boolean().nullish(),
  profile: z.string().nullish(),
  display_name: z.string().optional(),
  description: z.string().nullish(),
  default: z.boolean().optional(),
});

export const AssetSchema = z.object({
  href: z.string(),
  filename: z.string(),
  filesize: z.number().int().optional(),
  archiveId: z.number().int().optional(),
  previews: z.array(AssetPreviewSchema).nullish(),
  previewToken: z.string().optional(),
  renditions: z.array(AssetRenditionSchema).nullish(),
});

export const InstanceInfoSchema = z
  .object({
    services: z
      .object({
        search: z.string().nullish(),
        rendition_request: z.string().nullish(),
      })
      .passthrough(),
    searchURL: z.string().optional(),
  })
  .passthrough();

export type MoveStatus = z.infer<typeof MoveStatusSchema>;
export type UploadStatus = z.infer<typeof UploadStatusSchema>;
export type Collection = z.infer<typeof CollectionSchema>;
export type Asset = z.infer<typeof AssetSchema>;
export type AssetPreview = z.infer<typeof AssetPreviewSchema>;
export type AssetRendition = z.infer<typeof AssetRenditionSchema>;
export type InstanceInfo = z.infer<typeof InstanceInfoSchema>;
