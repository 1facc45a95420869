/**
 * S3-compatible storage backend using the AWS SDK.
 *
 * Works with AWS S3 and S3-compatible services through `endpoint`.
 */
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NotFound,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import type { StorageBackend } from "./backend.js";

export interface S3StorageConfig {
  endpoint?: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  region?: string;
  prefix?: string;
}

/** Max keys per ListObjectsV2 request (S3 limit). */
const LIST_PAGE_SIZE = 1000;

export class S3Storage implements StorageBackend {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  constructor(config: S3StorageConfig, client?: S3Client) {
    this.client =
      client ??
      new S3Client({
        endpoint: config.endpoint,
        region: config.region ?? "auto",
        forcePathStyle: config.endpoint !== undefined,
        credentials: {
          accessKeyId: config.accessKeyId,
          secretAccessKey: config.secretAccessKey,
        },
      });
    this.bucket = config.bucket;
    this.prefix = config.prefix ? config.prefix.replace(/\/$/, "") + "/" : "";
  }

  private fullKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.fullKey(key),
        Body: data,
      }),
    );
  }

  async read(key: string): Promise<Uint8Array> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }),
    );
    if (!response.Body) {
      throw new Error(`S3 object has no body: ${key}`);
    }
    return response.Body.transformToByteArray();
  }

  async list(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: this.fullKey(prefix),
          MaxKeys: LIST_PAGE_SIZE,
          ContinuationToken: continuationToken,
        }),
      );
      for (const obj of response.Contents ?? []) {
        if (!obj.Key || obj.Key.endsWith("/")) continue; // directory placeholders
        keys.push(obj.Key.slice(this.prefix.length));
      }
      continuationToken = response.IsTruncated
        ? response.NextContinuationToken
        : undefined;
    } while (continuationToken);

    return keys.sort();
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }),
      );
      return true;
    } catch (err) {
      if (err instanceof NotFound) return false;
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: this.fullKey(key) }),
    );
  }
}
