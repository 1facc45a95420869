/**
 * Blob store for upload sources and downloaded renditions.
 *
 * Keys are `/`-separated and relative to the backend's root.
 */
export interface StorageBackend {
  write(key: string, data: Uint8Array | string): Promise<void>;

  read(key: string): Promise<Uint8Array>;

  /** Every key under `prefix`, sorted. A prefix naming one object yields just that key. */
  list(prefix: string): Promise<string[]>;

  exists(key: string): Promise<boolean>;

  /** Removing a missing key is not an error. */
  delete(key: string): Promise<void>;
}
