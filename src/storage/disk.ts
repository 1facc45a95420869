/**
 * Storage under a local directory.
 */
import { mkdir, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { dirname, relative, resolve, sep } from "node:path";
import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const path = this.pathOf(key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data);
  }

  async read(key: string): Promise<Uint8Array> {
    const buf = await readFile(this.pathOf(key));
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  async list(prefix: string): Promise<string[]> {
    const path = this.pathOf(prefix);
    const info = await stat(path).catch(() => null);
    if (!info) return [];
    if (info.isFile()) return [this.keyOf(path)];

    const keys: string[] = [];
    for (const name of await readdir(path, { recursive: true })) {
      const child = resolve(path, name);
      if ((await stat(child)).isFile()) keys.push(this.keyOf(child));
    }
    return keys.sort();
  }

  async exists(key: string): Promise<boolean> {
    return (await stat(this.pathOf(key)).catch(() => null)) !== null;
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathOf(key), { force: true });
  }

  private pathOf(key: string): string {
    const path = resolve(this.root, key);
    if (path !== this.root && !path.startsWith(this.root + sep)) {
      throw new Error(`Key escapes storage root: ${key}`);
    }
    return path;
  }

  private keyOf(path: string): string {
    return relative(this.root, path).split(sep).join("/");
  }
}
