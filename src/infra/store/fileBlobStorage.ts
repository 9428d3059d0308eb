import { createHash, randomUUID } from "node:crypto";
import { Dirent, promises as fs } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { BlobStorage, PutPrecondition, StoredBlob } from "../../domain/blobStorage.js";
import { PreconditionFailedError } from "../../domain/errors.js";
import { delay } from "../../utils/retry.js";

const LOCK_POLL_MS = 10;

export interface FileBlobStorageOptions {
  /** How long a writer waits for another writer's lock on the same key. */
  lockTimeoutMs?: number;
  /** A lock file older than this is left over from a crashed writer and is removed. */
  staleLockMs?: number;
}

/**
 * Blob storage on a local or mounted directory. The generation of a blob is the SHA-256
 * of its bytes. Writes to one key hold an exclusive `<key>.lock` file for the
 * check-then-rename, so writers in other processes sharing the directory are excluded too.
 */
export class FileBlobStorage implements BlobStorage {
  private readonly rootDir: string;

  private readonly lockTimeoutMs: number;

  private readonly staleLockMs: number;

  private readonly writeChains = new Map<string, Promise<unknown>>();

  constructor(rootDir: string, options: FileBlobStorageOptions = {}) {
    this.rootDir = path.resolve(rootDir);
    this.lockTimeoutMs = options.lockTimeoutMs ?? 10_000;
    this.staleLockMs = options.staleLockMs ?? 60_000;
  }

  async get(key: string): Promise<StoredBlob | null> {
    try {
      const data = await fs.readFile(this.resolveKey(key));
      return { data, generation: generationOf(data) };
    } catch (error) {
      if (isFileMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(key: string, data: Buffer, precondition: PutPrecondition): Promise<string> {
    const targetPath = this.resolveKey(key);
    return this.enqueueWrite(key, () =>
      this.withLock(targetPath, async () => {
        const current = await this.get(key);
        if ((current?.generation ?? null) !== precondition.ifGeneration) {
          throw new PreconditionFailedError(key);
        }

        const tempPath = `${targetPath}.${randomUUID()}.tmp`;
        await fs.writeFile(tempPath, data);
        await replaceFileSafely(tempPath, targetPath, data);
        return generationOf(data);
      }),
    );
  }

  async delete(key: string): Promise<boolean> {
    const targetPath = this.resolveKey(key);
    return this.enqueueWrite(key, () =>
      this.withLock(targetPath, async () => {
        try {
          await fs.rm(targetPath);
          return true;
        } catch (error) {
          if (isFileMissing(error)) {
            return false;
          }
          throw error;
        }
      }),
    );
  }

  async list(prefix: string): Promise<string[]> {
    const directory = prefix.split("/").slice(0, -1).filter(Boolean);
    const keys: string[] = [];
    await this.collectKeys(directory, keys);
    return keys.filter((key) => key.startsWith(prefix)).sort();
  }

  async close(): Promise<void> {
    await Promise.allSettled([...this.writeChains.values()]);
  }

  private enqueueWrite<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writeChains.get(key) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.catch(() => undefined);
    this.writeChains.set(key, settled);
    void settled.then(() => {
      if (this.writeChains.get(key) === settled) {
        this.writeChains.delete(key);
      }
    });
    return next;
  }

  private async collectKeys(segments: string[], keys: string[]): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(path.join(this.rootDir, ...segments), { withFileTypes: true });
    } catch (error) {
      if (isFileMissing(error)) {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        await this.collectKeys([...segments, entry.name], keys);
      } else if (entry.isFile() && !entry.name.endsWith(".lock") && !entry.name.endsWith(".tmp")) {
        keys.push([...segments, entry.name].join("/"));
      }
    }
  }

  private async withLock<T>(targetPath: string, task: () => Promise<T>): Promise<T> {
    const lockPath = `${targetPath}.lock`;
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const lock = await this.acquireLock(lockPath);
    try {
      return await task();
    } finally {
      await lock.close();
      await fs.rm(lockPath, { force: true });
    }
  }

  private async acquireLock(lockPath: string): Promise<FileHandle> {
    const deadline = Date.now() + this.lockTimeoutMs;
    while (true) {
      try {
        return await fs.open(lockPath, "wx");
      } catch (error) {
        if (!isFileExisting(error)) {
          throw error;
        }
      }

      if (await this.removeStaleLock(lockPath)) {
        continue;
      }
      if (Date.now() >= deadline) {
        throw new Error(`Timed out after ${this.lockTimeoutMs}ms waiting for ${lockPath}.`);
      }
      await delay(LOCK_POLL_MS);
    }
  }

  private async removeStaleLock(lockPath: string): Promise<boolean> {
    try {
      const stats = await fs.stat(lockPath);
      if (Date.now() - stats.mtimeMs < this.staleLockMs) {
        return false;
      }
    } catch (error) {
      // Released between the open and the stat.
      if (isFileMissing(error)) {
        return true;
      }
      throw error;
    }
    await fs.rm(lockPath, { force: true });
    return true;
  }

  private resolveKey(key: string): string {
    const segments = key.split("/");
    if (segments.some((segment) => !segment || segment === "." || segment === "..")) {
      throw new Error(`Invalid blob key: ${key}`);
    }
    return path.join(this.rootDir, ...segments);
  }
}

function generationOf(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

function isFileMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function replaceFileSafely(tempPath: string, targetPath: string, data: Buffer): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, data);
  await fs.rm(tempPath, { force: true });
}

function isFileExisting(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

function isReplaceableRenameError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "EPERM" || error.code === "EEXIST" || error.code === "EBUSY";
}
