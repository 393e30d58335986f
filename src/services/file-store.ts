/**
 * File Store.
 *
 * Tracks every finished download under the managed directory and evicts
 * files once their retention window has passed.
 *
 * Design:
 * - Record table keyed by absolute path; updated only synchronously so no
 *   table access spans an await on file-system I/O
 * - A file already missing on disk counts as evicted; any other I/O error
 *   keeps the record for the next sweep
 * - rescan() rebuilds the table from disk after a restart
 */

import { mkdir, readdir, rm, rmdir, stat } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";

// ============================================================================
// Types
// ============================================================================

export interface FileRecord {
  path: string;
  ownerId: number | null;
  jobId: string | null;
  sizeBytes: number;
  createdAt: number;
  expiresAt: number;
}

export interface FileStoreConfig {
  /** Managed download directory */
  downloadDir: string;
  /** How long a registered file is kept */
  retentionMs: number;
  /** Ceiling on total tracked bytes (0 = unlimited) */
  maxStorageBytes?: number;
}

export interface SweepError {
  path: string;
  message: string;
}

export interface SweepResult {
  evicted: FileRecord[];
  errors: SweepError[];
}

export interface StorageUsage {
  totalBytes: number;
  fileCount: number;
}

export interface DirEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
}

/**
 * File system interface for dependency injection.
 */
export interface StoreFileSystem {
  remove(path: string): Promise<void>;
  removeEmptyDir(path: string): Promise<void>;
  readDir(path: string): Promise<DirEntry[]>;
  stat(path: string): Promise<{ size: number; mtimeMs: number }>;
  mkdir(path: string): Promise<void>;
}

/**
 * Default file system using node:fs.
 */
export const defaultStoreFileSystem: StoreFileSystem = {
  remove: (path) => rm(path),
  removeEmptyDir: (path) => rmdir(path),
  readDir: async (path) => {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      isFile: entry.isFile(),
      isDirectory: entry.isDirectory(),
    }));
  },
  stat: async (path) => {
    const info = await stat(path);
    return { size: info.size, mtimeMs: info.mtimeMs };
  },
  mkdir: async (path) => {
    await mkdir(path, { recursive: true });
  },
};

export const PARTIAL_SUFFIX = ".part";

// ============================================================================
// Path Utilities (pure functions)
// ============================================================================

/**
 * Sanitize a file name: strip directories, keep word characters, dots and dashes.
 */
export function sanitizeFilename(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? "";
  return base
    .replace(/[^\w.-]/g, "_")
    .replace(/^\.+/, "")
    .slice(0, 120);
}

/**
 * Directory holding one user's downloads.
 */
export function userDir(downloadDir: string, ownerId: number): string {
  return join(downloadDir, `user_${ownerId}`);
}

/**
 * Recover the owner from a path of the form <downloadDir>/user_<id>/...
 */
export function ownerFromPath(downloadDir: string, path: string): number | null {
  const rel = relative(resolve(downloadDir), resolve(path));
  const first = rel.split(sep)[0];
  const match = first?.match(/^user_(\d+)$/);
  return match ? parseInt(match[1], 10) : null;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, "ENOENT");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// File Store
// ============================================================================

export function createFileStore(
  config: FileStoreConfig,
  fs: StoreFileSystem = defaultStoreFileSystem,
  now: () => number = Date.now,
) {
  const records = new Map<string, FileRecord>();
  /** Paths currently being deleted by a sweep or cleanup */
  const evicting = new Set<string>();
  const rootDir = resolve(config.downloadDir);

  function register(
    owner: { jobId: string | null; ownerId: number | null },
    path: string,
    sizeBytes: number,
  ): FileRecord {
    const createdAt = now();
    const record: FileRecord = {
      path: resolve(path),
      ownerId: owner.ownerId,
      jobId: owner.jobId,
      sizeBytes,
      createdAt,
      expiresAt: createdAt + config.retentionMs,
    };
    records.set(record.path, record);
    return { ...record };
  }

  function get(path: string): FileRecord | null {
    const record = records.get(resolve(path));
    return record ? { ...record } : null;
  }

  function list(): FileRecord[] {
    return [...records.values()].map((record) => ({ ...record }));
  }

  function usage(): StorageUsage {
    let totalBytes = 0;
    for (const record of records.values()) {
      totalBytes += record.sizeBytes;
    }
    return { totalBytes, fileCount: records.size };
  }

  /**
   * Whether adding the given number of bytes stays under the storage ceiling.
   */
  function hasCapacityFor(estimatedBytes: number): boolean {
    const ceiling = config.maxStorageBytes ?? 0;
    if (ceiling <= 0) return true;
    return usage().totalBytes + estimatedBytes <= ceiling;
  }

  /**
   * Delete the given records' files, dropping each record once its file is gone.
   */
  async function evict(targets: FileRecord[]): Promise<SweepResult> {
    const evicted: FileRecord[] = [];
    const errors: SweepError[] = [];

    for (const record of targets) {
      try {
        await fs.remove(record.path);
      } catch (error) {
        if (!isNotFound(error)) {
          errors.push({ path: record.path, message: errorMessage(error) });
          console.error(`[files] Failed to delete ${record.path}: ${errorMessage(error)}`);
          evicting.delete(record.path);
          continue;
        }
      }

      evicting.delete(record.path);
      // A re-register during the delete replaced the record; keep the new one
      if (records.get(record.path) === record) {
        records.delete(record.path);
      }
      evicted.push({ ...record });
    }

    await removeEmptyUserDirs(evicted);
    return { evicted, errors };
  }

  function claim(predicate: (record: FileRecord) => boolean): FileRecord[] {
    const claimed: FileRecord[] = [];
    for (const record of records.values()) {
      if (evicting.has(record.path) || !predicate(record)) continue;
      evicting.add(record.path);
      claimed.push(record);
    }
    return claimed;
  }

  /**
   * Evict every file whose retention has expired at `at`.
   */
  async function sweep(at: number = now()): Promise<SweepResult> {
    const expired = claim((record) => record.expiresAt <= at);
    if (expired.length === 0) {
      return { evicted: [], errors: [] };
    }
    return await evict(expired);
  }

  /**
   * Evict every tracked file regardless of expiry. Returns the number removed.
   */
  async function forceCleanup(): Promise<number> {
    const result = await evict(claim(() => true));
    console.log(`[files] Force cleanup removed ${result.evicted.length} file(s)`);
    return result.evicted.length;
  }

  /**
   * Delete an untracked file (partial or abandoned output). Missing files are fine.
   */
  async function discard(path: string): Promise<void> {
    for (const target of [path, `${path}${PARTIAL_SUFFIX}`]) {
      try {
        await fs.remove(target);
      } catch (error) {
        if (!isNotFound(error)) {
          console.error(`[files] Failed to discard ${target}: ${errorMessage(error)}`);
        }
      }
    }
  }

  async function removeEmptyUserDirs(evicted: FileRecord[]): Promise<void> {
    const dirs = new Set<string>();
    for (const record of evicted) {
      if (record.ownerId !== null) {
        dirs.add(resolve(userDir(rootDir, record.ownerId)));
      }
    }

    for (const dir of dirs) {
      const stillUsed = [...records.keys()].some((path) => path.startsWith(dir + sep));
      if (stillUsed) continue;
      try {
        await fs.removeEmptyDir(dir);
      } catch (error) {
        // Non-empty (an in-flight download) or already gone
        if (!isNotFound(error) && !hasErrorCode(error, "ENOTEMPTY")) {
          console.warn(`[files] Could not remove directory ${dir}: ${errorMessage(error)}`);
        }
      }
    }
  }

  /**
   * Rebuild records from the download directory. Leftover partial files are deleted.
   * Returns the number of files now tracked.
   */
  async function rescan(): Promise<number> {
    await fs.mkdir(rootDir);

    const found: FileRecord[] = [];

    async function walk(dir: string): Promise<void> {
      for (const entry of await fs.readDir(dir)) {
        const path = join(dir, entry.name);
        if (entry.isDirectory) {
          await walk(path);
          continue;
        }
        if (!entry.isFile) continue;

        if (entry.name.endsWith(PARTIAL_SUFFIX)) {
          console.log(`[files] Removing leftover partial download ${path}`);
          await discard(path);
          continue;
        }

        try {
          const info = await fs.stat(path);
          found.push({
            path,
            ownerId: ownerFromPath(rootDir, path),
            jobId: null,
            sizeBytes: info.size,
            createdAt: Math.floor(info.mtimeMs),
            expiresAt: Math.floor(info.mtimeMs) + config.retentionMs,
          });
        } catch (error) {
          if (!isNotFound(error)) throw error;
        }
      }
    }

    await walk(rootDir);

    for (const record of found) {
      if (!records.has(record.path)) {
        records.set(record.path, record);
      }
    }

    console.log(`[files] Rescan found ${found.length} file(s) in ${rootDir}`);
    return records.size;
  }

  return {
    register,
    get,
    list,
    usage,
    hasCapacityFor,
    sweep,
    forceCleanup,
    discard,
    rescan,
  };
}

export type FileStore = ReturnType<typeof createFileStore>;
