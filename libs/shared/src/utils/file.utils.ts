import {
  writeFileSync,
  renameSync,
  mkdirSync,
  readFileSync,
  unlinkSync,
  existsSync,
  openSync,
  closeSync,
  statSync,
  constants,
} from 'fs';
import { join, dirname } from 'path';
import { randomUUID } from 'crypto';

const STALE_LOCK_MS = 60000;
const LOCK_RETRY_MS = 100;

/**
 * Atomic JSON file write using write-then-rename pattern.
 * Readers never see a partially written store.
 */
export function atomicWriteJson(filePath: string, data: unknown): void {
  const dir = dirname(filePath);
  mkdirSync(dir, { recursive: true });

  const tmpPath = join(dir, `.tmp-${randomUUID()}`);
  writeFileSync(tmpPath, JSON.stringify(data, null, 2), 'utf8');

  try {
    renameSync(tmpPath, filePath);
  } catch {
    // Windows: rename fails when target exists
    if (existsSync(filePath)) unlinkSync(filePath);
    renameSync(tmpPath, filePath);
  }
}

/**
 * Read and parse a JSON file. Returns null if the file doesn't exist or is invalid.
 */
export function readJsonFile<T>(filePath: string): T | null {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf8');
  } catch {
    return null;
  }
  try {
    return JSON.parse(content) as T;
  } catch {
    return null;
  }
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

/**
 * File-based lock guarding read-modify-write cycles on the store.
 * Uses O_CREAT | O_EXCL so two writers can't both win.
 */
export class FileLock {
  readonly lockPath: string;

  constructor(targetPath: string) {
    this.lockPath = `${targetPath}.lock`;
  }

  async acquire(timeoutMs: number = 5000): Promise<void> {
    const start = Date.now();
    mkdirSync(dirname(this.lockPath), { recursive: true });
    while (true) {
      try {
        const fd = openSync(
          this.lockPath,
          constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY,
        );
        writeFileSync(fd, String(process.pid), 'utf8');
        closeSync(fd);
        return;
      } catch (e: unknown) {
        if (!isErrnoException(e) || e.code !== 'EEXIST') throw e;

        // Stale lock: force-release if older than 60s
        try {
          const stat = statSync(this.lockPath);
          if (Date.now() - stat.mtimeMs > STALE_LOCK_MS) {
            unlinkSync(this.lockPath);
            continue;
          }
        } catch {
          // Released between open and stat
          continue;
        }

        if (Date.now() - start > timeoutMs) {
          throw new Error(`Lock acquisition timeout: ${this.lockPath}`);
        }
        await new Promise((r) => setTimeout(r, LOCK_RETRY_MS));
      }
    }
  }

  release(): void {
    try {
      unlinkSync(this.lockPath);
    } catch {
      /* already deleted */
    }
  }

  /** Runs `fn` while holding the lock. */
  async withLock<T>(fn: () => T | Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
