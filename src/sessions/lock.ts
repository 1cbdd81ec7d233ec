/**
 * Session locks
 *
 * Advisory, file-based mutual exclusion between keel processes sharing a
 * session store. A lock is a file created with O_EXCL under <root>/locks/.
 * The holder rewrites its heartbeat on an interval; a lock whose heartbeat
 * is older than the staleness threshold belongs to a dead process and can
 * be reclaimed by the next acquirer.
 *
 * Acquisition never waits: contention is reported as busy immediately.
 */

import fs, { type FileHandle } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import crypto from "node:crypto";
import { z } from "zod";
import type { Logger, ILogObj } from "tslog";
import {
  BusyError,
  IOFailureError,
  errnoCode,
  toError,
  type LockHolder,
} from "../utils/errors.js";
import { ensureDir, getStringHash } from "../utils/files.js";
import { createChildLogger, getLogger } from "../utils/logger.js";
import { parseJsonSafe } from "../utils/validation.js";

export const DEFAULT_LOCK_STALE_MS = 30_000;
export const DEFAULT_HEARTBEAT_MS = 10_000;

const LockFileSchema = z.object({
  key: z.string(),
  token: z.string(),
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.string(),
  heartbeatAt: z.string(),
});

type LockFile = z.infer<typeof LockFileSchema>;

/**
 * What the lock file for a key currently says
 */
export type LockStatus =
  | { state: "free" }
  | { state: "live"; holder?: LockHolder }
  | { state: "stale"; holder?: LockHolder; token?: string };

/**
 * Outcome of a non-blocking acquire
 */
export type LockAttempt =
  | { status: "acquired"; lock: SessionLock }
  | { status: "busy"; holder?: LockHolder };

export interface SessionLockManagerOptions {
  /** Directory holding the lock files */
  lockDir: string;

  /** Heartbeat age after which a lock is considered abandoned */
  staleMs?: number;

  /** Heartbeat interval; 0 disables the timer */
  heartbeatMs?: number;

  logger?: Logger<ILogObj>;

  clock?: () => number;
}

/**
 * Lock key guarding the creation of live sessions for one project path
 */
export function projectLockKey(projectPath: string): string {
  return `project-${getStringHash(projectPath).slice(0, 16)}`;
}

function parseLockFile(content: string): LockFile | "invalid" {
  const json = parseJsonSafe(content);
  if (!json.ok) return "invalid";
  const parsed = LockFileSchema.safeParse(json.value);
  return parsed.success ? parsed.data : "invalid";
}

function toHolder(file: LockFile): LockHolder {
  return {
    pid: file.pid,
    hostname: file.hostname,
    acquiredAt: file.acquiredAt,
    heartbeatAt: file.heartbeatAt,
  };
}

/**
 * Exclusive access to one key, held by this process
 */
export class SessionLock {
  readonly key: string;
  readonly token: string;
  readonly path: string;

  private state: "held" | "released" | "lost" | "abandoned" = "held";
  private timer: NodeJS.Timeout | null = null;
  private inflight: Promise<boolean> | null = null;
  private readonly content: LockFile;
  private readonly manager: SessionLockManager;

  constructor(manager: SessionLockManager, content: LockFile, lockPath: string) {
    this.manager = manager;
    this.content = content;
    this.key = content.key;
    this.token = content.token;
    this.path = lockPath;
  }

  /** True while this process still owns the lock file */
  get held(): boolean {
    return this.state === "held";
  }

  /**
   * Throw BusyError unless the lock is still held
   */
  assertHeld(): void {
    if (this.state !== "held") {
      throw new BusyError(`Lock ${this.key} is no longer held (${this.state})`, { key: this.key });
    }
  }

  /** @internal */
  startHeartbeat(intervalMs: number, logger: Logger<ILogObj>): void {
    if (intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.refresh().catch((error: unknown) => {
        logger.warn(`Heartbeat for lock ${this.key} failed: ${String(error)}`);
      });
    }, intervalMs);
    this.timer.unref();
  }

  private stopHeartbeat(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Rewrite the heartbeat. Returns false when the lock was reclaimed by
   * another process in the meantime.
   */
  refresh(): Promise<boolean> {
    if (!this.inflight) {
      this.inflight = this.writeHeartbeat().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async writeHeartbeat(): Promise<boolean> {
    if (this.state !== "held") return false;

    const heartbeatAt = new Date(this.manager.now()).toISOString();
    const touched = await this.manager.touchLockFile(this.path, { ...this.content, heartbeatAt });
    if (this.state !== "held") return false;
    if (!touched) {
      this.state = "lost";
      this.stopHeartbeat();
      this.manager.logger.warn(`Lock ${this.key} was taken over by another process`);
      return false;
    }

    this.content.heartbeatAt = heartbeatAt;
    return true;
  }

  /**
   * Release the lock. Idempotent: releasing a released, lost or abandoned
   * lock does nothing.
   */
  async release(): Promise<void> {
    if (this.state !== "held") return;
    this.state = "released";
    this.stopHeartbeat();
    // A heartbeat in flight would otherwise rewrite the file after removal
    await this.inflight?.catch(() => false);

    const current = await this.manager.readLockFile(this.path);
    if (current === null || current === "invalid" || current.token !== this.token) {
      return;
    }

    try {
      await fs.rm(this.path, { force: true });
    } catch (error) {
      throw new IOFailureError(`Failed to release lock ${this.key}`, {
        path: this.path,
        operation: "lock",
        cause: toError(error),
      });
    }
  }

  /**
   * Stop heartbeating and forget the lock without removing its file, the
   * way a crashed process would. The file becomes reclaimable once stale.
   */
  abandon(): void {
    if (this.state !== "held") return;
    this.state = "abandoned";
    this.stopHeartbeat();
  }
}

/**
 * Creates and inspects lock files under one directory
 */
export class SessionLockManager {
  readonly lockDir: string;
  readonly staleMs: number;
  readonly heartbeatMs: number;
  /** @internal */
  readonly logger: Logger<ILogObj>;
  private readonly clock: () => number;

  constructor(options: SessionLockManagerOptions) {
    this.lockDir = options.lockDir;
    this.staleMs = options.staleMs ?? DEFAULT_LOCK_STALE_MS;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.logger = options.logger ?? createChildLogger(getLogger(), "lock");
    this.clock = options.clock ?? Date.now;
  }

  /** @internal */
  now(): number {
    return this.clock();
  }

  lockPath(key: string): string {
    return path.join(this.lockDir, `${key}.lock`);
  }

  /**
   * Try to take the lock for a key without waiting
   */
  async tryAcquire(key: string): Promise<LockAttempt> {
    await ensureDir(this.lockDir);
    const lockPath = this.lockPath(key);

    // One retry after removing a stale or vanished lock
    for (let attempt = 0; attempt < 2; attempt++) {
      const lock = await this.createLockFile(key, lockPath);
      if (lock) {
        lock.startHeartbeat(this.heartbeatMs, this.logger);
        this.logger.debug({ event: "lock.acquired", key });
        return { status: "acquired", lock };
      }

      const status = await this.inspect(key);
      if (status.state === "live") {
        return { status: "busy", holder: status.holder };
      }
      if (status.state === "stale") {
        const reclaimed = await this.reclaim(lockPath, status.token);
        if (!reclaimed) {
          return { status: "busy", holder: status.holder };
        }
        this.logger.warn(
          `Reclaimed stale lock ${key}` +
            (status.holder ? ` left by pid ${status.holder.pid} on ${status.holder.hostname}` : ""),
        );
      }
    }

    const status = await this.inspect(key);
    return { status: "busy", holder: status.state === "free" ? undefined : status.holder };
  }

  /**
   * Take the lock for a key or throw BusyError
   */
  async acquire(key: string): Promise<SessionLock> {
    const attempt = await this.tryAcquire(key);
    if (attempt.status === "busy") {
      throw new BusyError(`Session ${key} is locked by another process`, {
        key,
        holder: attempt.holder,
      });
    }
    return attempt.lock;
  }

  /**
   * Release a lock (idempotent)
   */
  release(lock: SessionLock): Promise<void> {
    return lock.release();
  }

  /**
   * Report whether a key is free, held by a live process, or stale
   */
  async inspect(key: string): Promise<LockStatus> {
    const lockPath = this.lockPath(key);
    const current = await this.readLockFile(lockPath);
    if (current === null) {
      return { state: "free" };
    }

    if (current === "invalid") {
      // A holder that died between create and write leaves an unreadable
      // file; fall back to its modification time.
      const mtime = await this.modifiedAt(lockPath);
      if (mtime === null) return { state: "free" };
      return this.now() - mtime > this.staleMs ? { state: "stale" } : { state: "live" };
    }

    const heartbeat = Date.parse(current.heartbeatAt);
    const holder = toHolder(current);
    if (Number.isNaN(heartbeat) || this.now() - heartbeat > this.staleMs) {
      return { state: "stale", holder, token: current.token };
    }
    return { state: "live", holder };
  }

  /**
   * True when a live holder has the key
   */
  async isLive(key: string): Promise<boolean> {
    return (await this.inspect(key)).state === "live";
  }

  /** @internal */
  async readLockFile(lockPath: string): Promise<LockFile | "invalid" | null> {
    let content: string;
    try {
      content = await fs.readFile(lockPath, "utf-8");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return null;
      throw new IOFailureError(`Failed to read lock ${lockPath}`, {
        path: lockPath,
        operation: "lock",
        cause: toError(error),
      });
    }
    return parseLockFile(content);
  }

  /**
   * Rewrite a lock file in place if it still carries the holder's token.
   * The file is never replaced by rename: a reclaimer may have moved it
   * aside and created a new one, and only the open inode is written.
   *
   * @internal
   */
  async touchLockFile(lockPath: string, content: LockFile): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await fs.open(lockPath, "r+");
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return false;
      throw new IOFailureError(`Failed to open lock ${lockPath}`, {
        path: lockPath,
        operation: "lock",
        cause: toError(error),
      });
    }

    try {
      const current = parseLockFile(await handle.readFile("utf-8"));
      if (current === "invalid" || current.token !== content.token) {
        return false;
      }

      const bytes = Buffer.from(JSON.stringify(content), "utf-8");
      await handle.write(bytes, 0, bytes.length, 0);
      await handle.truncate(bytes.length);
      await handle.sync();
      return true;
    } catch (error) {
      throw new IOFailureError(`Failed to refresh lock ${lockPath}`, {
        path: lockPath,
        operation: "lock",
        cause: toError(error),
      });
    } finally {
      await handle.close();
    }
  }

  private async modifiedAt(lockPath: string): Promise<number | null> {
    try {
      return (await fs.stat(lockPath)).mtimeMs;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return null;
      throw new IOFailureError(`Failed to stat lock ${lockPath}`, {
        path: lockPath,
        operation: "lock",
        cause: toError(error),
      });
    }
  }

  /**
   * Exclusive-create the lock file. Returns null if it already exists.
   */
  private async createLockFile(key: string, lockPath: string): Promise<SessionLock | null> {
    const now = new Date(this.now()).toISOString();
    const content: LockFile = {
      key,
      token: crypto.randomUUID(),
      pid: process.pid,
      hostname: os.hostname(),
      acquiredAt: now,
      heartbeatAt: now,
    };

    let handle: FileHandle;
    try {
      handle = await fs.open(lockPath, "wx", 0o644);
    } catch (error) {
      if (errnoCode(error) === "EEXIST") return null;
      throw new IOFailureError(`Failed to create lock ${lockPath}`, {
        path: lockPath,
        operation: "lock",
        cause: toError(error),
      });
    }

    try {
      await handle.writeFile(JSON.stringify(content), "utf-8");
      await handle.sync();
      await handle.close();
    } catch (error) {
      await handle.close().catch(() => undefined);
      await fs.rm(lockPath, { force: true }).catch(() => undefined);
      throw new IOFailureError(`Failed to write lock ${lockPath}`, {
        path: lockPath,
        operation: "lock",
        cause: toError(error),
      });
    }

    return new SessionLock(this, content, lockPath);
  }

  /**
   * Move a stale lock aside. Renaming is atomic, so of several processes
   * reclaiming the same file only one moves it. If the file moved turns out
   * not to be the stale one inspected (a new holder got in first), it is
   * linked back and the reclaim fails.
   */
  private async reclaim(lockPath: string, staleToken: string | undefined): Promise<boolean> {
    const tombstone = `${lockPath}.${process.pid}-${crypto.randomUUID()}.stale`;

    try {
      await fs.rename(lockPath, tombstone);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return true;
      throw new IOFailureError(`Failed to reclaim lock ${lockPath}`, {
        path: lockPath,
        operation: "lock",
        cause: toError(error),
      });
    }

    const moved = await this.readLockFile(tombstone);
    const movedToken = moved === null || moved === "invalid" ? undefined : moved.token;
    if (movedToken === staleToken) {
      await fs.rm(tombstone, { force: true });
      return true;
    }

    try {
      await fs.link(tombstone, lockPath);
    } catch (error) {
      if (errnoCode(error) !== "EEXIST") {
        this.logger.warn(`Could not restore lock ${lockPath}: ${String(error)}`);
      }
    }
    await fs.rm(tombstone, { force: true });
    return false;
  }
}

/**
 * Run fn while holding the creation guard for a project path
 */
export async function withProjectGuard<T>(
  locks: SessionLockManager,
  projectPath: string,
  fn: () => Promise<T>,
): Promise<T> {
  const guard = await locks.acquire(projectLockKey(projectPath));
  try {
    return await fn();
  } finally {
    await guard.release();
  }
}
