/**
 * Global (cross-process) reader/writer locks.
 *
 * Storages use these to guard shared external resources, such as a file
 * that several flows read and write from separate processes.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ON-DISK LAYOUT
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   <lockDir>/<id>/writer             exclusive holder (or claimant)
 *   <lockDir>/<id>/readers/<owner>    one file per shared holder
 *
 * Every file holds the pid of the process that created it. A file whose
 * process no longer exists is stale and is removed by the next contender;
 * a stale `writer` is first renamed to `writer.stale-<hex>` so a fresh
 * claim made in the meantime survives.
 *
 * Exclusive: create `writer` with O_EXCL, then wait for `readers/` to
 * drain. A claimed `writer` also stops new readers, so writers are not
 * starved.
 * Shared: wait until there is no `writer`, create a reader file, then
 * check once more; if a writer appeared meanwhile, back off and retry.
 */

import { createHash, randomBytes } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { config } from "../config/index.js";
import { LockError } from "../errors.js";

export type GLockMode = "exclusive" | "shared";

export interface GLockOptions {
  /** Directory holding lock state (default: BATCHFLOW_LOCK_DIR) */
  lockDir?: string;
  /** Delay between acquisition attempts */
  pollIntervalMs?: number;
  /** Give up with a LockError after this long; waits forever if unset */
  timeoutMs?: number;
}

export interface GLockHandle {
  readonly id: string;
  readonly mode: GLockMode;
  readonly released: boolean;
  /** Release the lock. Calling it again does nothing. */
  release(): Promise<void>;
}

const LOCK_ID_PATTERN = /^[A-Za-z0-9._-]+$/;
const DEFAULT_POLL_INTERVAL_MS = 50;

/**
 * Derive a lock id from a resource name (e.g. a file path) without
 * exposing the name on disk.
 */
export function lockIdFor(resource: string): string {
  return createHash("sha256").update(resource).digest("hex").slice(0, 32);
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function isProcessAlive(pid: number): boolean {
  if (pid === process.pid) return true;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === "EPERM";
  }
}

/**
 * Read the pid in an owner file: undefined when the file is missing, NaN
 * when its owner is between create and write.
 */
async function readOwner(path: string): Promise<number | undefined> {
  try {
    return Number.parseInt((await readFile(path, "utf8")).trim(), 10);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return undefined;
    throw err;
  }
}

function ownerAlive(pid: number): boolean {
  return Number.isNaN(pid) || isProcessAlive(pid);
}

/**
 * Remove a reader file if the process that wrote it is gone.
 * Returns whether the file is (still) present.
 */
async function pruneIfStale(path: string): Promise<boolean> {
  const pid = await readOwner(path);
  if (pid === undefined) return false;
  if (ownerAlive(pid)) return true;
  await rm(path, { force: true });
  return false;
}

/**
 * Remove the writer file if the process that wrote it is gone.
 *
 * Other contenders may replace a stale writer between our read and our
 * delete, so the file is renamed aside first and only deleted once the
 * moved copy is confirmed stale; a live claim is renamed back. A contender
 * that creates a new writer while a live claim is aside can still be
 * clobbered by the restore.
 */
async function pruneStaleWriter(path: string): Promise<boolean> {
  const pid = await readOwner(path);
  if (pid === undefined) return false;
  if (ownerAlive(pid)) return true;

  const aside = `${path}.stale-${randomBytes(4).toString("hex")}`;
  try {
    await rename(path, aside);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
  const moved = await readOwner(aside);
  if (moved !== undefined && ownerAlive(moved)) {
    await rename(aside, path);
    return true;
  }
  await rm(aside, { force: true });
  return false;
}

export class GLock {
  readonly id: string;
  readonly mode: GLockMode;

  private readonly root: string;
  private readonly readersDir: string;
  private readonly writerFile: string;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number | undefined;

  constructor(id: string, mode: GLockMode, options: GLockOptions = {}) {
    if (!LOCK_ID_PATTERN.test(id)) {
      throw new LockError(id, "lock ids may only contain letters, digits, '.', '_' and '-'");
    }
    if (options.timeoutMs !== undefined && options.timeoutMs < 0) {
      throw new LockError(id, `timeoutMs must not be negative, got: ${options.timeoutMs}`);
    }
    this.id = id;
    this.mode = mode;
    this.root = join(options.lockDir ?? config.lockDir, id);
    this.readersDir = join(this.root, "readers");
    this.writerFile = join(this.root, "writer");
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs;
  }

  async acquire(): Promise<GLockHandle> {
    try {
      await mkdir(this.readersDir, { recursive: true });
    } catch (err) {
      throw new LockError(this.id, `can't create lock directory ${this.root}`, { cause: err });
    }
    const deadline = this.timeoutMs === undefined ? Infinity : Date.now() + this.timeoutMs;
    const file =
      this.mode === "exclusive"
        ? await this.acquireExclusive(deadline)
        : await this.acquireShared(deadline);
    return this.handle(file);
  }

  private async acquireExclusive(deadline: number): Promise<string> {
    while (!(await this.tryCreate(this.writerFile))) {
      await pruneStaleWriter(this.writerFile);
      await this.pause(deadline);
    }
    try {
      while ((await this.liveReaders()).length > 0) {
        await this.pause(deadline);
      }
    } catch (err) {
      await rm(this.writerFile, { force: true });
      throw err;
    }
    return this.writerFile;
  }

  private async acquireShared(deadline: number): Promise<string> {
    const readerFile = join(
      this.readersDir,
      `${process.pid}-${randomBytes(4).toString("hex")}`
    );
    for (;;) {
      if (!(await pruneStaleWriter(this.writerFile))) {
        await writeFile(readerFile, `${process.pid}\n`, { flag: "wx" });
        if (!(await pruneStaleWriter(this.writerFile))) {
          return readerFile;
        }
        await rm(readerFile, { force: true });
      }
      await this.pause(deadline);
    }
  }

  private async tryCreate(path: string): Promise<boolean> {
    try {
      await writeFile(path, `${process.pid}\n`, { flag: "wx" });
      return true;
    } catch (err) {
      if (errorCode(err) === "EEXIST") return false;
      throw new LockError(this.id, `can't create ${path}`, { cause: err });
    }
  }

  private async liveReaders(): Promise<string[]> {
    const live: string[] = [];
    for (const name of await readdir(this.readersDir)) {
      if (await pruneIfStale(join(this.readersDir, name))) {
        live.push(name);
      }
    }
    return live;
  }

  private async pause(deadline: number): Promise<void> {
    if (Date.now() >= deadline) {
      throw new LockError(
        this.id,
        `timed out after ${this.timeoutMs}ms waiting for ${this.mode} access`
      );
    }
    await sleep(this.pollIntervalMs);
  }

  private handle(file: string): GLockHandle {
    const { id, mode } = this;
    let released = false;
    return {
      id,
      mode,
      get released() {
        return released;
      },
      async release() {
        if (released) return;
        released = true;
        await rm(file, { force: true });
      },
    };
  }
}

/**
 * Run `fn` while holding the lock; the lock is released however `fn` exits.
 */
export async function withGLock<T>(
  id: string,
  mode: GLockMode,
  fn: () => T | Promise<T>,
  options: GLockOptions = {}
): Promise<T> {
  const handle = await new GLock(id, mode, options).acquire();
  try {
    return await fn();
  } finally {
    await handle.release();
  }
}
