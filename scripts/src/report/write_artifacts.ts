import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import { dirname, join, resolve } from "node:path";

import fsExtra from "fs-extra";

import type { ArtifactFile } from "lib/report/types.js";

import { DEFAULT_LOCK_STALE_MS, LOCK_FILE_NAME } from "../constants.js";
import { errorCode, removeIfExists, writeTextFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";

const TEMP_INFIX = ".tmp-";
const BACKUP_INFIX = ".bak-";
const STALE_INFIX = ".stale-";

/**
 * The output location could not be written. Nothing from the failed run is
 * left visible: earlier artifacts are restored before this is thrown.
 */
export class WriteFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WriteFailure";
  }
}

export interface WriteOptions {
  /** Directory artifact paths are resolved against; the lock lives here. */
  root: string;
  lockStaleMs?: number;
}

export interface WriteResult {
  written: string[];
}

interface OutputLock {
  path: string;
  release(): Promise<void>;
}

interface StagedFile {
  target: string;
  temp: string;
  content: string;
}

interface CommittedFile {
  target: string;
  backup: string | null;
}

export async function writeArtifactsAtomically(
  files: readonly ArtifactFile[],
  options: WriteOptions
): Promise<WriteResult> {
  const root = resolve(options.root);
  try {
    await fsExtra.ensureDir(root);
  } catch (error) {
    throw new WriteFailure(`Output root ${root} is not writable: ${describe(error)}`, { cause: error });
  }

  const lock = await acquireOutputLock(root, options.lockStaleMs ?? DEFAULT_LOCK_STALE_MS);
  try {
    return await commitFiles(root, files);
  } finally {
    await lock.release();
  }
}

export async function acquireOutputLock(root: string, staleMs: number): Promise<OutputLock> {
  const lockPath = join(root, LOCK_FILE_NAME);

  for (let attempt = 0; attempt < 2; attempt += 1) {
    try {
      const handle = await fs.open(lockPath, "wx");
      try {
        await handle.writeFile(`${process.pid}\n`, "utf8");
      } finally {
        await handle.close();
      }
      logger.debug("Acquired output lock", { lockPath });
      return {
        path: lockPath,
        release: async () => {
          await removeIfExists(lockPath);
          logger.debug("Released output lock", { lockPath });
        }
      };
    } catch (error) {
      if (errorCode(error) !== "EEXIST") {
        throw new WriteFailure(`Unable to create lock ${lockPath}: ${describe(error)}`, { cause: error });
      }
      if (attempt > 0 || !(await isStale(lockPath, staleMs)) || !(await breakStaleLock(lockPath, staleMs))) {
        throw new WriteFailure(`Output root ${root} is locked by another run (${lockPath})`, { cause: error });
      }
    }
  }

  throw new WriteFailure(`Unable to acquire lock ${lockPath}`);
}

/**
 * Moves a stale lock aside under a unique name before deleting it, so a lock
 * another run created in the meantime is never removed. Returns whether the
 * caller may retry the exclusive create.
 */
async function breakStaleLock(lockPath: string, staleMs: number): Promise<boolean> {
  const claimed = `${lockPath}${STALE_INFIX}${randomUUID()}`;
  try {
    await fs.rename(lockPath, claimed);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      // Already gone; the exclusive create decides who gets it next.
      return true;
    }
    throw new WriteFailure(`Unable to break stale lock ${lockPath}: ${describe(error)}`, { cause: error });
  }

  if (!(await isStale(claimed, staleMs))) {
    // Lost a race: the file moved aside is a fresh lock. Put it back unless yet another run holds the name.
    try {
      await fs.link(claimed, lockPath);
    } catch (error) {
      logger.warn("Could not restore a live output lock", { lockPath, error: describe(error) });
    }
    await removeIfExists(claimed);
    return false;
  }

  logger.warn("Removed stale output lock", { lockPath, staleMs });
  await removeIfExists(claimed);
  return true;
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const info = await fs.stat(lockPath);
    return Date.now() - info.mtimeMs > staleMs;
  } catch (error) {
    // Released between our open() and stat(): treat as stale so the retry takes it.
    if (errorCode(error) === "ENOENT") {
      return true;
    }
    throw new WriteFailure(`Unable to inspect lock ${lockPath}: ${describe(error)}`, { cause: error });
  }
}

async function commitFiles(root: string, files: readonly ArtifactFile[]): Promise<WriteResult> {
  const token = randomUUID();
  const staged: StagedFile[] = files.map((file) => {
    const target = resolve(root, file.path);
    return { target, temp: `${target}${TEMP_INFIX}${token}`, content: file.content };
  });
  const committed: CommittedFile[] = [];
  const backups: string[] = [];

  try {
    // Temp files sit beside their targets so every rename stays on one device.
    for (const file of staged) {
      await fsExtra.ensureDir(dirname(file.target));
      await writeTextFile(file.temp, file.content);
    }

    for (const file of staged) {
      let backup: string | null = null;
      if (await fsExtra.pathExists(file.target)) {
        backup = `${file.target}${BACKUP_INFIX}${token}`;
        backups.push(backup);
        await fsExtra.copy(file.target, backup);
      }
      await fs.rename(file.temp, file.target);
      committed.push({ target: file.target, backup });
    }

    return { written: committed.map((entry) => entry.target) };
  } catch (error) {
    await rollback(committed);
    throw new WriteFailure(`Failed to write artifacts under ${root}: ${describe(error)}`, { cause: error });
  } finally {
    await Promise.all([...staged.map((file) => file.temp), ...backups].map((path) => removeIfExists(path)));
  }
}

async function rollback(committed: readonly CommittedFile[]): Promise<void> {
  for (const entry of [...committed].reverse()) {
    try {
      if (entry.backup) {
        await fs.rename(entry.backup, entry.target);
      } else {
        await removeIfExists(entry.target);
      }
    } catch (error) {
      logger.error("Failed to roll back artifact", { target: entry.target, error: describe(error) });
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
