/**
 * Atomic, no-clobber file persistence for keys, graphs and signatures.
 *
 * Key design decisions:
 *   - Every write goes to a temp file in the destination directory first.
 *   - Without `overwrite`, the temp file is hard-linked into place, which
 *     fails with EEXIST if another writer got there first; with `overwrite`
 *     it is renamed over the destination. Either way no reader ever sees a
 *     half-written file.
 *   - Writers in the same process are serialized per destination path
 *     through a promise-based mutex; the lock is released on every exit path.
 *   - Multi-file writes stage every payload in a temp file before any
 *     destination changes. Replaced files are hard-linked to a backup first,
 *     so a failure part way through restores every destination as it was.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import { PersistenceError, TracemarkError, TracemarkErrorCode, parseJson } from '@tracemark/types';

// ─── Types ──────────────────────────────────────────────────────────────────────

/** Options for {@link writeFileAtomic} and {@link writeFilesAtomic}. */
export interface AtomicWriteOptions {
  /** Replace an existing destination. Defaults to false (fail fast). */
  overwrite?: boolean;
}

/** One destination of a {@link writeFilesAtomic} call. */
export interface FileWrite {
  path: string;
  data: string;
  /** File mode applied on creation, e.g. `0o600` for private keys. */
  mode?: number;
}

// ─── Path locks ─────────────────────────────────────────────────────────────────

const pathLocks = new Map<string, Promise<void>>();

/**
 * Run `fn` while holding the in-process lock for `filePath`. Callers for the
 * same path queue behind each other; different paths run concurrently.
 */
export async function withPathLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const key = path.resolve(filePath);
  const previous = pathLocks.get(key) ?? Promise.resolve();
  let release!: () => void;
  const current = new Promise<void>((r) => {
    release = r;
  });
  pathLocks.set(key, current);
  await previous;
  try {
    return await fn();
  } finally {
    release();
    if (pathLocks.get(key) === current) {
      pathLocks.delete(key);
    }
  }
}

/** Hold the locks for every path, taken in sorted order. */
async function withPathLocks<T>(paths: readonly string[], fn: () => Promise<T>): Promise<T> {
  const [first, ...rest] = paths;
  if (first === undefined) {
    return fn();
  }
  return withPathLock(first, () => withPathLocks(rest, fn));
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function fileExistsError(target: string): PersistenceError {
  return new PersistenceError(
    TracemarkErrorCode.PERSIST_FILE_EXISTS,
    `Refusing to overwrite existing file: ${target}`,
    {
      hint: 'Remove the file first or request an overwrite (--force).',
      context: { path: target },
    },
  );
}

function toPersistenceError(err: unknown, target: string): TracemarkError {
  if (err instanceof TracemarkError) {
    return err;
  }
  return new PersistenceError(
    TracemarkErrorCode.PERSIST_WRITE_FAILED,
    `Failed to write ${target}: ${err instanceof Error ? err.message : String(err)}`,
    { context: { path: target }, cause: err },
  );
}

function siblingPath(target: string, suffix: 'tmp' | 'bak'): string {
  return `${target}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2)}.${suffix}`;
}

/** Remove `paths`, ignoring failures. */
async function discard(paths: Iterable<string>): Promise<void> {
  await Promise.all([...paths].map((p) => fs.rm(p, { force: true }).catch(() => undefined)));
}

/** Whether anything exists at `filePath`. */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch (err: unknown) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return false;
    }
    throw err;
  }
}

async function writeUnlocked(target: string, data: string, mode: number | undefined, overwrite: boolean): Promise<void> {
  const tmp = siblingPath(target, 'tmp');
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    if (!overwrite && (await pathExists(target))) {
      throw fileExistsError(target);
    }
    await fs.writeFile(tmp, data, { encoding: 'utf-8', mode: mode ?? 0o644, flag: 'wx' });
    if (overwrite) {
      await fs.rename(tmp, target);
    } else {
      await fs.link(tmp, target).catch((err: unknown) => {
        throw errnoCode(err) === 'EEXIST' ? fileExistsError(target) : err;
      });
    }
  } catch (err) {
    throw toPersistenceError(err, target);
  } finally {
    await discard([tmp]);
  }
}

/** A destination this call has changed, with the link to its earlier contents. */
interface Commit {
  target: string;
  backup?: string;
}

/** Hard-link an existing regular file to a backup beside it. */
async function backUp(target: string): Promise<string> {
  const stat = await fs.lstat(target);
  if (!stat.isFile()) {
    throw new PersistenceError(TracemarkErrorCode.PERSIST_WRITE_FAILED, `Not a regular file: ${target}`, {
      hint: 'Move it aside or choose another path.',
      context: { path: target },
    });
  }
  const backup = siblingPath(target, 'bak');
  await fs.link(target, backup);
  return backup;
}

/** Undo `commits` newest first. Returns the destinations that could not be restored. */
async function undo(commits: readonly Commit[]): Promise<string[]> {
  const unrestored: string[] = [];
  for (const { target, backup } of [...commits].reverse()) {
    try {
      if (backup === undefined) {
        await fs.rm(target, { force: true });
      } else {
        await fs.rename(backup, target);
      }
    } catch {
      unrestored.push(target);
    }
  }
  return unrestored;
}

// ─── Public API ─────────────────────────────────────────────────────────────────

/**
 * Atomically write UTF-8 `data` to `filePath`, creating parent directories.
 *
 * @throws {PersistenceError} `PERSIST_FILE_EXISTS` when the destination exists
 *   and `overwrite` is not set; `PERSIST_WRITE_FAILED` for any I/O failure.
 *
 * @example
 * ```typescript
 * await writeFileAtomic('out/sig.json', JSON.stringify(doc, null, 2) + '\n');
 * ```
 */
export async function writeFileAtomic(
  filePath: string,
  data: string,
  options?: AtomicWriteOptions & { mode?: number },
): Promise<void> {
  const target = path.resolve(filePath);
  await withPathLock(target, () => writeUnlocked(target, data, options?.mode, options?.overwrite ?? false));
}

/**
 * Write several files as one unit. Every destination is checked and every
 * payload staged before the first destination changes; if a later step
 * fails, files this call created are removed and files it replaced get their
 * earlier contents back.
 *
 * @returns The absolute paths written, in order.
 * @throws {PersistenceError} `PERSIST_FILE_EXISTS` when a destination exists
 *   and `overwrite` is not set; `PERSIST_WRITE_FAILED` for any I/O failure.
 */
export async function writeFilesAtomic(files: FileWrite[], options?: AtomicWriteOptions): Promise<string[]> {
  const overwrite = options?.overwrite ?? false;
  const targets = files.map((f) => path.resolve(f.path));

  if (new Set(targets).size !== targets.length) {
    throw new PersistenceError(
      TracemarkErrorCode.PERSIST_WRITE_FAILED,
      'The same destination was given more than once',
      { context: { paths: targets } },
    );
  }

  return withPathLocks([...targets].sort(), async () => {
    const existed: boolean[] = [];
    for (const target of targets) {
      const exists = await pathExists(target);
      if (exists && !overwrite) {
        throw fileExistsError(target);
      }
      existed.push(exists);
    }

    const temps: string[] = [];
    const backups = new Map<string, string>();
    const commits: Commit[] = [];
    let current = '';
    try {
      for (let i = 0; i < files.length; i++) {
        const file = files[i]!;
        current = targets[i]!;
        await fs.mkdir(path.dirname(current), { recursive: true });
        const tmp = siblingPath(current, 'tmp');
        await fs.writeFile(tmp, file.data, { encoding: 'utf-8', mode: file.mode ?? 0o644, flag: 'wx' });
        temps.push(tmp);
      }

      for (let i = 0; i < files.length; i++) {
        current = targets[i]!;
        const tmp = temps[i]!;
        if (existed[i]) {
          const backup = await backUp(current);
          backups.set(current, backup);
          await fs.rename(tmp, current);
          commits.push({ target: current, backup });
        } else if (overwrite) {
          await fs.rename(tmp, current);
          commits.push({ target: current });
        } else {
          const target = current;
          await fs.link(tmp, target).catch((err: unknown) => {
            throw errnoCode(err) === 'EEXIST' ? fileExistsError(target) : err;
          });
          commits.push({ target });
        }
      }
    } catch (err) {
      const failure = toPersistenceError(err, current);
      const unrestored = await undo(commits);
      await discard([
        ...temps,
        ...[...backups].filter(([target]) => !unrestored.includes(target)).map(([, backup]) => backup),
      ]);
      if (unrestored.length === 0) {
        throw failure;
      }
      throw new PersistenceError(
        TracemarkErrorCode.PERSIST_WRITE_FAILED,
        `${failure.message}; could not restore ${unrestored.join(', ')}`,
        {
          hint: 'Earlier contents of replaced files are kept beside them with a .bak suffix.',
          context: { path: current, unrestored },
          cause: failure,
        },
      );
    }

    await discard([...temps, ...backups.values()]);
    return targets;
  });
}

/**
 * Read a UTF-8 text file.
 *
 * @throws {PersistenceError} `PERSIST_READ_FAILED` naming the path.
 */
export async function readTextFile(filePath: string): Promise<string> {
  const target = path.resolve(filePath);
  try {
    return await fs.readFile(target, 'utf-8');
  } catch (err: unknown) {
    const missing = errnoCode(err) === 'ENOENT';
    throw new PersistenceError(
      TracemarkErrorCode.PERSIST_READ_FAILED,
      missing ? `File not found: ${target}` : `Failed to read ${target}: ${err instanceof Error ? err.message : String(err)}`,
      { context: { path: target }, cause: err },
    );
  }
}

/**
 * Read and parse a JSON file. The value is returned unvalidated.
 *
 * @throws {PersistenceError} When the file cannot be read.
 * @throws {InputError} `INPUT_INVALID_JSON` naming the path.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  return parseJson(await readTextFile(filePath), filePath);
}

/** Pretty JSON with a trailing newline, the layout of every file Tracemark writes. */
export function toPrettyJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
