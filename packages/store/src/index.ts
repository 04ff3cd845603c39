/**
 * @tracemark/store - Persistence primitives for Tracemark artifacts.
 *
 * Atomic, no-clobber writes with per-path locking, multi-file writes that
 * never leave a partial set behind, and reads that name the failing path.
 *
 * @packageDocumentation
 */

export {
  writeFileAtomic,
  writeFilesAtomic,
  readTextFile,
  readJsonFile,
  toPrettyJson,
  pathExists,
  withPathLock,
} from './atomic-file';
export type { AtomicWriteOptions, FileWrite } from './atomic-file';
