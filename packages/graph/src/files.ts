import * as path from 'path';

import { readTextFile, toPrettyJson, writeFilesAtomic, type AtomicWriteOptions } from '@tracemark/store';

import { parseTranscript } from './transcript';
import type { BuildResult, TranscriptEvent } from './types';

/** File name of the graph inside an output directory. */
export const GRAPH_FILE = 'sig.graph.json';

/** File name of the risk summary inside an output directory. */
export const SUMMARY_FILE = 'sig.summary.json';

/** Read and parse a JSON Lines transcript file. */
export async function readTranscriptFile(filePath: string): Promise<TranscriptEvent[]> {
  return parseTranscript(await readTextFile(filePath), filePath);
}

/**
 * Write `sig.graph.json` and `sig.summary.json` into `outDir` as one unit:
 * neither is written if either already exists (unless `overwrite`).
 *
 * @returns The two paths written.
 */
export async function writeBuildResult(
  outDir: string,
  result: BuildResult,
  options?: AtomicWriteOptions,
): Promise<{ graphPath: string; summaryPath: string }> {
  const graphPath = path.resolve(outDir, GRAPH_FILE);
  const summaryPath = path.resolve(outDir, SUMMARY_FILE);
  await writeFilesAtomic(
    [
      { path: graphPath, data: toPrettyJson(result.graph) },
      { path: summaryPath, data: toPrettyJson(result.summary) },
    ],
    options,
  );
  return { graphPath, summaryPath };
}
