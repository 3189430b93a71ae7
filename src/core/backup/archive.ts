/**
 * tar.gz creation and extraction
 */

import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import { extract, Pack } from "tar";
import { hasExcludedSegment, isPathWithinDir } from "../../utils/path";

export interface CreateArchiveOptions {
  /** Directory entry names are relative to */
  cwd: string;
  /** Relative paths to add, files or directories */
  entries: string[];
  /** Destination .tar.gz */
  file: string;
  compression?: number;
  /** Path segment names to leave out */
  exclude?: string[];
  /** Absolute directory never to descend into (the backup directory itself) */
  ignoreDir?: string;
}

/**
 * Write a gzip-compressed tar. Resolves once the file is closed, so the
 * archive on disk is final when this returns. An empty entry list still
 * produces a valid (empty) archive.
 */
export async function createArchive(options: CreateArchiveOptions): Promise<void> {
  const exclude = options.exclude ?? [];
  const { cwd, ignoreDir } = options;

  const pack = new Pack({
    cwd,
    gzip: { level: options.compression ?? 6 },
    portable: true,
    filter: (entryPath: string) =>
      !hasExcludedSegment(entryPath, exclude) &&
      !(ignoreDir && isPathWithinDir(path.resolve(cwd, entryPath), ignoreDir)),
  });
  const output = createWriteStream(options.file);

  const written = new Promise<void>((resolve, reject) => {
    output.on("close", () => resolve());
    output.on("error", reject);
    pack.on("error", reject);
  });

  pack.pipe(output);
  for (const entry of options.entries) {
    pack.add(entry);
  }
  pack.end();

  await written;
}

/**
 * Extract a .tar.gz into `targetDir`. Absolute paths and `..` entries are
 * stripped by tar.
 */
export async function extractArchive(file: string, targetDir: string): Promise<void> {
  await mkdir(targetDir, { recursive: true });
  await extract({ file, cwd: targetDir });
}
