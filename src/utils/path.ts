/**
 * Path validation utilities
 */

import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) ||
    normalizedPath === normalizedDir
  );
}

/**
 * True when any segment of a (relative) entry path is in the excluded set.
 */
export function hasExcludedSegment(entryPath: string, excluded: readonly string[]): boolean {
  if (excluded.length === 0) return false;
  return entryPath.split(/[\\/]+/).some((segment) => excluded.includes(segment));
}
