/**
 * Sidecar metadata persistence
 */

import { readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { isPlainObject } from "../../config/defaults";
import type { BackupRecord } from "../../types";
import { metadataFileName } from "../../utils/naming";

export function metadataPath(backupDir: string, backupId: string): string {
  return path.join(backupDir, metadataFileName(backupId));
}

/**
 * Validate a parsed sidecar. Returns null for anything that is not a
 * complete record of a completed backup.
 */
export function parseMetadata(raw: unknown): BackupRecord | null {
  if (!isPlainObject(raw)) return null;

  const {
    backup_id,
    backup_type,
    timestamp,
    path: archivePath,
    size_bytes,
    checksum_sha256,
    files_included,
    status,
  } = raw;

  if (typeof backup_id !== "string" || backup_id.length === 0) return null;
  if (typeof backup_type !== "string") return null;
  if (typeof timestamp !== "string" || Number.isNaN(Date.parse(timestamp))) return null;
  if (typeof archivePath !== "string") return null;
  if (typeof size_bytes !== "number") return null;
  if (typeof checksum_sha256 !== "string") return null;
  if (!Array.isArray(files_included)) return null;

  const files: string[] = [];
  for (const file of files_included) {
    if (typeof file !== "string") return null;
    files.push(file);
  }

  // Only completed backups are ever written to disk
  if (status !== "completed") return null;

  return {
    backup_id,
    backup_type,
    timestamp,
    path: archivePath,
    size_bytes,
    checksum_sha256,
    files_included: files,
    status: "completed",
  };
}

export async function readMetadata(file: string): Promise<BackupRecord | null> {
  const content = await readFile(file, "utf8");
  return parseMetadata(JSON.parse(content));
}

export async function writeMetadata(backupDir: string, record: BackupRecord): Promise<string> {
  const file = metadataPath(backupDir, record.backup_id);
  await writeFile(file, `${JSON.stringify(record, null, 2)}\n`);
  return file;
}
