/**
 * Backup store: archives plus sidecar metadata in one directory.
 *
 * The directory is the only durable index. Everything `listBackups()`
 * returns is re-derived from the `*_metadata.json` files on each call.
 */

import { access, mkdir, readdir, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type {
  BackupKind,
  BackupOutcome,
  BackupRecord,
  CleanupResult,
  FailedBackup,
  RecoveryStatus,
  RetentionPolicy,
} from "../../types";
import { computeFileChecksum, verifyFileChecksum } from "../../utils/crypto";
import { formatBytes } from "../../utils/format";
import { scoped } from "../../utils/logger";
import {
  archiveFileName,
  DEFAULT_PREFIX,
  generateBackupId,
  isSafeBackupId,
  isValidBackupKind,
  METADATA_SUFFIX,
} from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";
import { SerialQueue } from "../../utils/serial-queue";
import { createArchive } from "./archive";
import { metadataPath, readMetadata, writeMetadata } from "./metadata";
import { getCleanupCandidates, sortNewestFirst } from "./retention";

const log = scoped("store");

export interface CreateBackupOptions {
  /** Backup ids the retention pass after this backup must not delete */
  protect?: string[];
}

export interface BackupStoreOptions {
  backupDir: string;
  /** Critical paths are resolved against this directory */
  appRoot: string;
  criticalPaths: string[];
  retention: RetentionPolicy;
  prefix?: string;
  compression?: number;
  exclude?: string[];
  /** Clock used for backup ids, timestamps and retention cutoffs */
  now?: () => Date;
}

export class BackupStore {
  private readonly queue = new SerialQueue();
  private readonly points: BackupRecord[] = [];
  private readonly now: () => Date;

  constructor(private readonly options: BackupStoreOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get backupDir(): string {
    return this.options.backupDir;
  }

  get appRoot(): string {
    return this.options.appRoot;
  }

  get retention(): RetentionPolicy {
    return { ...this.options.retention };
  }

  /**
   * Archive every existing critical path, stamp the checksum, write the
   * sidecar, then apply retention. Missing paths are skipped. Failures come
   * back as a `failed` outcome with nothing left on disk.
   */
  createBackup(kind: BackupKind = "full", options: CreateBackupOptions = {}): Promise<BackupOutcome> {
    return this.queue.run(async () => {
      const outcome = await this.writeBackup(kind, this.now());
      if (outcome.status === "failed") {
        return outcome;
      }

      this.points.push(outcome);
      log.info(
        `Backup created: ${outcome.backup_id} (${formatBytes(outcome.size_bytes)}, ${outcome.files_included.length} path(s))`,
      );

      // The new backup is never pruned by its own retention pass
      try {
        await this.applyRetention([...(options.protect ?? []), outcome.backup_id]);
      } catch (error) {
        log.error(`Retention pass after ${outcome.backup_id} failed: ${(error as Error).message}`);
      }

      return outcome;
    });
  }

  async verifyBackup(backupId: string): Promise<boolean> {
    const record = await this.getBackup(backupId);
    if (!record) {
      log.warn(`Backup metadata not found: ${backupId}`);
      return false;
    }

    if (!(await exists(record.path))) {
      log.warn(`Backup archive not found: ${record.path}`);
      return false;
    }

    const valid = await verifyFileChecksum(record.path, record.checksum_sha256);
    if (valid) {
      log.info(`Backup verified: ${backupId}`);
    } else {
      log.error(`Checksum mismatch for ${backupId}`);
    }
    return valid;
  }

  async getBackup(backupId: string): Promise<BackupRecord | null> {
    if (!isSafeBackupId(backupId)) {
      return null;
    }

    const file = metadataPath(this.backupDir, backupId);
    if (!(await exists(file))) {
      return null;
    }

    try {
      return await readMetadata(file);
    } catch (error) {
      log.warn(`Unreadable metadata ${file}: ${(error as Error).message}`);
      return null;
    }
  }

  async listBackups(): Promise<BackupRecord[]> {
    let names: string[];
    try {
      names = await readdir(this.backupDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const backups: BackupRecord[] = [];
    for (const name of names.filter((n) => n.endsWith(METADATA_SUFFIX))) {
      const file = path.join(this.backupDir, name);
      try {
        const record = await readMetadata(file);
        if (record) {
          backups.push(record);
        } else {
          log.warn(`Skipping malformed metadata: ${file}`);
        }
      } catch (error) {
        log.warn(`Skipping unreadable metadata ${file}: ${(error as Error).message}`);
      }
    }

    return sortNewestFirst(backups);
  }

  /**
   * Apply the retention policy now. Runs automatically after every backup.
   */
  cleanup(): Promise<CleanupResult> {
    return this.queue.run(() => this.applyRetention());
  }

  async recoveryStatus(): Promise<RecoveryStatus> {
    const backups = await this.listBackups();

    return {
      status: backups.length > 0 ? "healthy" : "no_backups",
      totalBackups: backups.length,
      latestBackup: backups[0] ?? null,
      oldestBackup: backups[backups.length - 1] ?? null,
      backupDir: this.backupDir,
      retention: this.retention,
      lastChecked: this.now().toISOString(),
    };
  }

  /**
   * Records created by this instance that have not been pruned since.
   */
  recoveryPoints(): BackupRecord[] {
    return [...this.points];
  }

  /**
   * Run a task with the directory to itself, e.g. an extraction that must
   * not overlap a backup.
   */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.queue.run(task);
  }

  private async applyRetention(protect: string[] = []): Promise<CleanupResult> {
    const backups = await this.listBackups();
    const candidates = getCleanupCandidates(backups, this.options.retention, this.now()).filter(
      ({ backup }) => !protect.includes(backup.backup_id),
    );

    const result: CleanupResult = {
      totalChecked: backups.length,
      totalDeleted: 0,
      deletions: [],
    };

    for (const { backup, reason } of candidates) {
      try {
        await this.deleteBackup(backup);
        result.totalDeleted++;
        result.deletions.push({ backupId: backup.backup_id, reason, success: true });
        log.info(`Cleaned up old backup: ${backup.backup_id} (${reason})`);
      } catch (error) {
        const message = (error as Error).message;
        result.deletions.push({ backupId: backup.backup_id, reason, success: false, error: message });
        log.error(`Failed to clean up ${backup.backup_id}: ${message}`);
      }
    }

    return result;
  }

  private async deleteBackup(backup: BackupRecord): Promise<void> {
    if (!isSafeBackupId(backup.backup_id)) {
      throw new Error(`Backup id "${backup.backup_id}" is not a safe file name - REFUSING TO DELETE`);
    }
    if (!isPathWithinDir(backup.path, this.backupDir)) {
      throw new Error(
        `Archive "${backup.path}" is outside the backup directory - REFUSING TO DELETE`,
      );
    }

    await rm(backup.path, { force: true });
    await rm(metadataPath(this.backupDir, backup.backup_id), { force: true });

    const index = this.points.findIndex((p) => p.backup_id === backup.backup_id);
    if (index !== -1) {
      this.points.splice(index, 1);
    }
  }

  private async writeBackup(kind: BackupKind, createdAt: Date): Promise<BackupOutcome> {
    const timestamp = createdAt.toISOString();
    const fail = (backupId: string | null, error: string): FailedBackup => {
      log.error(`Backup failed: ${error}`);
      return { backup_id: backupId, backup_type: kind, timestamp, status: "failed", error };
    };

    if (!isValidBackupKind(kind)) {
      return fail(null, `Invalid backup type: "${kind}"`);
    }

    let backupId: string;
    try {
      await mkdir(this.backupDir, { recursive: true });
      backupId = await this.nextBackupId(kind, createdAt);
    } catch (error) {
      return fail(null, `Cannot use backup directory ${this.backupDir}: ${(error as Error).message}`);
    }

    const archivePath = path.join(this.backupDir, archiveFileName(backupId));
    const included = await this.existingCriticalPaths();
    log.debug(`Archiving ${included.length} path(s) for ${backupId}`);

    try {
      await createArchive({
        cwd: this.appRoot,
        entries: included,
        file: archivePath,
        compression: this.options.compression,
        exclude: this.options.exclude,
        ignoreDir: this.backupDir,
      });

      // Only after the archive is closed
      const { size } = await stat(archivePath);
      const checksum = await computeFileChecksum(archivePath);

      const record: BackupRecord = {
        backup_id: backupId,
        backup_type: kind,
        timestamp,
        path: archivePath,
        size_bytes: size,
        checksum_sha256: checksum,
        files_included: included,
        status: "completed",
      };

      await writeMetadata(this.backupDir, record);
      return record;
    } catch (error) {
      await this.discardPartial(backupId);
      return fail(backupId, `Failed to write archive ${archivePath}: ${(error as Error).message}`);
    }
  }

  /**
   * First id for this kind and second with neither an archive nor a sidecar.
   */
  private async nextBackupId(kind: BackupKind, createdAt: Date): Promise<string> {
    const prefix = this.options.prefix ?? DEFAULT_PREFIX;
    for (let sequence = 1; ; sequence++) {
      const backupId = generateBackupId(kind, createdAt, prefix, sequence);
      const taken =
        (await exists(path.join(this.backupDir, archiveFileName(backupId)))) ||
        (await exists(metadataPath(this.backupDir, backupId)));
      if (!taken) return backupId;
    }
  }

  private async discardPartial(backupId: string): Promise<void> {
    try {
      await rm(path.join(this.backupDir, archiveFileName(backupId)), { force: true });
      await rm(metadataPath(this.backupDir, backupId), { force: true });
    } catch (error) {
      log.warn(`Could not remove partial backup ${backupId}: ${(error as Error).message}`);
    }
  }

  private async existingCriticalPaths(): Promise<string[]> {
    const included: string[] = [];

    for (const entry of this.options.criticalPaths) {
      const absolute = path.resolve(this.appRoot, entry);
      if (!isPathWithinDir(absolute, this.appRoot)) {
        log.warn(`Critical path escapes the application root, skipping: ${entry}`);
        continue;
      }
      if (await exists(absolute)) {
        included.push(entry);
      } else {
        log.debug(`Critical path does not exist, skipping: ${entry}`);
      }
    }

    return included;
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
