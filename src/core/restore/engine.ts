/**
 * Restore engine
 *
 * verify -> pre_restore safety backup -> extract. The safety backup is
 * unconditional once verification passes, so every restore has an undo
 * point. A failed extraction is not rolled back; the pre_restore backup is
 * the way back.
 */

import type { RestoreResult } from "../../types";
import { scoped } from "../../utils/logger";
import { extractArchive } from "../backup/archive";
import type { BackupStore } from "../backup/store";

const log = scoped("restore");

export type Extractor = (archivePath: string, targetDir: string) => Promise<void>;

export class RestoreEngine {
  constructor(
    private readonly store: BackupStore,
    private readonly extractor: Extractor = extractArchive,
  ) {}

  async restore(backupId: string, targetDir?: string): Promise<RestoreResult> {
    if (!(await this.store.verifyBackup(backupId))) {
      log.error(`Refusing to restore unverified backup: ${backupId}`);
      return { success: false, backupId, reason: "verification_failed" };
    }

    const record = await this.store.getBackup(backupId);
    const target = targetDir ?? this.store.appRoot;
    if (!record) {
      // Verified a moment ago; only a concurrent delete gets here
      return { success: false, backupId, reason: "verification_failed" };
    }

    const safety = await this.store.createBackup("pre_restore", { protect: [backupId] });
    if (safety.status === "failed") {
      log.error(`Pre-restore backup failed, not restoring ${backupId}: ${safety.error}`);
      return {
        success: false,
        backupId,
        reason: "safety_backup_failed",
        error: safety.error,
        preRestoreBackupId: null,
        target,
      };
    }
    const preRestoreBackupId = safety.backup_id;
    log.info(`Created pre-restore backup: ${preRestoreBackupId}`);

    try {
      await this.store.exclusive(() => this.extractor(record.path, target));
    } catch (error) {
      const message = (error as Error).message;
      log.error(`Restore failed: ${message}`);
      return {
        success: false,
        backupId,
        reason: "extraction_failed",
        error: message,
        preRestoreBackupId,
        target,
      };
    }

    log.info(`Restored ${backupId} into ${target}`);
    return { success: true, backupId, preRestoreBackupId, target };
  }
}
