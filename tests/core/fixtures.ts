import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { BackupStore, type BackupStoreOptions } from "../../src/core/backup";
import type { BackupOutcome, BackupRecord } from "../../src/types";

export const START = Date.parse("2024-01-01T00:00:00.000Z");
export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export interface Clock {
  now: () => Date;
  advance(ms: number): void;
}

export function createClock(start: number = START): Clock {
  let current = start;
  return {
    now: () => new Date(current),
    advance: (ms) => {
      current += ms;
    },
  };
}

export interface AppFixture {
  root: string;
  appRoot: string;
  backupDir: string;
}

/**
 * A small application tree:
 *   app/config/app.yaml
 *   app/data/app.db
 *   app/data/node_modules/pkg/index.js
 */
export async function createAppFixture(): Promise<AppFixture> {
  const root = await mkdtemp(path.join(os.tmpdir(), "lifeboat-test-"));
  const appRoot = path.join(root, "app");

  await mkdir(path.join(appRoot, "config"), { recursive: true });
  await mkdir(path.join(appRoot, "data", "node_modules", "pkg"), { recursive: true });
  await writeFile(path.join(appRoot, "config", "app.yaml"), "port: 8080\n");
  await writeFile(path.join(appRoot, "data", "app.db"), "rows v1");
  await writeFile(path.join(appRoot, "data", "node_modules", "pkg", "index.js"), "module");

  return { root, appRoot, backupDir: path.join(root, "backups") };
}

export function createStore(
  fixture: AppFixture,
  clock: Clock,
  overrides: Partial<BackupStoreOptions> = {},
): BackupStore {
  return new BackupStore({
    backupDir: fixture.backupDir,
    appRoot: fixture.appRoot,
    criticalPaths: ["config", "data", "missing.txt"],
    retention: { retentionDays: 7, maxBackups: 10 },
    exclude: ["node_modules"],
    now: clock.now,
    ...overrides,
  });
}

export function makeRecord(backupId: string, timestamp: string): BackupRecord {
  return {
    backup_id: backupId,
    backup_type: "full",
    timestamp,
    path: `/backups/${backupId}.tar.gz`,
    size_bytes: 100,
    checksum_sha256: "0".repeat(64),
    files_included: ["config"],
    status: "completed",
  };
}

/**
 * Unwrap a backup that is expected to succeed.
 */
export async function completed(outcome: Promise<BackupOutcome>): Promise<BackupRecord> {
  const result = await outcome;
  if (result.status === "failed") {
    throw new Error(`Backup failed: ${result.error}`);
  }
  return result;
}
