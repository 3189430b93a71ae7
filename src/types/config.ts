/**
 * Configuration type definitions for Lifeboat
 */

import type { RetentionPolicy } from "./backup";

export interface BackupConfig {
  /** Directory holding archives and their sidecar metadata */
  dir: string;
  prefix?: string;
  /** gzip level 1-9 */
  compression?: number;
  /** Paths relative to appRoot */
  criticalPaths: string[];
  /** Path segment names left out of archives */
  exclude?: string[];
  /** Cron expression for scheduled backups in the watchdog */
  schedule?: string;
}

export interface MonitorConfig {
  failureThreshold: number;
  intervalSeconds: number;
}

export interface RecoveryConfig {
  /** Run the playbook live (instead of dry-run) when recovery triggers */
  autoRestart: boolean;
}

export interface ServiceConfig {
  port: number;
  startCommand: string;
  healthPath?: string;
  restartDelay?: number;
}

export interface RollbackConfig {
  /** Defaults to appRoot */
  repoPath?: string;
}

export interface LifeboatConfig {
  version: string;
  appRoot: string;
  backup: BackupConfig;
  retention: RetentionPolicy;
  monitor: MonitorConfig;
  recovery: RecoveryConfig;
  services: Record<string, ServiceConfig>;
  rollback: RollbackConfig;
}
