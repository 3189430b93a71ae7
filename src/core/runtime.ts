/**
 * Wires the engine's components from a loaded configuration.
 */

import { getServiceDefinitions } from "../config/resolver";
import type { LifeboatConfig } from "../types";
import { BackupStore } from "./backup/store";
import { RecoveryMonitor } from "./monitor/recovery-monitor";
import { type Extractor, RestoreEngine } from "./restore/engine";
import { GitVersionControl, type VersionControl } from "./rollback/version-control";
import { RollbackManager } from "./rollback/manager";
import { Watchdog } from "./scheduler/daemon";
import type { IntentExecutor } from "./services/executor";
import { ServiceRecovery } from "./services/orchestrator";
import type { PortProbe } from "./services/probe";

export interface RuntimeOverrides {
  now?: () => Date;
  probe?: PortProbe;
  executor?: IntentExecutor;
  sleep?: (ms: number) => Promise<unknown>;
  extractor?: Extractor;
  vcs?: VersionControl;
}

export interface Runtime {
  config: LifeboatConfig;
  store: BackupStore;
  restore: RestoreEngine;
  monitor: RecoveryMonitor;
  services: ServiceRecovery;
  rollback: RollbackManager;
  createWatchdog(): Watchdog;
}

export function createRuntime(config: LifeboatConfig, overrides: RuntimeOverrides = {}): Runtime {
  const { now } = overrides;

  const store = new BackupStore({
    backupDir: config.backup.dir,
    appRoot: config.appRoot,
    criticalPaths: config.backup.criticalPaths,
    retention: config.retention,
    prefix: config.backup.prefix,
    compression: config.backup.compression,
    exclude: config.backup.exclude,
    now,
  });

  const monitor = new RecoveryMonitor(store, {
    failureThreshold: config.monitor.failureThreshold,
    now,
  });

  const services = new ServiceRecovery(getServiceDefinitions(config), {
    probe: overrides.probe,
    executor: overrides.executor,
    sleep: overrides.sleep,
    now,
  });

  const rollback = new RollbackManager(
    overrides.vcs ?? new GitVersionControl(config.rollback.repoPath ?? config.appRoot),
    { now },
  );

  return {
    config,
    store,
    restore: new RestoreEngine(store, overrides.extractor),
    monitor,
    services,
    rollback,
    createWatchdog: () =>
      new Watchdog({
        store,
        monitor,
        services,
        intervalSeconds: config.monitor.intervalSeconds,
        schedule: config.backup.schedule,
        autoRestart: config.recovery.autoRestart,
      }),
  };
}
