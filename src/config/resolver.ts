/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { LifeboatConfig, ServiceDefinition } from "../types";
import { DEFAULT_HEALTH_PATH, DEFAULT_RESTART_DELAY } from "./defaults";

/**
 * Resolve relative paths against the config file's directory.
 * Critical paths stay relative: they are archive entry names under appRoot.
 */
export function resolvePaths(config: LifeboatConfig, configPath: string): LifeboatConfig {
  const configDir = path.dirname(path.resolve(configPath));
  const appRoot = path.resolve(configDir, config.appRoot);

  return {
    ...config,
    appRoot,
    backup: {
      ...config.backup,
      dir: path.resolve(configDir, config.backup.dir),
    },
    rollback: {
      ...config.rollback,
      repoPath: path.resolve(configDir, config.rollback.repoPath ?? appRoot),
    },
  };
}

/**
 * Expand the service section into registry entries, filling defaults.
 */
export function getServiceDefinitions(config: LifeboatConfig): ServiceDefinition[] {
  return Object.entries(config.services).map(([name, service]) => ({
    name,
    port: service.port,
    startCommand: service.startCommand,
    healthPath: service.healthPath ?? DEFAULT_HEALTH_PATH,
    restartDelay: service.restartDelay ?? DEFAULT_RESTART_DELAY,
  }));
}
