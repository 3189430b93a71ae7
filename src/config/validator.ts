/**
 * Configuration validation
 */

import * as path from "node:path";
import { parseCron } from "../core/scheduler/cron-parser";
import type { LifeboatConfig } from "../types";
import { isPlainObject, type PlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: PlainObject) => void;

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function section(c: PlainObject, name: string): PlainObject {
  const value = c[name];
  if (!isPlainObject(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  appRoot: (c) => {
    if (!c.appRoot || typeof c.appRoot !== "string") {
      throw new ConfigError("appRoot must be a string");
    }
  },

  backup: (c) => {
    const backup = section(c, "backup");

    if (!backup.dir || typeof backup.dir !== "string") {
      throw new ConfigError("backup.dir must be a string");
    }

    if (!Array.isArray(backup.criticalPaths)) {
      throw new ConfigError("backup.criticalPaths must be an array of paths");
    }
    backup.criticalPaths.forEach((entry: unknown, i: number) => {
      if (!entry || typeof entry !== "string") {
        throw new ConfigError(`backup.criticalPaths[${i}] must be a string`);
      }
      if (path.isAbsolute(entry) || entry.split(/[\\/]+/).includes("..")) {
        throw new ConfigError(
          `backup.criticalPaths[${i}] must be relative to appRoot and stay inside it: "${entry}"`,
        );
      }
    });

    if (
      backup.prefix !== undefined &&
      (typeof backup.prefix !== "string" || !/^[a-z][a-z0-9-]*$/.test(backup.prefix))
    ) {
      throw new ConfigError(
        "backup.prefix must be lowercase letters, digits or hyphens, starting with a letter",
      );
    }

    if (
      backup.compression !== undefined &&
      (!isNonNegativeInteger(backup.compression) ||
        backup.compression < 1 ||
        backup.compression > 9)
    ) {
      throw new ConfigError("backup.compression must be an integer between 1 and 9");
    }

    if (backup.exclude !== undefined) {
      if (
        !Array.isArray(backup.exclude) ||
        !backup.exclude.every((e: unknown) => typeof e === "string")
      ) {
        throw new ConfigError("backup.exclude must be an array of strings");
      }
    }

    if (backup.schedule !== undefined) {
      if (typeof backup.schedule !== "string") {
        throw new ConfigError("backup.schedule must be a cron expression string");
      }
      try {
        parseCron(backup.schedule);
      } catch (error) {
        throw new ConfigError(`backup.schedule is invalid: ${(error as Error).message}`);
      }
    }
  },

  retention: (c) => {
    const retention = section(c, "retention");
    if (!isNonNegativeInteger(retention.retentionDays)) {
      throw new ConfigError("retention.retentionDays must be a non-negative integer");
    }
    if (!isNonNegativeInteger(retention.maxBackups)) {
      throw new ConfigError("retention.maxBackups must be a non-negative integer");
    }
  },

  monitor: (c) => {
    const monitor = section(c, "monitor");
    if (!isNonNegativeInteger(monitor.failureThreshold) || monitor.failureThreshold < 1) {
      throw new ConfigError("monitor.failureThreshold must be a positive integer");
    }
    if (typeof monitor.intervalSeconds !== "number" || monitor.intervalSeconds <= 0) {
      throw new ConfigError("monitor.intervalSeconds must be a positive number");
    }
  },

  recovery: (c) => {
    const recovery = section(c, "recovery");
    if (typeof recovery.autoRestart !== "boolean") {
      throw new ConfigError("recovery.autoRestart must be a boolean");
    }
  },

  services: (c) => {
    const services = section(c, "services");
    for (const [name, service] of Object.entries(services)) {
      validateService(name, service);
    }
  },

  rollback: (c) => {
    const rollback = section(c, "rollback");
    if (rollback.repoPath !== undefined && typeof rollback.repoPath !== "string") {
      throw new ConfigError("rollback.repoPath must be a string");
    }
  },
};

function validateService(name: string, service: unknown): void {
  if (!isPlainObject(service)) {
    throw new ConfigError(`services.${name} must be an object`);
  }

  const port = service.port;
  if (!isNonNegativeInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`services.${name}.port must be a TCP port (1-65535)`);
  }

  if (!service.startCommand || typeof service.startCommand !== "string") {
    throw new ConfigError(`services.${name}.startCommand must be a string`);
  }

  if (service.healthPath !== undefined && typeof service.healthPath !== "string") {
    throw new ConfigError(`services.${name}.healthPath must be a string`);
  }

  if (
    service.restartDelay !== undefined &&
    (typeof service.restartDelay !== "number" || service.restartDelay < 0)
  ) {
    throw new ConfigError(`services.${name}.restartDelay must be a non-negative number`);
  }
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is LifeboatConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
