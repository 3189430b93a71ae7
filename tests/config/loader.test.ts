import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, test, vi } from "vitest";
import {
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  getServiceDefinitions,
  loadConfig,
} from "../../src/config/loader";

const VALID_YAML = `
version: "1.0"
appRoot: ./app
backup:
  dir: ./backups
  criticalPaths:
    - config
    - data/app.db
retention:
  retentionDays: 3
  maxBackups: 5
services:
  api:
    port: 8080
    startCommand: node api/server.js
    healthPath: /health
  worker:
    port: 9090
    startCommand: node worker.js
`;

describe("config loader", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "lifeboat-config-test-"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  async function writeConfig(name: string, content: string): Promise<string> {
    const configPath = path.join(tempDir, name);
    await writeFile(configPath, content);
    return configPath;
  }

  describe("loadConfig", () => {
    test("loads valid YAML and resolves paths against the config directory", async () => {
      const configPath = await writeConfig("valid.yaml", VALID_YAML);

      const config = await loadConfig(configPath);

      expect(config.version).toBe("1.0");
      expect(config.appRoot).toBe(path.join(tempDir, "app"));
      expect(config.backup.dir).toBe(path.join(tempDir, "backups"));
      expect(config.backup.criticalPaths).toEqual(["config", "data/app.db"]);
      expect(config.rollback.repoPath).toBe(path.join(tempDir, "app"));
    });

    test("fills defaults for omitted sections", async () => {
      const configPath = await writeConfig("defaults.yaml", VALID_YAML);

      const config = await loadConfig(configPath);

      expect(config.retention).toEqual({ retentionDays: 3, maxBackups: 5 });
      expect(config.monitor).toEqual({ failureThreshold: 3, intervalSeconds: 60 });
      expect(config.recovery).toEqual({ autoRestart: false });
      expect(config.backup.prefix).toBe("lifeboat");
      expect(config.backup.compression).toBe(6);
      expect(config.backup.exclude).toEqual(["node_modules", ".git", "__pycache__"]);
    });

    test("loads valid JSON config", async () => {
      const configPath = await writeConfig(
        "valid.json",
        JSON.stringify({
          version: "1.0",
          backup: { dir: "/var/backups/app", criticalPaths: ["."] },
        }),
      );

      const config = await loadConfig(configPath);

      expect(config.appRoot).toBe(tempDir);
      expect(config.backup.dir).toBe("/var/backups/app");
      expect(config.services).toEqual({});
    });

    test("throws ConfigError for a missing file", async () => {
      await expect(loadConfig(path.join(tempDir, "missing.yaml"))).rejects.toThrow(ConfigError);
    });

    test("throws ConfigError for invalid YAML", async () => {
      const configPath = await writeConfig("broken.yaml", "version: [unclosed");
      await expect(loadConfig(configPath)).rejects.toThrow("Failed to parse YAML");
    });

    test("rejects unsupported extensions", async () => {
      const configPath = await writeConfig("config.toml", "version = 1");
      await expect(loadConfig(configPath)).rejects.toThrow("Unsupported config file format: .toml");
    });

    test("requires a version", async () => {
      const configPath = await writeConfig(
        "no-version.yaml",
        "backup:\n  dir: ./b\n  criticalPaths: []\n",
      );
      await expect(loadConfig(configPath)).rejects.toThrow("Config must have a 'version' field");
    });

    test("rejects critical paths that escape the application root", async () => {
      const configPath = await writeConfig(
        "escape.yaml",
        'version: "1.0"\nbackup:\n  dir: ./b\n  criticalPaths:\n    - ../etc\n',
      );
      await expect(loadConfig(configPath)).rejects.toThrow(
        'backup.criticalPaths[0] must be relative to appRoot and stay inside it: "../etc"',
      );
    });

    test("rejects a zero failure threshold", async () => {
      const configPath = await writeConfig(
        "threshold.yaml",
        'version: "1.0"\nbackup:\n  dir: ./b\n  criticalPaths: []\nmonitor:\n  failureThreshold: 0\n',
      );
      await expect(loadConfig(configPath)).rejects.toThrow(
        "monitor.failureThreshold must be a positive integer",
      );
    });

    test("rejects an invalid service port", async () => {
      const configPath = await writeConfig(
        "port.yaml",
        'version: "1.0"\nbackup:\n  dir: ./b\n  criticalPaths: []\nservices:\n  api:\n    port: 70000\n    startCommand: run\n',
      );
      await expect(loadConfig(configPath)).rejects.toThrow(
        "services.api.port must be a TCP port (1-65535)",
      );
    });

    test("rejects an invalid backup schedule", async () => {
      const configPath = await writeConfig(
        "schedule.yaml",
        'version: "1.0"\nbackup:\n  dir: ./b\n  criticalPaths: []\n  schedule: "every hour"\n',
      );
      await expect(loadConfig(configPath)).rejects.toThrow("backup.schedule is invalid");
    });
  });

  describe("getServiceDefinitions", () => {
    test("fills health path and restart delay defaults", async () => {
      const config = await loadConfig(await writeConfig("services.yaml", VALID_YAML));

      expect(getServiceDefinitions(config)).toEqual([
        {
          name: "api",
          port: 8080,
          startCommand: "node api/server.js",
          healthPath: "/health",
          restartDelay: 5,
        },
        {
          name: "worker",
          port: 9090,
          startCommand: "node worker.js",
          healthPath: "/",
          restartDelay: 5,
        },
      ]);
    });
  });

  describe("findConfigFile", () => {
    test("finds lifeboat.config.yaml in a directory", async () => {
      const dir = path.join(tempDir, "find");
      await mkdir(dir, { recursive: true });
      await writeFile(path.join(dir, "lifeboat.config.yaml"), VALID_YAML);

      expect(findConfigFile(dir)).toBe(path.join(dir, "lifeboat.config.yaml"));
    });

    test("returns null when no config file exists", async () => {
      const dir = path.join(tempDir, "empty");
      await mkdir(dir, { recursive: true });

      expect(findConfigFile(dir)).toBeNull();
    });
  });

  describe("findAndLoadConfig", () => {
    test("loads the file named by LIFEBOAT_CONFIG", async () => {
      const configPath = await writeConfig("from-env.yaml", VALID_YAML);
      vi.stubEnv("LIFEBOAT_CONFIG", configPath);

      const config = await findAndLoadConfig();

      expect(config.backup.dir).toBe(path.join(tempDir, "backups"));
    });

    test("an explicit path wins over LIFEBOAT_CONFIG", async () => {
      vi.stubEnv("LIFEBOAT_CONFIG", path.join(tempDir, "missing.yaml"));
      const configPath = await writeConfig("explicit.yaml", VALID_YAML);

      const config = await findAndLoadConfig(configPath);

      expect(config.version).toBe("1.0");
    });
  });
});
