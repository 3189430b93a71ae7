/**
 * Default configuration values
 */

export type PlainObject = Record<string, unknown>;

export const DEFAULT_CONFIG: PlainObject = {
  // version, backup.dir and backup.criticalPaths are intentionally NOT defaulted
  appRoot: ".",
  backup: {
    prefix: "lifeboat",
    compression: 6,
    exclude: ["node_modules", ".git", "__pycache__"],
  },
  retention: {
    retentionDays: 7,
    maxBackups: 10,
  },
  monitor: {
    failureThreshold: 3,
    intervalSeconds: 60,
  },
  recovery: {
    autoRestart: false,
  },
  services: {},
  rollback: {},
};

export const DEFAULT_HEALTH_PATH = "/";
export const DEFAULT_RESTART_DELAY = 5;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
