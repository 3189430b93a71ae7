import { describe, expect, test } from "vitest";
import {
  archiveFileName,
  formatCompactTimestamp,
  generateBackupId,
  generateRollbackBranchName,
  isSafeBackupId,
  isValidBackupKind,
  metadataFileName,
} from "../../src/utils/naming";

const DATE = new Date("2024-03-05T07:08:09.123Z");

describe("naming utilities", () => {
  describe("formatCompactTimestamp", () => {
    test("formats as UTC YYYYMMDD_HHMMSS", () => {
      expect(formatCompactTimestamp(DATE)).toBe("20240305_070809");
    });
  });

  describe("generateBackupId", () => {
    test("joins prefix, kind and timestamp", () => {
      expect(generateBackupId("full", DATE)).toBe("lifeboat_full_20240305_070809");
    });

    test("uses a custom prefix", () => {
      expect(generateBackupId("pre_restore", DATE, "app")).toBe(
        "app_pre_restore_20240305_070809",
      );
    });

    test("appends the sequence number from the second backup on", () => {
      expect(generateBackupId("full", DATE, "lifeboat", 1)).toBe("lifeboat_full_20240305_070809");
      expect(generateBackupId("full", DATE, "lifeboat", 2)).toBe(
        "lifeboat_full_20240305_070809_2",
      );
    });
  });

  describe("isValidBackupKind", () => {
    test("accepts lowercase kinds with underscores and hyphens", () => {
      expect(isValidBackupKind("full")).toBe(true);
      expect(isValidBackupKind("pre_restore")).toBe(true);
      expect(isValidBackupKind("pre-deploy")).toBe(true);
    });

    test("rejects empty, uppercase and path-like kinds", () => {
      expect(isValidBackupKind("")).toBe(false);
      expect(isValidBackupKind("Full")).toBe(false);
      expect(isValidBackupKind("../x")).toBe(false);
      expect(isValidBackupKind("_full")).toBe(false);
    });
  });

  describe("isSafeBackupId", () => {
    test("accepts generated ids", () => {
      expect(isSafeBackupId("lifeboat_full_20240305_070809")).toBe(true);
    });

    test("rejects traversal and separators", () => {
      expect(isSafeBackupId("../etc/passwd")).toBe(false);
      expect(isSafeBackupId("a/b")).toBe(false);
      expect(isSafeBackupId("a..b")).toBe(false);
      expect(isSafeBackupId("")).toBe(false);
    });
  });

  describe("file names", () => {
    test("derives archive and metadata names from the id", () => {
      expect(archiveFileName("lifeboat_full_20240305_070809")).toBe(
        "lifeboat_full_20240305_070809.tar.gz",
      );
      expect(metadataFileName("lifeboat_full_20240305_070809")).toBe(
        "lifeboat_full_20240305_070809_metadata.json",
      );
    });
  });

  describe("generateRollbackBranchName", () => {
    test("embeds the timestamp and a short random suffix", () => {
      expect(generateRollbackBranchName(DATE)).toMatch(/^pre_rollback_20240305_070809_[a-z0-9]{6}$/);
    });

    test("differs between calls in the same second", () => {
      expect(generateRollbackBranchName(DATE)).not.toBe(generateRollbackBranchName(DATE));
    });
  });
});
