import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format";
import { hasExcludedSegment, isPathWithinDir } from "../../src/utils/path";

describe("formatBytes", () => {
  test("formats bytes", () => {
    expect(formatBytes(0)).toBe("0 B");
    expect(formatBytes(512)).toBe("512 B");
  });

  test("formats larger units with two decimals", () => {
    expect(formatBytes(1024)).toBe("1.00 KB");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(5 * 1024 * 1024)).toBe("5.00 MB");
  });
});

describe("formatDuration", () => {
  test("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.5s");
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});

describe("path utilities", () => {
  test("isPathWithinDir accepts the directory and its children", () => {
    expect(isPathWithinDir("/data/backups", "/data/backups")).toBe(true);
    expect(isPathWithinDir("/data/backups/a.tar.gz", "/data/backups")).toBe(true);
  });

  test("isPathWithinDir rejects siblings sharing a prefix and traversal", () => {
    expect(isPathWithinDir("/data/backups-old/a.tar.gz", "/data/backups")).toBe(false);
    expect(isPathWithinDir("/data/backups/../secret", "/data/backups")).toBe(false);
  });

  test("hasExcludedSegment matches whole segments only", () => {
    expect(hasExcludedSegment("app/node_modules/pkg/index.js", ["node_modules"])).toBe(true);
    expect(hasExcludedSegment("app/my_node_modules/x", ["node_modules"])).toBe(false);
    expect(hasExcludedSegment("app/src", [])).toBe(false);
  });
});
