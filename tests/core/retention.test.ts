import { describe, expect, test } from "vitest";
import { getCleanupCandidates, sortNewestFirst } from "../../src/core/backup";
import { parseMetadata } from "../../src/core/backup/metadata";
import { makeRecord } from "./fixtures";

const NOW = new Date("2024-01-10T00:00:00.000Z");

describe("sortNewestFirst", () => {
  test("orders by timestamp descending without mutating the input", () => {
    const input = [
      makeRecord("b1", "2024-01-01T00:00:00.000Z"),
      makeRecord("b3", "2024-01-03T00:00:00.000Z"),
      makeRecord("b2", "2024-01-02T00:00:00.000Z"),
    ];

    expect(sortNewestFirst(input).map((b) => b.backup_id)).toEqual(["b3", "b2", "b1"]);
    expect(input.map((b) => b.backup_id)).toEqual(["b1", "b3", "b2"]);
  });

  test("breaks timestamp ties by id", () => {
    const input = [
      makeRecord("a", "2024-01-01T00:00:00.000Z"),
      makeRecord("b", "2024-01-01T00:00:00.000Z"),
    ];

    expect(sortNewestFirst(input).map((b) => b.backup_id)).toEqual(["b", "a"]);
  });

  test("compares sequence suffixes as numbers", () => {
    const input = [
      makeRecord("lifeboat_full_20240101_000000_9", "2024-01-01T00:00:00.000Z"),
      makeRecord("lifeboat_full_20240101_000000", "2024-01-01T00:00:00.000Z"),
      makeRecord("lifeboat_full_20240101_000000_10", "2024-01-01T00:00:00.000Z"),
    ];

    expect(sortNewestFirst(input).map((b) => b.backup_id)).toEqual([
      "lifeboat_full_20240101_000000_10",
      "lifeboat_full_20240101_000000_9",
      "lifeboat_full_20240101_000000",
    ]);
  });
});

describe("getCleanupCandidates", () => {
  test("keeps everything inside both limits", () => {
    const backups = [
      makeRecord("b1", "2024-01-09T00:00:00.000Z"),
      makeRecord("b2", "2024-01-08T00:00:00.000Z"),
    ];

    expect(getCleanupCandidates(backups, { retentionDays: 7, maxBackups: 10 }, NOW)).toEqual([]);
  });

  test("deletes beyond maxBackups with reason retention_count", () => {
    const backups = [
      makeRecord("b1", "2024-01-09T00:00:00.000Z"),
      makeRecord("b2", "2024-01-08T00:00:00.000Z"),
      makeRecord("b3", "2024-01-07T00:00:00.000Z"),
    ];

    const candidates = getCleanupCandidates(backups, { retentionDays: 7, maxBackups: 2 }, NOW);

    expect(candidates.map((c) => [c.backup.backup_id, c.reason])).toEqual([
      ["b3", "retention_count"],
    ]);
  });

  test("deletes backups at or past the age cutoff with reason retention_days", () => {
    const backups = [
      makeRecord("fresh", "2024-01-09T00:00:00.000Z"),
      makeRecord("edge", "2024-01-03T00:00:00.000Z"),
      makeRecord("old", "2024-01-01T00:00:00.000Z"),
    ];

    const candidates = getCleanupCandidates(backups, { retentionDays: 7, maxBackups: 10 }, NOW);

    expect(candidates.map((c) => [c.backup.backup_id, c.reason])).toEqual([
      ["edge", "retention_days"],
      ["old", "retention_days"],
    ]);
  });

  test("beyond maxBackups the reason is retention_count even when also too old", () => {
    const backups = [
      makeRecord("new", "2024-01-09T00:00:00.000Z"),
      makeRecord("second", "2024-01-08T00:00:00.000Z"),
      makeRecord("ancient", "2023-12-01T00:00:00.000Z"),
    ];

    const candidates = getCleanupCandidates(backups, { retentionDays: 7, maxBackups: 2 }, NOW);

    expect(candidates.map((c) => [c.backup.backup_id, c.reason])).toEqual([
      ["ancient", "retention_count"],
    ]);
  });

  test("a backup within maxBackups is still deleted once older than retentionDays", () => {
    const backups = [
      makeRecord("new", "2024-01-09T00:00:00.000Z"),
      makeRecord("stale", "2024-01-01T00:00:00.000Z"),
    ];

    const candidates = getCleanupCandidates(backups, { retentionDays: 7, maxBackups: 2 }, NOW);

    expect(candidates.map((c) => [c.backup.backup_id, c.reason])).toEqual([
      ["stale", "retention_days"],
    ]);
  });

  test("maxBackups of zero deletes everything", () => {
    const backups = [makeRecord("b1", "2024-01-09T00:00:00.000Z")];

    expect(
      getCleanupCandidates(backups, { retentionDays: 7, maxBackups: 0 }, NOW).map(
        (c) => c.reason,
      ),
    ).toEqual(["retention_count"]);
  });
});

describe("parseMetadata", () => {
  test("accepts a complete record", () => {
    const record = makeRecord("lifeboat_full_20240101_000000", "2024-01-01T00:00:00.000Z");
    expect(parseMetadata(JSON.parse(JSON.stringify(record)))).toEqual(record);
  });

  test("rejects records with missing or mistyped fields", () => {
    const record = makeRecord("lifeboat_full_20240101_000000", "2024-01-01T00:00:00.000Z");

    expect(parseMetadata({ ...record, size_bytes: "100" })).toBeNull();
    expect(parseMetadata({ ...record, timestamp: "yesterday" })).toBeNull();
    expect(parseMetadata({ ...record, files_included: [1] })).toBeNull();
    expect(parseMetadata({ ...record, status: "unknown" })).toBeNull();
    expect(parseMetadata({ ...record, status: "failed" })).toBeNull();
    expect(parseMetadata([record])).toBeNull();
    expect(parseMetadata(null)).toBeNull();
  });
});
