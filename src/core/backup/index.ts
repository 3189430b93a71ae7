/**
 * Backup store exports
 */

export { type CreateArchiveOptions, createArchive, extractArchive } from "./archive";
export { metadataPath, parseMetadata, readMetadata, writeMetadata } from "./metadata";
export { getCleanupCandidates, sortNewestFirst } from "./retention";
export {
  BackupStore,
  type BackupStoreOptions,
  type CreateBackupOptions,
} from "./store";
