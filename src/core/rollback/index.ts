export {
  DEFAULT_HISTORY_COUNT,
  RollbackManager,
  type RollbackManagerOptions,
  type RollbackOptions,
} from "./manager";
export {
  GitVersionControl,
  gitRun,
  type GitRunResult,
  parseRevisionLog,
  type VersionControl,
  VersionControlError,
} from "./version-control";
