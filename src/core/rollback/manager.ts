/**
 * Version-control rollback
 *
 * A live rollback always branches the current HEAD first, so the state
 * being abandoned stays reachable.
 */

import type { Revision, RollbackResult } from "../../types";
import { scoped } from "../../utils/logger";
import { generateRollbackBranchName } from "../../utils/naming";
import type { VersionControl } from "./version-control";

const log = scoped("rollback");

export const DEFAULT_HISTORY_COUNT = 5;

export interface RollbackManagerOptions {
  now?: () => Date;
}

export interface RollbackOptions {
  dryRun?: boolean;
}

export class RollbackManager {
  private readonly results: RollbackResult[] = [];
  private readonly now: () => Date;

  constructor(
    private readonly vcs: VersionControl,
    options: RollbackManagerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Recent revisions, newest first. Empty when the history cannot be read.
   */
  async history(count: number = DEFAULT_HISTORY_COUNT): Promise<Revision[]> {
    try {
      const revisions = await this.vcs.listRevisions(count);
      return revisions.slice(0, count);
    } catch (error) {
      log.warn(`Could not read revision history: ${(error as Error).message}`);
      return [];
    }
  }

  async rollback(revision: string, options: RollbackOptions = {}): Promise<RollbackResult> {
    const dryRun = options.dryRun ?? true;
    const result = dryRun ? this.plan(revision) : await this.execute(revision);
    this.results.push(result);
    return result;
  }

  rollbackHistory(): RollbackResult[] {
    return [...this.results];
  }

  private plan(revision: string): RollbackResult {
    log.info(`[DRY RUN] Would roll back to ${revision}`);
    return {
      status: "planned",
      revision,
      dryRun: true,
      success: true,
      message: `Would execute: checkout ${revision}`,
      timestamp: this.now().toISOString(),
    };
  }

  private async execute(revision: string): Promise<RollbackResult> {
    const startedAt = this.now();
    const branch = generateRollbackBranchName(startedAt);
    let backupBranch: string | null = null;

    try {
      await this.vcs.createBranch(branch);
      backupBranch = branch;
      log.info(`Saved current state as branch ${branch}`);

      await this.vcs.checkout(revision);
      log.info(`Rolled back to ${revision}`);

      return {
        status: "rolled_back",
        revision,
        dryRun: false,
        success: true,
        backupBranch: branch,
        timestamp: startedAt.toISOString(),
      };
    } catch (error) {
      const message = (error as Error).message;
      log.error(`Rollback to ${revision} failed: ${message}`);
      return {
        status: "failed",
        revision,
        dryRun: false,
        success: false,
        backupBranch,
        error: message,
        timestamp: startedAt.toISOString(),
      };
    }
  }
}
