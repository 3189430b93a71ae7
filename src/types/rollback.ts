/**
 * Version-control rollback types
 */

export interface Revision {
  revision: string;
  message: string;
  date: string;
}

export type RollbackResult =
  | {
      status: "planned";
      revision: string;
      dryRun: true;
      success: true;
      message: string;
      timestamp: string;
    }
  | {
      status: "rolled_back";
      revision: string;
      dryRun: false;
      success: true;
      backupBranch: string;
      timestamp: string;
    }
  | {
      status: "failed";
      revision: string;
      dryRun: false;
      success: false;
      /** Set when the safety branch was created before the failure */
      backupBranch: string | null;
      error: string;
      timestamp: string;
    };
