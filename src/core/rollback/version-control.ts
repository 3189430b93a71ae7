/**
 * Git CLI wrapper
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Revision } from "../../types";

const execFileAsync = promisify(execFile);

// Unit separator keeps commit subjects intact
const FIELD_SEPARATOR = "\x1f";

export interface VersionControl {
  /** Newest first */
  listRevisions(count: number): Promise<Revision[]>;
  createBranch(name: string): Promise<void>;
  checkout(revision: string): Promise<void>;
}

export class VersionControlError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null = null,
  ) {
    super(message);
    this.name = "VersionControlError";
  }
}

export interface GitRunResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run a git command in `cwd` and return the result
 */
export async function gitRun(cwd: string, args: string[]): Promise<GitRunResult> {
  try {
    const { stdout, stderr } = await execFileAsync("git", args, { cwd });
    return { success: true, stdout: stdout.trim(), stderr: stderr.trim(), exitCode: 0 };
  } catch (error) {
    // execFile rejects on non-zero exit codes with the output attached
    if (error && typeof error === "object" && "code" in error && typeof error.code === "number") {
      const stdout = "stdout" in error ? String(error.stdout) : "";
      const stderr = "stderr" in error ? String(error.stderr) : "";
      return { success: false, stdout: stdout.trim(), stderr: stderr.trim(), exitCode: error.code };
    }
    throw error;
  }
}

export function parseRevisionLog(output: string): Revision[] {
  return output
    .split("\n")
    .filter((line) => line.trim() !== "")
    .map((line) => {
      const [revision = "", message = "", date = ""] = line.split(FIELD_SEPARATOR);
      return { revision, message, date };
    });
}

export class GitVersionControl implements VersionControl {
  constructor(readonly repoPath: string) {}

  async listRevisions(count: number): Promise<Revision[]> {
    const stdout = await this.run([
      "log",
      `-n${count}`,
      "--pretty=format:%H%x1f%s%x1f%aI",
    ]);
    return parseRevisionLog(stdout);
  }

  async createBranch(name: string): Promise<void> {
    await this.run(["branch", name]);
  }

  async checkout(revision: string): Promise<void> {
    if (revision.startsWith("-")) {
      throw new VersionControlError(`Invalid revision: "${revision}"`);
    }
    await this.run(["checkout", revision]);
  }

  private async run(args: string[]): Promise<string> {
    let result: GitRunResult;
    try {
      result = await gitRun(this.repoPath, args);
    } catch (error) {
      throw new VersionControlError(`git ${args[0]} failed: ${(error as Error).message}`);
    }

    if (!result.success) {
      throw new VersionControlError(
        `git ${args[0]} failed: ${result.stderr || `exit code ${result.exitCode}`}`,
        result.exitCode,
      );
    }
    return result.stdout;
  }
}
