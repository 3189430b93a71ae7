/**
 * Intent execution: the only place a start command actually runs.
 */

import { spawn } from "node:child_process";
import type { RestartIntent } from "../../types";
import { scoped } from "../../utils/logger";

const log = scoped("executor");

export interface IntentExecutor {
  execute(intent: RestartIntent): Promise<void>;
}

/**
 * Launches the start command through the shell, detached, and returns once
 * the process has spawned. Supervising it afterwards is not our job.
 */
export class ShellIntentExecutor implements IntentExecutor {
  constructor(private readonly cwd?: string) {}

  execute(intent: RestartIntent): Promise<void> {
    if (intent.mode !== "live") {
      return Promise.reject(
        new Error(`Refusing to execute ${intent.mode} intent for ${intent.service}`),
      );
    }

    log.info(`Starting ${intent.service}: ${intent.command}`);

    return new Promise((resolve, reject) => {
      const child = spawn(intent.command, {
        cwd: this.cwd,
        shell: true,
        detached: true,
        stdio: "ignore",
      });

      child.once("error", reject);
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
    });
  }
}
