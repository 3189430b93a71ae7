/**
 * Service registry and recovery playbook types
 */

export interface ServiceDefinition {
  name: string;
  port: number;
  startCommand: string;
  /** Not used by the TCP probe; kept for richer probes and display */
  healthPath: string;
  /** Seconds to wait after a restart before probing again */
  restartDelay: number;
}

export type IntentMode = "dry_run" | "live";

/**
 * A restart decision. Only `live` intents are ever handed to an executor.
 */
export interface RestartIntent {
  service: string;
  command: string;
  mode: IntentMode;
}

export type ServiceStatus =
  | {
      service: string;
      known: true;
      running: boolean;
      port: number;
      healthPath: string;
      checkedAt: string;
    }
  | { service: string; known: false; error: string };

export type RestartResult =
  | {
      action: "restart";
      service: string;
      dryRun: true;
      success: true;
      intent: RestartIntent;
      message: string;
      timestamp: string;
    }
  | {
      action: "restart";
      service: string;
      dryRun: false;
      success: boolean;
      intent: RestartIntent;
      runningAfter: boolean;
      timestamp: string;
    }
  | {
      action: "restart_failed";
      service: string;
      dryRun: boolean;
      success: false;
      error: string;
      timestamp: string;
    };

export interface SkippedRestart {
  action: "skipped";
  service: string;
  reason: "already_running";
}

export type PlaybookEntry = RestartResult | SkippedRestart;

export interface PlaybookResult {
  startedAt: string;
  completedAt: string;
  servicesTargeted: string[];
  dryRun: boolean;
  results: PlaybookEntry[];
  overallSuccess: boolean;
}
