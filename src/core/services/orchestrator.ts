/**
 * Service recovery orchestration
 */

import { setTimeout as sleep } from "node:timers/promises";
import type {
  PlaybookEntry,
  PlaybookResult,
  RestartIntent,
  RestartResult,
  ServiceDefinition,
  ServiceStatus,
} from "../../types";
import { scoped } from "../../utils/logger";
import { type IntentExecutor, ShellIntentExecutor } from "./executor";
import { type PortProbe, TcpPortProbe } from "./probe";

const log = scoped("services");

export interface ServiceRecoveryOptions {
  probe?: PortProbe;
  executor?: IntentExecutor;
  /** Settle wait between a live restart and the re-probe */
  sleep?: (ms: number) => Promise<unknown>;
  now?: () => Date;
}

export interface PlaybookOptions {
  dryRun?: boolean;
}

export class ServiceRecovery {
  private readonly registry = new Map<string, ServiceDefinition>();
  private readonly history: RestartResult[] = [];
  private readonly probe: PortProbe;
  private readonly executor: IntentExecutor;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly now: () => Date;

  constructor(services: ServiceDefinition[], options: ServiceRecoveryOptions = {}) {
    for (const service of services) {
      this.registry.set(service.name, service);
    }
    this.probe = options.probe ?? new TcpPortProbe();
    this.executor = options.executor ?? new ShellIntentExecutor();
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.now = options.now ?? (() => new Date());
  }

  get serviceNames(): string[] {
    return [...this.registry.keys()];
  }

  async status(name: string): Promise<ServiceStatus> {
    const service = this.registry.get(name);
    if (!service) {
      return { service: name, known: false, error: `Unknown service: ${name}` };
    }

    const running = await this.probe.isListening(service.port);

    return {
      service: name,
      known: true,
      running,
      port: service.port,
      healthPath: service.healthPath,
      checkedAt: this.timestamp(),
    };
  }

  async allStatuses(): Promise<ServiceStatus[]> {
    const statuses: ServiceStatus[] = [];
    for (const name of this.registry.keys()) {
      statuses.push(await this.status(name));
    }
    return statuses;
  }

  /**
   * Decide what a restart would run, without running it.
   */
  planRestart(name: string, dryRun: boolean): RestartIntent | null {
    const service = this.registry.get(name);
    if (!service) return null;

    return {
      service: name,
      command: service.startCommand,
      mode: dryRun ? "dry_run" : "live",
    };
  }

  async attemptRestart(name: string, dryRun: boolean = true): Promise<RestartResult> {
    const result = await this.restart(name, dryRun);
    this.history.push(result);
    return result;
  }

  async runPlaybook(
    failedServices: string[],
    options: PlaybookOptions = {},
  ): Promise<PlaybookResult> {
    const dryRun = options.dryRun ?? true;
    const startedAt = this.timestamp();
    const results: PlaybookEntry[] = [];
    let overallSuccess = true;

    log.info(
      `Running recovery playbook for ${failedServices.length} service(s)${dryRun ? " [DRY RUN]" : ""}`,
    );

    for (const name of failedServices) {
      // Failure data may be stale by now
      const current = await this.status(name);
      if (current.known && current.running) {
        log.info(`${name} is already running, skipping`);
        results.push({ action: "skipped", service: name, reason: "already_running" });
        continue;
      }

      const result = await this.attemptRestart(name, dryRun);
      results.push(result);

      if (!result.success) {
        overallSuccess = false;
      }
    }

    log.info(`Playbook finished, overall success: ${overallSuccess}`);

    return {
      startedAt,
      completedAt: this.timestamp(),
      servicesTargeted: [...failedServices],
      dryRun,
      results,
      overallSuccess,
    };
  }

  recoveryHistory(): RestartResult[] {
    return [...this.history];
  }

  private async restart(name: string, dryRun: boolean): Promise<RestartResult> {
    const intent = this.planRestart(name, dryRun);
    const service = this.registry.get(name);

    if (!intent || !service) {
      return {
        action: "restart_failed",
        service: name,
        dryRun,
        success: false,
        error: `Unknown service: ${name}`,
        timestamp: this.timestamp(),
      };
    }

    if (intent.mode === "dry_run") {
      log.info(`[DRY RUN] Would restart ${name}: ${intent.command}`);
      return {
        action: "restart",
        service: name,
        dryRun: true,
        success: true,
        intent,
        message: `Would execute: ${intent.command}`,
        timestamp: this.timestamp(),
      };
    }

    try {
      await this.executor.execute(intent);
      log.info(`Waiting ${service.restartDelay}s for ${name} to come up`);
      await this.sleep(service.restartDelay * 1000);

      const runningAfter = await this.probe.isListening(service.port);
      if (!runningAfter) {
        log.warn(`${name} did not come back on port ${service.port}`);
      }

      return {
        action: "restart",
        service: name,
        dryRun: false,
        success: runningAfter,
        intent,
        runningAfter,
        timestamp: this.timestamp(),
      };
    } catch (error) {
      const message = (error as Error).message;
      log.error(`Restart of ${name} failed: ${message}`);
      return {
        action: "restart_failed",
        service: name,
        dryRun: false,
        success: false,
        error: message,
        timestamp: this.timestamp(),
      };
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
