import * as net from "node:net";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  type IntentExecutor,
  type PortProbe,
  ServiceRecovery,
  ShellIntentExecutor,
  TcpPortProbe,
} from "../../src/core/services";
import type { RestartIntent, ServiceDefinition } from "../../src/types";
import { createClock } from "./fixtures";

const API: ServiceDefinition = {
  name: "api",
  port: 8080,
  startCommand: "node api/server.js",
  healthPath: "/health",
  restartDelay: 5,
};

const WORKER: ServiceDefinition = {
  name: "worker",
  port: 9090,
  startCommand: "node worker.js",
  healthPath: "/",
  restartDelay: 2,
};

class FakeProbe implements PortProbe {
  readonly up = new Set<number>();

  async isListening(port: number): Promise<boolean> {
    return this.up.has(port);
  }
}

class FakeExecutor implements IntentExecutor {
  readonly executed: RestartIntent[] = [];

  constructor(private readonly onExecute: (intent: RestartIntent) => void = () => {}) {}

  async execute(intent: RestartIntent): Promise<void> {
    this.executed.push(intent);
    this.onExecute(intent);
  }
}

describe("ServiceRecovery", () => {
  let probe: FakeProbe;
  let sleep: (ms: number) => Promise<unknown>;
  const clock = createClock();

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    probe = new FakeProbe();
    sleep = vi.fn(async () => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function create(executor: IntentExecutor = new FakeExecutor()): ServiceRecovery {
    return new ServiceRecovery([API, WORKER], { probe, executor, sleep, now: clock.now });
  }

  describe("status", () => {
    test("reports a listening service as running", async () => {
      probe.up.add(8080);

      expect(await create().status("api")).toEqual({
        service: "api",
        known: true,
        running: true,
        port: 8080,
        healthPath: "/health",
        checkedAt: "2024-01-01T00:00:00.000Z",
      });
    });

    test("reports unknown services", async () => {
      expect(await create().status("cache")).toEqual({
        service: "cache",
        known: false,
        error: "Unknown service: cache",
      });
    });

    test("allStatuses covers every registered service", async () => {
      probe.up.add(9090);

      const statuses = await create().allStatuses();

      expect(statuses.map((s) => [s.service, s.known && s.running])).toEqual([
        ["api", false],
        ["worker", true],
      ]);
    });
  });

  describe("attemptRestart", () => {
    test("defaults to a dry run that executes nothing", async () => {
      const executor = new FakeExecutor();

      const result = await create(executor).attemptRestart("api");

      expect(result).toEqual({
        action: "restart",
        service: "api",
        dryRun: true,
        success: true,
        intent: { service: "api", command: "node api/server.js", mode: "dry_run" },
        message: "Would execute: node api/server.js",
        timestamp: "2024-01-01T00:00:00.000Z",
      });
      expect(executor.executed).toEqual([]);
      expect(sleep).not.toHaveBeenCalled();
    });

    test("a live restart executes, waits restartDelay and re-probes", async () => {
      const executor = new FakeExecutor(() => probe.up.add(8080));

      const result = await create(executor).attemptRestart("api", false);

      expect(executor.executed).toEqual([
        { service: "api", command: "node api/server.js", mode: "live" },
      ]);
      expect(sleep).toHaveBeenCalledWith(5000);
      expect(result).toEqual({
        action: "restart",
        service: "api",
        dryRun: false,
        success: true,
        intent: { service: "api", command: "node api/server.js", mode: "live" },
        runningAfter: true,
        timestamp: "2024-01-01T00:00:00.000Z",
      });
    });

    test("a live restart fails when the port stays closed", async () => {
      const result = await create().attemptRestart("worker", false);

      expect(result.success).toBe(false);
      expect(result.action === "restart" && !result.dryRun && result.runningAfter).toBe(false);
      expect(sleep).toHaveBeenCalledWith(2000);
    });

    test("an executor error becomes restart_failed", async () => {
      const executor: IntentExecutor = {
        execute: async () => {
          throw new Error("spawn /bin/sh ENOENT");
        },
      };

      expect(await create(executor).attemptRestart("api", false)).toEqual({
        action: "restart_failed",
        service: "api",
        dryRun: false,
        success: false,
        error: "spawn /bin/sh ENOENT",
        timestamp: "2024-01-01T00:00:00.000Z",
      });
    });

    test("unknown services fail", async () => {
      expect(await create().attemptRestart("cache")).toEqual({
        action: "restart_failed",
        service: "cache",
        dryRun: true,
        success: false,
        error: "Unknown service: cache",
        timestamp: "2024-01-01T00:00:00.000Z",
      });
    });

    test("every attempt is recorded in the recovery history", async () => {
      const services = create();
      await services.attemptRestart("api");
      await services.attemptRestart("cache");

      expect(services.recoveryHistory().map((r) => [r.service, r.action])).toEqual([
        ["api", "restart"],
        ["cache", "restart_failed"],
      ]);
    });
  });

  describe("runPlaybook", () => {
    test("skips services that came back and dry-runs the rest", async () => {
      probe.up.add(9090);
      const executor = new FakeExecutor();
      const services = create(executor);

      const result = await services.runPlaybook(["api", "worker"]);

      expect(result.dryRun).toBe(true);
      expect(result.servicesTargeted).toEqual(["api", "worker"]);
      expect(result.overallSuccess).toBe(true);
      expect(result.results).toEqual([
        {
          action: "restart",
          service: "api",
          dryRun: true,
          success: true,
          intent: { service: "api", command: "node api/server.js", mode: "dry_run" },
          message: "Would execute: node api/server.js",
          timestamp: "2024-01-01T00:00:00.000Z",
        },
        { action: "skipped", service: "worker", reason: "already_running" },
      ]);
      expect(executor.executed).toEqual([]);
      expect(services.recoveryHistory()).toHaveLength(1);
    });

    test("overall success is false when any live restart fails", async () => {
      const executor = new FakeExecutor((intent) => {
        if (intent.service === "api") probe.up.add(8080);
      });

      const result = await create(executor).runPlaybook(["api", "worker"], { dryRun: false });

      expect(result.results.map((r) => [r.service, r.action === "skipped" ? null : r.success])).toEqual([
        ["api", true],
        ["worker", false],
      ]);
      expect(result.overallSuccess).toBe(false);
    });

    test("an empty playbook succeeds", async () => {
      const result = await create().runPlaybook([]);

      expect(result.results).toEqual([]);
      expect(result.overallSuccess).toBe(true);
    });
  });
});

describe("TcpPortProbe", () => {
  test("detects a listening port and a closed one", async () => {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("expected a TCP address");
    }

    const probe = new TcpPortProbe("127.0.0.1", 1000);
    expect(await probe.isListening(address.port)).toBe(true);

    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
    expect(await probe.isListening(address.port)).toBe(false);
  });
});

describe("ShellIntentExecutor", () => {
  test("refuses dry-run intents", async () => {
    await expect(
      new ShellIntentExecutor().execute({ service: "api", command: "true", mode: "dry_run" }),
    ).rejects.toThrow("Refusing to execute dry_run intent for api");
  });
});
