import { EventEmitter } from "node:events";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { defaultConfig, type AppConfig, type UsageStatisticsConfig } from "../../src/config/index.js";
import type { Logger } from "../../src/logging/logger.js";
import {
  KEEP_ALIVE_TIMEOUT_MS,
  onShutdownSignal,
  startService,
  waitForShutdown,
} from "../../src/service/lifecycle.js";
import type { ListenFn, RunningServer } from "../../src/service/server.js";
import { RequestStatistics } from "../../src/usage/statistics.js";

function recordingLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

const listen: ListenFn = async () => {
  const server: RunningServer = {
    address: "127.0.0.1:8317",
    done: new Promise<void>(() => {}),
    close: async () => {},
  };
  return server;
};

function configFor(persistFile: string, usage: Partial<UsageStatisticsConfig> = {}): AppConfig {
  return {
    ...defaultConfig(),
    usageStatistics: { persistFile, saveInterval: "", restoreOnStart: true, ...usage },
  };
}

describe("onShutdownSignal", () => {
  it("reports the signal name and unsubscribes on dispose", () => {
    const signals = new EventEmitter();
    const handler = vi.fn();
    const dispose = onShutdownSignal(signals, handler);

    signals.emit("SIGINT");
    expect(handler).toHaveBeenCalledWith("SIGINT");
    dispose();
    expect(signals.listenerCount("SIGINT")).toBe(0);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });
});

describe("startService", () => {
  let tmpDir: string;
  let filePath: string;
  let signals: EventEmitter;
  let logger: ReturnType<typeof recordingLogger>;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "usage-lifecycle-"));
    filePath = path.join(tmpDir, "usage.json");
    signals = new EventEmitter();
    logger = recordingLogger();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function waitUntilStarted(): Promise<void> {
    await vi.waitFor(() =>
      expect(logger.info).toHaveBeenCalledWith(`Usage statistics persistence enabled: ${filePath}`),
    );
  }

  it("saves the final state when SIGINT arrives", async () => {
    const stats = new RequestStatistics();
    const done = startService({ config: configFor(filePath), stats, signals, logger, listen });
    await waitUntilStarted();

    stats.record({ api: "openai", model: "gpt-4o", timestamp: new Date("2026-06-01T00:00:00Z") });
    signals.emit("SIGINT");
    await done;

    expect(logger.info).toHaveBeenCalledWith("received SIGINT, shutting down");
    const saved = JSON.parse(await fs.readFile(filePath, "utf-8"));
    expect(saved.data.total_requests).toBe(1);
    expect(signals.listenerCount("SIGINT")).toBe(0);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("shuts down after the keep-alive endpoint goes idle", async () => {
    const done = startService({
      config: configFor(filePath),
      localPassword: "test-secret",
      keepAliveTimeoutMs: 50,
      signals,
      logger,
      listen,
    });
    await done;

    expect(logger.warn).toHaveBeenCalledWith("keep-alive endpoint idle for 0.05s, shutting down");
    await expect(fs.stat(filePath)).resolves.toBeDefined();
  });

  it("uses a ten second keep-alive timeout by default", () => {
    expect(KEEP_ALIVE_TIMEOUT_MS).toBe(10_000);
  });

  it("does not start persistence when the service cannot be built", async () => {
    await fs.writeFile(filePath, "{not json");

    await startService({
      config: configFor(filePath),
      signals,
      logger,
      listen,
      buildService: () => {
        throw new Error("port already claimed");
      },
    });

    expect(logger.error).toHaveBeenCalledWith("failed to build usage service: port already claimed");
    expect(await fs.readFile(filePath, "utf-8")).toBe("{not json");
    expect(await fs.readdir(tmpDir)).toEqual(["usage.json"]);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("keeps the existing file when the service fails before starting", async () => {
    await fs.writeFile(filePath, "previous run");

    await startService({
      config: configFor(filePath),
      signals,
      logger,
      listen: async () => {
        throw new Error("listen EADDRINUSE");
      },
    });

    expect(logger.error).toHaveBeenCalledWith("usage service exited with error: listen EADDRINUSE");
    expect(logger.warn).toHaveBeenCalledWith(
      "usage statistics persistence never started; skipping final save",
    );
    expect(await fs.readFile(filePath, "utf-8")).toBe("previous run");
    expect(await fs.readdir(tmpDir)).toEqual(["usage.json"]);
  });

  it("warns about an invalid save interval", async () => {
    const done = startService({
      config: configFor(filePath, { saveInterval: "soon" }),
      signals,
      logger,
      listen,
    });
    await waitUntilStarted();
    signals.emit("SIGTERM");
    await done;

    expect(logger.warn).toHaveBeenCalledWith('Invalid save-interval "soon", disabling periodic save');
  });

  it("runs without persistence when no file is configured", async () => {
    const done = startService({ config: configFor(""), signals, logger, listen });
    await vi.waitFor(() =>
      expect(logger.info).toHaveBeenCalledWith("usage service listening on 127.0.0.1:8317"),
    );
    signals.emit("SIGTERM");
    await done;

    expect(await fs.readdir(tmpDir)).toEqual([]);
    expect(logger.info).not.toHaveBeenCalledWith(
      expect.stringContaining("Usage statistics persistence enabled"),
    );
  });
});

describe("waitForShutdown", () => {
  it("resolves on SIGTERM and removes its listeners", async () => {
    const signals = new EventEmitter();
    const logger = recordingLogger();
    const waiting = waitForShutdown(signals, logger);

    signals.emit("SIGTERM");
    await waiting;
    expect(logger.info).toHaveBeenLastCalledWith("Shutdown signal received; exiting");
    expect(signals.listenerCount("SIGINT")).toBe(0);
  });
});
