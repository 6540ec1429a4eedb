import type { Server } from "node:net";
import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import type { AppConfig } from "../config/index.js";
import { UsageKeeperError } from "../errors.js";
import { createLogger, type Logger } from "../logging/index.js";
import type { UsagePersistenceScheduler } from "../persistence/scheduler.js";
import type { RequestStatistics } from "../usage/statistics.js";
import { createUsageApp } from "./app.js";
import { KeepAliveMonitor } from "./keep-alive.js";

export interface RunningServer {
  address: string;
  /** サーバーがエラーで止まった場合に reject される */
  done: Promise<void>;
  close(): Promise<void>;
}

export type ListenFn = (
  app: Hono,
  options: { hostname: string; port: number },
) => Promise<RunningServer>;

export interface ServiceHooks {
  onAfterStart?: (service: UsageService) => void | Promise<void>;
}

export interface UsageServiceOptions {
  config: AppConfig;
  stats: RequestStatistics;
  persistence?: UsagePersistenceScheduler;
  localPassword?: string;
  keepAlive?: { timeoutMs: number; onTimeout: () => void };
  hooks?: ServiceHooks;
  logger?: Logger;
  listen?: ListenFn;
}

export const listenWithNodeServer: ListenFn = (app, { hostname, port }) =>
  new Promise((resolve, reject) => {
    let settled = false;
    const server: Server = serve({ fetch: app.fetch, hostname, port }, (info) => {
      settled = true;
      resolve({
        address: `${info.address}:${info.port}`,
        done,
        close: () =>
          new Promise<void>((resolveClose, rejectClose) => {
            server.close((err) => (err ? rejectClose(err) : resolveClose()));
          }),
      });
    });
    const done = new Promise<void>((resolveDone, rejectDone) => {
      server.once("close", () => resolveDone());
      server.once("error", (err) => {
        if (settled) {
          rejectDone(err);
        } else {
          reject(err);
        }
      });
    });
    // listen 前のエラーは reject 済み
    done.catch(() => undefined);
  });

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * 使用量 HTTP サービス。
 * run(signal) は signal が abort されるまでブロックし、abort は正常終了として扱う。
 */
export class UsageService {
  readonly app: Hono;
  readonly config: AppConfig;
  readonly keepAlive?: KeepAliveMonitor;

  private readonly hooks: ServiceHooks;
  private readonly logger: Logger;
  private readonly listen: ListenFn;
  private running = false;

  constructor(options: UsageServiceOptions) {
    this.config = options.config;
    this.hooks = options.hooks ?? {};
    this.logger = options.logger ?? createLogger("service");
    this.listen = options.listen ?? listenWithNodeServer;

    if (options.localPassword && options.keepAlive) {
      this.keepAlive = new KeepAliveMonitor(options.keepAlive);
    }

    this.app = createUsageApp({
      stats: options.stats,
      persistence: options.persistence,
      keepAlive:
        this.keepAlive && options.localPassword
          ? { monitor: this.keepAlive, password: options.localPassword }
          : undefined,
    });
  }

  async run(signal: AbortSignal): Promise<void> {
    if (this.running) {
      throw new UsageKeeperError("usage service is already running");
    }
    this.running = true;

    const server = await this.listen(this.app, {
      hostname: this.config.host,
      port: this.config.port,
    });
    this.logger.info(`usage service listening on ${server.address}`);

    try {
      this.keepAlive?.start();
      await this.hooks.onAfterStart?.(this);
      await Promise.race([waitForAbort(signal), server.done]);
    } finally {
      this.keepAlive?.stop();
      await server.close();
      this.running = false;
    }
  }
}
