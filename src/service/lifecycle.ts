import { parseSaveInterval, type AppConfig } from "../config/index.js";
import { errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logging/index.js";
import { UsagePersistenceScheduler } from "../persistence/scheduler.js";
import { RequestStatistics } from "../usage/statistics.js";
import { UsageService, type ListenFn, type UsageServiceOptions } from "./server.js";

export const KEEP_ALIVE_TIMEOUT_MS = 10_000;
export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/** process と同じ形のシグナル購読口 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface ServiceRunner {
  run(signal: AbortSignal): Promise<void>;
}

export interface StartServiceOptions {
  config: AppConfig;
  /** ローカル管理用パスワード。指定時は keep-alive によるアイドル停止を有効にする */
  localPassword?: string;
  stats?: RequestStatistics;
  logger?: Logger;
  signals?: SignalSource;
  keepAliveTimeoutMs?: number;
  listen?: ListenFn;
  homeDir?: () => string;
  buildService?: (options: UsageServiceOptions) => ServiceRunner;
}

/**
 * SIGINT / SIGTERM の購読を登録し、解除関数を返す。
 */
export function onShutdownSignal(
  signals: SignalSource,
  handler: (signal: NodeJS.Signals) => void,
): () => void {
  const listeners = SHUTDOWN_SIGNALS.map((name) => {
    const listener = (): void => handler(name);
    signals.on(name, listener);
    return { name, listener };
  });
  return () => {
    for (const { name, listener } of listeners) {
      signals.off(name, listener);
    }
  };
}

export function createPersistence(
  config: AppConfig,
  stats: RequestStatistics,
  logger: Logger,
  homeDir?: () => string,
): UsagePersistenceScheduler {
  const usage = config.usageStatistics;
  const { intervalMs, invalid } = parseSaveInterval(usage.saveInterval);
  if (invalid) {
    logger.warn(
      `Invalid save-interval ${JSON.stringify(usage.saveInterval)}, disabling periodic save`,
    );
  }
  return new UsagePersistenceScheduler({
    filePath: usage.persistFile,
    intervalMs,
    restoreOnStart: usage.restoreOnStart,
    store: stats,
    logger,
    homeDir,
  });
}

/**
 * シグナル（またはアイドルタイムアウト）で止まるまでサービスを動かす。
 *
 * 永続化スケジューラーはサービスの起動後に開始し、run が返った後に停止する。
 * そのため終了時保存は停止直前のメモリ上の状態を必ず含む。
 * 起動前に run が失敗した場合は終了時保存を行わない。
 */
export async function startService(options: StartServiceOptions): Promise<void> {
  const { config, localPassword } = options;
  const logger = options.logger ?? createLogger("service");
  const stats = options.stats ?? new RequestStatistics();
  const signals = options.signals ?? process;
  const usage = config.usageStatistics;

  const persistence =
    usage.persistFile !== ""
      ? createPersistence(config, stats, logger, options.homeDir)
      : undefined;

  const controller = new AbortController();
  const disposeSignals = onShutdownSignal(signals, (name) => {
    if (controller.signal.aborted) return;
    logger.info(`received ${name}, shutting down`);
    controller.abort();
  });

  const timeoutMs = options.keepAliveTimeoutMs ?? KEEP_ALIVE_TIMEOUT_MS;
  const serviceOptions: UsageServiceOptions = {
    config,
    stats,
    persistence,
    localPassword,
    logger,
    listen: options.listen,
    keepAlive: localPassword
      ? {
          timeoutMs,
          onTimeout: () => {
            logger.warn(`keep-alive endpoint idle for ${timeoutMs / 1000}s, shutting down`);
            controller.abort();
          },
        }
      : undefined,
    hooks: persistence
      ? {
          onAfterStart: async () => {
            await persistence.start();
            logger.info(`Usage statistics persistence enabled: ${usage.persistFile}`);
          },
        }
      : undefined,
  };

  try {
    let service: ServiceRunner;
    try {
      service = (options.buildService ?? ((o) => new UsageService(o)))(serviceOptions);
    } catch (err) {
      logger.error(`failed to build usage service: ${errorMessage(err)}`);
      return;
    }

    try {
      await service.run(controller.signal);
    } catch (err) {
      logger.error(`usage service exited with error: ${errorMessage(err)}`);
    }

    if (persistence?.state === "idle") {
      // 復元前のストアで既存ファイルを上書きしない
      logger.warn("usage statistics persistence never started; skipping final save");
    } else if (persistence) {
      await persistence.stop();
    }
  } finally {
    disposeSignals();
  }
}

/**
 * 設定がない状態での待機。SIGINT / SIGTERM を受けるまで resolve しない。
 */
export function waitForShutdown(
  signals: SignalSource = process,
  logger: Logger = createLogger("service"),
): Promise<void> {
  logger.info("No usage statistics configuration found; standing by. Press Ctrl+C to exit.");
  return new Promise((resolve) => {
    const dispose = onShutdownSignal(signals, () => {
      dispose();
      logger.info("Shutdown signal received; exiting");
      resolve();
    });
  });
}
