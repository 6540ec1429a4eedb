import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { AppConfig } from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import { UsagePersistenceScheduler } from "../persistence/scheduler.js";
import { onShutdownSignal, type SignalSource } from "../service/lifecycle.js";
import { RequestStatistics } from "../usage/statistics.js";
import { buildMcpServer } from "./server.js";

export interface RunMcpStdioOptions {
  config: AppConfig;
  stats?: RequestStatistics;
  logger?: Logger;
  signals?: SignalSource;
  /** 未指定なら stdio */
  transport?: Transport;
  homeDir?: () => string;
}

/**
 * stdio で MCP サーバーを動かす。
 * シグナル受信かクライアント切断で終了する。
 *
 * MCP モードでは使用量を記録しないため、永続化ファイルは常に復元し、
 * 書き込むのは usage.save が呼ばれたときだけ（定期保存・終了時保存はしない）。
 */
export async function runMcpStdio(options: RunMcpStdioOptions): Promise<void> {
  const { config } = options;
  const logger = options.logger ?? createLogger("mcp");
  const stats = options.stats ?? new RequestStatistics();
  const persistFile = config.usageStatistics.persistFile;
  const persistence = persistFile
    ? new UsagePersistenceScheduler({
        filePath: persistFile,
        intervalMs: 0,
        restoreOnStart: true,
        store: stats,
        logger,
        homeDir: options.homeDir,
      })
    : undefined;

  const server = buildMcpServer({ stats, persistence });
  await persistence?.start();

  let dispose = (): void => {};
  const finished = new Promise<void>((resolve) => {
    dispose = onShutdownSignal(options.signals ?? process, (name) => {
      logger.info(`received ${name}, shutting down`);
      resolve();
    });
    server.server.onclose = () => resolve();
  });

  try {
    await server.connect(options.transport ?? new StdioServerTransport());
    await finished;
  } finally {
    dispose();
    await server.close();
  }
}
