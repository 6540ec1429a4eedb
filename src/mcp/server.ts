import { McpServer as SdkMcpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { UsagePersistenceScheduler } from "../persistence/scheduler.js";
import type { SnapshotSource } from "../usage/statistics.js";
import { handleHealthCheck } from "./tools/health.js";
import {
  UsageSummaryParamsSchema,
  handleUsageSave,
  handleUsageSummary,
} from "./tools/usage.js";

export interface McpServerOptions {
  /** サーバー名（MCP プロトコルの server_info.name） */
  serverName?: string;
  /** サーバーバージョン */
  serverVersion?: string;
  stats: SnapshotSource;
  /** 未指定の場合 usage.save はエラーを返す */
  persistence?: UsagePersistenceScheduler;
}

/**
 * 使用量ツールを登録した MCP サーバーを生成する。
 */
export function buildMcpServer(options: McpServerOptions): SdkMcpServer {
  const {
    serverName = "usage-keeper",
    serverVersion = "0.1.0",
    stats,
    persistence,
  } = options;

  const server = new SdkMcpServer(
    { name: serverName, version: serverVersion },
    { capabilities: { tools: {}, logging: {} } },
  );

  const summaryShape = extractShape(UsageSummaryParamsSchema);
  server.registerTool("usage.summary", {
    description: "Get request and token usage summary",
    inputSchema: summaryShape,
  }, async (args) => {
    const parsed = UsageSummaryParamsSchema.parse(args);
    return handleUsageSummary(stats, parsed);
  });

  server.registerTool("usage.save", {
    description: "Persist the current usage statistics to disk",
  }, async () => {
    return handleUsageSave(persistence);
  });

  server.registerTool("health.check", {
    description: "Check persistence storage health",
  }, async () => {
    return handleHealthCheck(persistence);
  });

  return server;
}

/**
 * Zod object schema から MCP SDK が受け付ける raw shape を抽出する。
 */
function extractShape<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
): T {
  return schema.shape;
}
