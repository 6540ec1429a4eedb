export { buildMcpServer } from "./server.js";
export type { McpServerOptions } from "./server.js";
export { handleUsageSummary, handleUsageSave, UsageSummaryParamsSchema } from "./tools/usage.js";
export type { ToolResult } from "./tools/usage.js";
export { handleHealthCheck } from "./tools/health.js";
export { runMcpStdio } from "./stdio.js";
export type { RunMcpStdioOptions } from "./stdio.js";
