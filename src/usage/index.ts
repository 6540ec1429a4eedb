export {
  StatisticsSnapshotSchema,
  ApiSnapshotSchema,
  ModelSnapshotSchema,
  RequestDetailSchema,
  TokenStatsSchema,
  UsageRecordParamsSchema,
  emptySnapshot,
} from "./schema.js";
export type {
  StatisticsSnapshot,
  ApiSnapshot,
  ModelSnapshot,
  RequestDetail,
  TokenStats,
  UsageRecordParams,
  MergeOutcome,
} from "./schema.js";
export { RequestStatistics } from "./statistics.js";
export type { SnapshotSource, SnapshotStore, UsageRecord } from "./statistics.js";
export { summarizeSnapshot } from "./summary.js";
export type { UsageSummary, ApiUsageSummary } from "./summary.js";
