// Errors
export {
  UsageKeeperError,
  PersistenceError,
  SerializationError,
  CorruptFileError,
  UnsupportedVersionError,
  ConfigError,
  DurationParseError,
  isErrnoException,
} from "./errors.js";

// Logging
export {
  createLogger,
  setDefaultLogLevel,
  setDefaultLogSink,
  silentLogger,
} from "./logging/index.js";
export type { Logger, LoggerOptions, LogLevel, LogSink } from "./logging/index.js";

// Usage statistics
export {
  RequestStatistics,
  StatisticsSnapshotSchema,
  UsageRecordParamsSchema,
  emptySnapshot,
  summarizeSnapshot,
} from "./usage/index.js";
export type {
  StatisticsSnapshot,
  ApiSnapshot,
  ModelSnapshot,
  RequestDetail,
  TokenStats,
  MergeOutcome,
  SnapshotSource,
  SnapshotStore,
  UsageRecord,
  UsageSummary,
} from "./usage/index.js";

// Storage
export type { DataStorage, FileStats, WriteOptions } from "./storage/index.js";
export { FileSystemStorage } from "./storage/index.js";

// Persistence
export {
  resolvePath,
  UsageFileCodec,
  UsagePersistenceScheduler,
  CURRENT_VERSION,
} from "./persistence/index.js";
export type {
  PersistedEnvelope,
  SchedulerState,
  UsageFileCodecOptions,
  UsagePersistenceSchedulerOptions,
} from "./persistence/index.js";

// Config
export { loadConfig, parseConfig, defaultConfig, parseDuration, parseSaveInterval } from "./config/index.js";
export type { AppConfig, UsageStatisticsConfig } from "./config/index.js";

// Service
export {
  createUsageApp,
  KeepAliveMonitor,
  UsageService,
  startService,
  waitForShutdown,
  KEEP_ALIVE_TIMEOUT_MS,
} from "./service/index.js";
export type {
  ListenFn,
  RunningServer,
  ServiceHooks,
  UsageServiceOptions,
  SignalSource,
  StartServiceOptions,
} from "./service/index.js";

// MCP
export { buildMcpServer, runMcpStdio } from "./mcp/index.js";
export type { McpServerOptions, RunMcpStdioOptions } from "./mcp/index.js";
