export { resolvePath } from "./path.js";
export {
  UsageFileCodec,
  CURRENT_VERSION,
  TEMP_SUFFIX,
  CORRUPT_SUFFIX,
  ZERO_TIME,
  formatQuarantineStamp,
} from "./codec.js";
export type { PersistedEnvelope, SnapshotCodec, UsageFileCodecOptions } from "./codec.js";
export { UsagePersistenceScheduler } from "./scheduler.js";
export type { SchedulerState, UsagePersistenceSchedulerOptions } from "./scheduler.js";
