import { vi } from "vitest";
import type { SnapshotCodec } from "../../src/persistence/codec.js";
import { UsagePersistenceScheduler } from "../../src/persistence/scheduler.js";
import { silentLogger } from "../../src/logging/logger.js";
import type { SnapshotStore } from "../../src/usage/statistics.js";

export function stubPersistence(
  store: SnapshotStore,
  codec: Partial<SnapshotCodec> = {},
): UsagePersistenceScheduler {
  return new UsagePersistenceScheduler({
    filePath: "/data/usage.json",
    intervalMs: 0,
    restoreOnStart: false,
    store,
    logger: silentLogger,
    codec: {
      save: vi.fn(async () => {}),
      load: vi.fn(async () => null),
      checkHealth: vi.fn(async () => ({ ok: true })),
      ...codec,
    },
  });
}
