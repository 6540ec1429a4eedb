import type { UsagePersistenceScheduler } from "../../persistence/scheduler.js";
import { toolResult, type ToolResult } from "./usage.js";

export async function handleHealthCheck(
  persistence: UsagePersistenceScheduler | undefined,
): Promise<ToolResult> {
  const result: { ok: boolean; error?: string } = persistence
    ? await persistence.checkHealth()
    : { ok: true };
  const payload = {
    ok: result.ok,
    timestamp: new Date().toISOString(),
    dependencies: {
      storage: {
        driver: persistence ? "filesystem" : "memory",
        path: persistence?.filePath ?? null,
        ok: result.ok,
        error: result.error ?? null,
      },
    },
  };
  return toolResult(payload);
}
