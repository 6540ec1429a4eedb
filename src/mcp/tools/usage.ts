import { z } from "zod";
import { errorMessage } from "../../errors.js";
import type { UsagePersistenceScheduler } from "../../persistence/scheduler.js";
import type { SnapshotSource } from "../../usage/statistics.js";
import { summarizeSnapshot } from "../../usage/summary.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  structuredContent: Record<string, unknown>;
  isError: boolean;
};

export const UsageSummaryParamsSchema = z.object({
  day: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional()
    .describe("UTC day filter (e.g. '2026-01-31'). Omit for all-time"),
});

export function toolResult(payload: Record<string, unknown>, isError = false): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
    structuredContent: payload,
    isError,
  };
}

export async function handleUsageSummary(
  stats: SnapshotSource,
  params: z.infer<typeof UsageSummaryParamsSchema>,
): Promise<ToolResult> {
  const summary = summarizeSnapshot(stats.snapshot(), params.day);
  return toolResult({
    period: summary.period,
    requests: summary.requests,
    tokens: summary.tokens,
    apis: summary.apis,
  });
}

export async function handleUsageSave(
  persistence: UsagePersistenceScheduler | undefined,
): Promise<ToolResult> {
  if (!persistence) {
    return toolResult({ saved: false, error: "usage persistence is not configured" }, true);
  }
  try {
    await persistence.save();
    return toolResult({ saved: true, path: persistence.filePath });
  } catch (err) {
    return toolResult({ saved: false, path: persistence.filePath, error: errorMessage(err) }, true);
  }
}
