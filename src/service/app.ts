import { Hono } from "hono";
import type { Context } from "hono";
import { errorMessage } from "../errors.js";
import type { UsagePersistenceScheduler } from "../persistence/scheduler.js";
import { UsageRecordParamsSchema } from "../usage/schema.js";
import type { RequestStatistics } from "../usage/statistics.js";
import type { KeepAliveMonitor } from "./keep-alive.js";

export interface UsageAppOptions {
  stats: RequestStatistics;
  persistence?: UsagePersistenceScheduler;
  /** 指定時のみ /keep-alive を公開する */
  keepAlive?: { monitor: KeepAliveMonitor; password: string };
}

function readPassword(c: Context): string | undefined {
  const authorization = c.req.header("authorization");
  if (authorization?.startsWith("Bearer ")) {
    return authorization.slice("Bearer ".length).trim();
  }
  return c.req.header("x-local-password");
}

export function createUsageApp(options: UsageAppOptions): Hono {
  const { stats, persistence, keepAlive } = options;
  const app = new Hono();

  app.get("/healthz", (c) => c.json({ ok: true }));

  app.post("/v1/usage/records", async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      return c.json({ error: "invalid JSON payload" }, 400);
    }

    const parsed = UsageRecordParamsSchema.safeParse(payload);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      return c.json({ error: detail }, 400);
    }

    const record = parsed.data;
    stats.record({
      api: record.api,
      model: record.model,
      source: record.source,
      authIndex: record.auth_index,
      failed: record.failed,
      timestamp: record.timestamp ? new Date(record.timestamp) : undefined,
      tokens: record.tokens,
    });
    return c.json({ accepted: true }, 202);
  });

  app.get("/v0/management/usage", (c) => c.json({ usage: stats.snapshot() }));

  app.post("/v0/management/usage/save", async (c) => {
    if (!persistence) {
      return c.json({ error: "usage persistence is not configured" }, 404);
    }
    try {
      await persistence.save();
      return c.json({ saved: true, path: persistence.filePath });
    } catch (err) {
      return c.json({ error: errorMessage(err) }, 500);
    }
  });

  if (keepAlive) {
    app.get("/keep-alive", (c) => {
      if (readPassword(c) !== keepAlive.password) {
        return c.json({ error: "invalid local password" }, 401);
      }
      keepAlive.monitor.touch();
      return c.json({ status: "ok" });
    });
  }

  return app;
}
