import type { StatisticsSnapshot } from "./schema.js";

export interface ApiUsageSummary {
  api: string;
  requests: number;
  tokens: number;
  models: string[];
}

export interface UsageSummary {
  period: string;
  requests: { total: number; success: number; failure: number };
  tokens: number;
  apis: ApiUsageSummary[];
}

/**
 * スナップショットを集計サマリーに変換する。
 * day（YYYY-MM-DD, UTC）を指定した場合はその日の明細のみを数える。
 */
export function summarizeSnapshot(
  snapshot: StatisticsSnapshot,
  day?: string,
): UsageSummary {
  if (!day) {
    return {
      period: "all",
      requests: {
        total: snapshot.total_requests,
        success: snapshot.success_count,
        failure: snapshot.failure_count,
      },
      tokens: snapshot.total_tokens,
      apis: Object.entries(snapshot.apis)
        .map(([api, s]) => ({
          api,
          requests: s.total_requests,
          tokens: s.total_tokens,
          models: Object.keys(s.models).sort(),
        }))
        .sort((a, b) => a.api.localeCompare(b.api)),
    };
  }

  const summary: UsageSummary = {
    period: day,
    requests: { total: 0, success: 0, failure: 0 },
    tokens: 0,
    apis: [],
  };
  for (const [api, apiSnapshot] of Object.entries(snapshot.apis)) {
    const entry: ApiUsageSummary = { api, requests: 0, tokens: 0, models: [] };
    for (const [model, modelSnapshot] of Object.entries(apiSnapshot.models)) {
      const details = modelSnapshot.details.filter((d) => d.timestamp.startsWith(day));
      if (details.length === 0) continue;
      entry.models.push(model);
      for (const detail of details) {
        entry.requests++;
        entry.tokens += detail.tokens.total_tokens;
        summary.requests.total++;
        if (detail.failed) {
          summary.requests.failure++;
        } else {
          summary.requests.success++;
        }
        summary.tokens += detail.tokens.total_tokens;
      }
    }
    if (entry.requests > 0) {
      entry.models.sort();
      summary.apis.push(entry);
    }
  }
  summary.apis.sort((a, b) => a.api.localeCompare(b.api));
  return summary;
}
