import {
  emptySnapshot,
  type MergeOutcome,
  type RequestDetail,
  type StatisticsSnapshot,
  type TokenStats,
} from "./schema.js";

/** スナップショットの読み取り専用ビュー */
export interface SnapshotSource {
  snapshot(): StatisticsSnapshot;
}

/**
 * 永続化が必要とする最小限のストア機能。
 * 読み取り（snapshot）と復元時のマージ（mergeSnapshot）のみ。
 */
export interface SnapshotStore extends SnapshotSource {
  mergeSnapshot(snapshot: StatisticsSnapshot): MergeOutcome;
}

export interface UsageRecord {
  api: string;
  model: string;
  timestamp?: Date;
  source?: string;
  authIndex?: string;
  failed?: boolean;
  tokens?: Partial<TokenStats>;
}

function normalizeTokens(tokens: Partial<TokenStats> = {}): TokenStats {
  const normalized: TokenStats = {
    input_tokens: tokens.input_tokens ?? 0,
    output_tokens: tokens.output_tokens ?? 0,
    reasoning_tokens: tokens.reasoning_tokens ?? 0,
    cached_tokens: tokens.cached_tokens ?? 0,
    total_tokens: tokens.total_tokens ?? 0,
  };
  if (normalized.total_tokens === 0) {
    normalized.total_tokens =
      normalized.input_tokens + normalized.output_tokens + normalized.reasoning_tokens;
  }
  return normalized;
}

function increment(counters: Record<string, number>, key: string, by: number): void {
  counters[key] = (counters[key] ?? 0) + by;
}

function dedupKey(api: string, model: string, detail: RequestDetail): string {
  const t = detail.tokens;
  return [
    api,
    model,
    detail.timestamp,
    detail.source,
    detail.auth_index,
    detail.failed ? "1" : "0",
    t.input_tokens,
    t.output_tokens,
    t.reasoning_tokens,
    t.cached_tokens,
    t.total_tokens,
  ].join("|");
}

/**
 * リクエスト単位の使用量をメモリ上で集計するストア。
 * API → モデル → 明細の階層と、日別・時間帯別（UTC）の集計を保持する。
 */
export class RequestStatistics implements SnapshotStore {
  private state: StatisticsSnapshot = emptySnapshot();

  record(record: UsageRecord): void {
    const timestamp = record.timestamp ?? new Date();
    this.apply(record.api, record.model, {
      timestamp: timestamp.toISOString(),
      source: record.source ?? "",
      auth_index: record.authIndex ?? "",
      tokens: normalizeTokens(record.tokens),
      failed: record.failed ?? false,
    });
  }

  snapshot(): StatisticsSnapshot {
    return structuredClone(this.state);
  }

  /**
   * 復元したスナップショットの明細を取り込む。
   * 既に同一の明細（API・モデル・時刻・送信元・トークン数が一致）があればスキップする。
   */
  mergeSnapshot(snapshot: StatisticsSnapshot): MergeOutcome {
    const seen = new Set<string>();
    for (const [api, apiSnapshot] of Object.entries(this.state.apis)) {
      for (const [model, modelSnapshot] of Object.entries(apiSnapshot.models)) {
        for (const detail of modelSnapshot.details) {
          seen.add(dedupKey(api, model, detail));
        }
      }
    }

    const outcome: MergeOutcome = { added: 0, skipped: 0 };
    for (const [api, apiSnapshot] of Object.entries(snapshot.apis)) {
      for (const [model, modelSnapshot] of Object.entries(apiSnapshot.models)) {
        for (const incoming of modelSnapshot.details) {
          const time = new Date(incoming.timestamp);
          if (Number.isNaN(time.getTime())) {
            outcome.skipped++;
            continue;
          }
          const detail: RequestDetail = {
            ...incoming,
            timestamp: time.toISOString(),
            tokens: normalizeTokens(incoming.tokens),
          };
          const key = dedupKey(api, model, detail);
          if (seen.has(key)) {
            outcome.skipped++;
            continue;
          }
          seen.add(key);
          this.apply(api, model, detail);
          outcome.added++;
        }
      }
    }
    return outcome;
  }

  reset(): void {
    this.state = emptySnapshot();
  }

  private apply(api: string, model: string, detail: RequestDetail): void {
    const s = this.state;
    const tokens = detail.tokens.total_tokens;

    s.total_requests++;
    if (detail.failed) {
      s.failure_count++;
    } else {
      s.success_count++;
    }
    s.total_tokens += tokens;

    let apiSnapshot = s.apis[api];
    if (!apiSnapshot) {
      apiSnapshot = { total_requests: 0, total_tokens: 0, models: {} };
      s.apis[api] = apiSnapshot;
    }
    apiSnapshot.total_requests++;
    apiSnapshot.total_tokens += tokens;

    let modelSnapshot = apiSnapshot.models[model];
    if (!modelSnapshot) {
      modelSnapshot = { total_requests: 0, total_tokens: 0, details: [] };
      apiSnapshot.models[model] = modelSnapshot;
    }
    modelSnapshot.total_requests++;
    modelSnapshot.total_tokens += tokens;
    modelSnapshot.details.push(detail);

    const day = detail.timestamp.slice(0, 10);
    const hour = detail.timestamp.slice(11, 13);
    increment(s.requests_by_day, day, 1);
    increment(s.requests_by_hour, hour, 1);
    increment(s.tokens_by_day, day, tokens);
    increment(s.tokens_by_hour, hour, tokens);
  }
}
