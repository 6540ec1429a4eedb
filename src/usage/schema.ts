import { z } from "zod";

const counter = z.number().int().nonnegative().default(0);
const counterMap = z.record(z.number()).default({});

export const TokenStatsSchema = z.object({
  input_tokens: counter,
  output_tokens: counter,
  reasoning_tokens: counter,
  cached_tokens: counter,
  total_tokens: counter,
});

export const RequestDetailSchema = z.object({
  timestamp: z.string(),
  source: z.string().default(""),
  auth_index: z.string().default(""),
  tokens: TokenStatsSchema.default({}),
  failed: z.boolean().default(false),
});

export const ModelSnapshotSchema = z.object({
  total_requests: counter,
  total_tokens: counter,
  details: z.array(RequestDetailSchema).default([]),
});

export const ApiSnapshotSchema = z.object({
  total_requests: counter,
  total_tokens: counter,
  models: z.record(ModelSnapshotSchema).default({}),
});

export const StatisticsSnapshotSchema = z.object({
  total_requests: counter,
  success_count: counter,
  failure_count: counter,
  total_tokens: counter,
  apis: z.record(ApiSnapshotSchema).default({}),
  requests_by_day: counterMap,
  requests_by_hour: counterMap,
  tokens_by_day: counterMap,
  tokens_by_hour: counterMap,
});

export type TokenStats = z.infer<typeof TokenStatsSchema>;
export type RequestDetail = z.infer<typeof RequestDetailSchema>;
export type ModelSnapshot = z.infer<typeof ModelSnapshotSchema>;
export type ApiSnapshot = z.infer<typeof ApiSnapshotSchema>;
export type StatisticsSnapshot = z.infer<typeof StatisticsSnapshotSchema>;

/** 1 リクエスト分の使用量（HTTP 受付・record 用） */
export const UsageRecordParamsSchema = z.object({
  api: z.string().min(1),
  model: z.string().min(1),
  source: z.string().optional(),
  auth_index: z.string().optional(),
  failed: z.boolean().optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
  tokens: z
    .object({
      input_tokens: z.number().int().nonnegative().optional(),
      output_tokens: z.number().int().nonnegative().optional(),
      reasoning_tokens: z.number().int().nonnegative().optional(),
      cached_tokens: z.number().int().nonnegative().optional(),
      total_tokens: z.number().int().nonnegative().optional(),
    })
    .default({}),
});

export type UsageRecordParams = z.infer<typeof UsageRecordParamsSchema>;

export interface MergeOutcome {
  added: number;
  skipped: number;
}

export function emptySnapshot(): StatisticsSnapshot {
  return {
    total_requests: 0,
    success_count: 0,
    failure_count: 0,
    total_tokens: 0,
    apis: {},
    requests_by_day: {},
    requests_by_hour: {},
    tokens_by_day: {},
    tokens_by_hour: {},
  };
}
