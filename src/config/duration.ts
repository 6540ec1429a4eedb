import { DurationParseError } from "../errors.js";

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3,
  "μs": 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/** setInterval / setTimeout が受け付ける最大の遅延（ミリ秒） */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

const SEGMENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/;

/**
 * "1h30m" や "250ms" 形式の期間文字列をミリ秒に変換する。
 * 単位なしで許されるのは "0" のみ。
 */
export function parseDuration(input: string): number {
  let rest = input.trim();
  if (rest === "") {
    throw new DurationParseError(`invalid duration ${JSON.stringify(input)}`, { input });
  }

  let sign = 1;
  if (rest[0] === "-" || rest[0] === "+") {
    if (rest[0] === "-") sign = -1;
    rest = rest.slice(1);
  }
  if (rest === "0") return 0;
  if (rest === "") {
    throw new DurationParseError(`invalid duration ${JSON.stringify(input)}`, { input });
  }

  let total = 0;
  while (rest.length > 0) {
    const match = SEGMENT.exec(rest);
    if (!match) {
      throw new DurationParseError(`invalid duration ${JSON.stringify(input)}`, { input });
    }
    total += Number(match[1]) * UNIT_MS[match[2]];
    rest = rest.slice(match[0].length);
  }
  return sign * total;
}

/**
 * 保存間隔の設定値を解釈する。
 * 空文字・不正値・0 以下はいずれも 0（定期保存なし）。
 * 空でも "0" でもない値が 0 以下になった場合は invalid を立てる。
 * タイマーの上限を超える値も invalid。
 */
export function parseSaveInterval(value: string): { intervalMs: number; invalid: boolean } {
  let intervalMs = 0;
  try {
    intervalMs = value === "" ? 0 : parseDuration(value);
  } catch {
    intervalMs = 0;
  }
  if (intervalMs > 0 && intervalMs <= MAX_TIMER_DELAY_MS) return { intervalMs, invalid: false };
  return { intervalMs: 0, invalid: value !== "" && value !== "0" };
}
