import * as fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, errorMessage, isErrnoException } from "../errors.js";
import { LOG_LEVELS, type LogLevel } from "../logging/index.js";

export { MAX_TIMER_DELAY_MS, parseDuration, parseSaveInterval } from "./duration.js";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8317;

const ConfigFileSchema = z.object({
  host: z.string().min(1).default(DEFAULT_HOST),
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
  "log-level": z.enum(LOG_LEVELS).default("info"),
  "usage-statistics": z
    .object({
      "persist-file": z.string().default(""),
      "save-interval": z
        .union([z.string(), z.number()])
        .default("")
        .transform((v) => String(v)),
      "restore-on-start": z.boolean().default(false),
    })
    .default({}),
});

export interface UsageStatisticsConfig {
  /** 空文字なら永続化しない */
  persistFile: string;
  saveInterval: string;
  restoreOnStart: boolean;
}

export interface AppConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  usageStatistics: UsageStatisticsConfig;
}

export function defaultConfig(): AppConfig {
  return parseConfig("");
}

export function parseConfig(source: string, configPath?: string): AppConfig {
  let doc: unknown;
  try {
    doc = yaml.load(source);
  } catch (err) {
    throw new ConfigError(`parse config: ${errorMessage(err)}`, { configPath, cause: err });
  }

  const result = ConfigFileSchema.safeParse(doc ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid config: ${detail}`, { configPath, cause: result.error });
  }

  const raw = result.data;
  return {
    host: raw.host,
    port: raw.port,
    logLevel: raw["log-level"],
    usageStatistics: {
      persistFile: raw["usage-statistics"]["persist-file"],
      saveInterval: raw["usage-statistics"]["save-interval"],
      restoreOnStart: raw["usage-statistics"]["restore-on-start"],
    },
  };
}

export async function loadConfig(configPath: string): Promise<AppConfig> {
  let source: string;
  try {
    source = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    const reason =
      isErrnoException(err) && err.code === "ENOENT" ? "file not found" : errorMessage(err);
    throw new ConfigError(`read config ${configPath}: ${reason}`, { configPath, cause: err });
  }
  return parseConfig(source, configPath);
}
