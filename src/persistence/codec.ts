import * as path from "node:path";
import { z } from "zod";
import {
  CorruptFileError,
  PersistenceError,
  SerializationError,
  UnsupportedVersionError,
  errorMessage,
} from "../errors.js";
import { createLogger, type Logger } from "../logging/index.js";
import { FileSystemStorage } from "../storage/fs.js";
import type { DataStorage } from "../storage/storage.js";
import { StatisticsSnapshotSchema, type StatisticsSnapshot } from "../usage/schema.js";

export const CURRENT_VERSION = 1;
export const TEMP_SUFFIX = ".tmp";
export const CORRUPT_SUFFIX = ".corrupt.";

const DIR_MODE = 0o700;
const FILE_MODE = 0o600;

/** 永続化ファイルのエンベロープ */
export interface PersistedEnvelope {
  version: number;
  saved_at: string;
  data: StatisticsSnapshot;
}

/** スケジューラーが必要とするファイル入出力 */
export interface SnapshotCodec {
  save(filePath: string, envelope: PersistedEnvelope): Promise<void>;
  load(filePath: string): Promise<PersistedEnvelope | null>;
  checkHealth(filePath: string): Promise<{ ok: boolean; error?: string }>;
}

/** saved_at がないファイルに補う時刻 */
export const ZERO_TIME = "0001-01-01T00:00:00Z";

// version がなければ 0 とみなし、バージョン判定より前に他の項目は見ない
const EnvelopeVersionSchema = z.object({
  version: z.number().int().default(0),
});

const EnvelopeBodySchema = z.object({
  saved_at: z.string().default(ZERO_TIME),
  data: StatisticsSnapshotSchema.default({}),
});

export interface UsageFileCodecOptions {
  storage?: DataStorage;
  logger?: Logger;
  now?: () => Date;
  /** false なら壊れたファイルを退避せずにエラーだけ投げる（読み取り専用の利用向け） */
  quarantine?: boolean;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** 退避ファイル名用のローカル時刻 YYYYMMDD-HHMMSS */
export function formatQuarantineStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * 使用量スナップショットの JSON ファイル入出力。
 * 書き込みは一時ファイル + rename で行い、読み手が書きかけのファイルを見ることはない。
 */
export class UsageFileCodec implements SnapshotCodec {
  private readonly storage: DataStorage;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly quarantineCorrupt: boolean;

  constructor(options: UsageFileCodecOptions = {}) {
    this.storage = options.storage ?? new FileSystemStorage();
    this.logger = options.logger ?? createLogger("usage");
    this.now = options.now ?? (() => new Date());
    this.quarantineCorrupt = options.quarantine ?? true;
  }

  async save(filePath: string, envelope: PersistedEnvelope): Promise<void> {
    let json: string;
    try {
      json = JSON.stringify(envelope, null, 2);
    } catch (err) {
      throw new SerializationError(`marshal usage data: ${errorMessage(err)}`, {
        path: filePath,
        cause: err,
      });
    }

    const dir = path.dirname(filePath);
    try {
      await this.storage.ensureDir(dir, DIR_MODE);
    } catch (err) {
      throw new PersistenceError(`create directory ${dir}: ${errorMessage(err)}`, {
        path: filePath,
        cause: err,
      });
    }

    const tempPath = filePath + TEMP_SUFFIX;
    try {
      await this.storage.writeText(tempPath, json, { mode: FILE_MODE, dirMode: DIR_MODE });
    } catch (err) {
      throw new PersistenceError(`write temp file: ${errorMessage(err)}`, {
        path: filePath,
        cause: err,
      });
    }

    try {
      await this.storage.rename(tempPath, filePath);
    } catch (err) {
      await this.removeTemp(tempPath);
      throw new PersistenceError(`rename temp file: ${errorMessage(err)}`, {
        path: filePath,
        cause: err,
      });
    }
  }

  /**
   * ファイルを読み込みエンベロープを返す。ファイルがなければ null。
   * 解析できないファイルは退避してから CorruptFileError を投げる。
   */
  async load(filePath: string): Promise<PersistedEnvelope | null> {
    let raw: string | null;
    try {
      raw = await this.storage.readText(filePath);
    } catch (err) {
      throw new PersistenceError(`read file ${filePath}: ${errorMessage(err)}`, {
        path: filePath,
        cause: err,
      });
    }
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      return this.quarantine(filePath, err);
    }

    const header = EnvelopeVersionSchema.safeParse(parsed);
    if (!header.success) {
      return this.quarantine(filePath, header.error);
    }

    const { version } = header.data;
    if (version !== CURRENT_VERSION) {
      throw new UnsupportedVersionError(`unsupported version: ${version}`, {
        path: filePath,
        version,
      });
    }

    const body = EnvelopeBodySchema.safeParse(parsed);
    if (!body.success) {
      return this.quarantine(filePath, body.error);
    }

    return { version, saved_at: body.data.saved_at, data: body.data.data };
  }

  /** 保存先に書き込めるかを確認する */
  async checkHealth(filePath: string): Promise<{ ok: boolean; error?: string }> {
    const probePath = `${filePath}.health`;
    try {
      await this.storage.writeText(probePath, "ok", { mode: FILE_MODE, dirMode: DIR_MODE });
      const result = await this.storage.readText(probePath);
      await this.storage.deleteFile(probePath);
      return { ok: result === "ok" };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  private async quarantine(filePath: string, cause: unknown): Promise<never> {
    if (!this.quarantineCorrupt) {
      throw new CorruptFileError(`unmarshal usage data: ${errorMessage(cause)}`, {
        path: filePath,
        cause,
      });
    }
    const quarantinePath = filePath + CORRUPT_SUFFIX + formatQuarantineStamp(this.now());
    let moved = false;
    try {
      await this.storage.rename(filePath, quarantinePath);
      moved = true;
      this.logger.warn(`usage: corrupt file backed up to ${quarantinePath}`);
    } catch (err) {
      this.logger.warn(`usage: failed to back up corrupt file ${filePath}: ${errorMessage(err)}`);
    }
    throw new CorruptFileError(`unmarshal usage data: ${errorMessage(cause)}`, {
      path: filePath,
      quarantinePath: moved ? quarantinePath : undefined,
      cause,
    });
  }

  private async removeTemp(tempPath: string): Promise<void> {
    try {
      await this.storage.deleteFile(tempPath);
    } catch (err) {
      this.logger.warn(`usage: failed to remove temp file ${tempPath}: ${errorMessage(err)}`);
    }
  }
}
