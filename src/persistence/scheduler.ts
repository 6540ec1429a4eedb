import { MAX_TIMER_DELAY_MS } from "../config/duration.js";
import { PersistenceError, errorMessage } from "../errors.js";
import { createLogger, type Logger } from "../logging/index.js";
import type { MergeOutcome } from "../usage/schema.js";
import type { SnapshotStore } from "../usage/statistics.js";
import {
  CURRENT_VERSION,
  UsageFileCodec,
  type PersistedEnvelope,
  type SnapshotCodec,
} from "./codec.js";
import { resolvePath } from "./path.js";

export type SchedulerState = "idle" | "running" | "stopping" | "stopped";

export interface UsagePersistenceSchedulerOptions {
  /** 保存先。先頭の `~` はホームディレクトリに展開される */
  filePath: string;
  /** 定期保存の間隔（ミリ秒）。0 以下なら定期保存しない */
  intervalMs: number;
  restoreOnStart: boolean;
  store?: SnapshotStore;
  codec?: SnapshotCodec;
  logger?: Logger;
  homeDir?: () => string;
  now?: () => Date;
}

/**
 * 使用量スナップショットをファイルへ定期保存するスケジューラー。
 *
 * idle → running → stopping → stopped の順にのみ遷移し、停止後の再開はできない。
 * 保存は 1 本の Promise チェーンで直列化されるため、定期保存と終了時保存が
 * 同時にファイルを書くことはない。
 */
export class UsagePersistenceScheduler {
  readonly filePath: string;
  readonly intervalMs: number;
  readonly restoreOnStart: boolean;

  private readonly store?: SnapshotStore;
  private readonly codec: SnapshotCodec;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private currentState: SchedulerState = "idle";
  private timer?: NodeJS.Timeout;
  private restoring?: Promise<void>;
  private saveChain: Promise<void> = Promise.resolve();
  private stopping?: Promise<void>;

  constructor(options: UsagePersistenceSchedulerOptions) {
    this.filePath = resolvePath(options.filePath, options.homeDir);
    this.intervalMs = options.intervalMs;
    this.restoreOnStart = options.restoreOnStart;
    this.store = options.store;
    this.logger = options.logger ?? createLogger("usage");
    this.codec = options.codec ?? new UsageFileCodec({ logger: this.logger });
    this.now = options.now ?? (() => new Date());
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /** 定期保存タスクが動作中か */
  get periodic(): boolean {
    return this.timer !== undefined;
  }

  async start(): Promise<void> {
    if (this.currentState !== "idle") {
      this.logger.warn(`usage: persistence already ${this.currentState}, ignoring start`);
      return;
    }
    this.currentState = "running";

    if (this.restoreOnStart) {
      this.restoring = this.restore();
      await this.restoring;
      this.restoring = undefined;
    }

    // restore 中に stop された
    if (this.currentState !== "running") return;

    if (this.intervalMs <= 0) return;
    if (this.intervalMs > MAX_TIMER_DELAY_MS) {
      this.logger.warn(
        `usage: save interval ${this.intervalMs}ms exceeds the timer limit, disabling periodic save`,
      );
      return;
    }

    this.timer = setInterval(() => {
      this.save().catch((err) => {
        this.logger.error(`usage: periodic save failed: ${errorMessage(err)}`);
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  /**
   * 定期保存を止め、最後に 1 回保存する。
   * 2 回目以降の呼び出しは最初の呼び出しと同じ Promise を返し、保存は行わない。
   * 保存の失敗はログに記録するだけで reject しない。
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /** 現在のスナップショットを保存する。ストア未設定なら何もしない */
  save(): Promise<void> {
    const run = this.saveChain.then(() => this.writeSnapshot());
    // 失敗は呼び出し元へ返し、チェーン自体は継続させる
    this.saveChain = run.catch(() => undefined);
    return run;
  }

  /**
   * ファイルから復元してストアにマージする。
   * ファイルがない場合は null。読み込みエラーはそのまま投げる。
   */
  async load(): Promise<MergeOutcome | null> {
    const envelope = await this.codec.load(this.filePath);
    if (!envelope || !this.store) return null;

    const result = this.store.mergeSnapshot(envelope.data);
    this.logger.info(
      `usage: restored from ${this.filePath} (added=${result.added}, skipped=${result.skipped})`,
    );
    return result;
  }

  /** 保存先ディレクトリへの書き込み可否 */
  checkHealth(): Promise<{ ok: boolean; error?: string }> {
    return this.codec.checkHealth(this.filePath);
  }

  private async restore(): Promise<void> {
    try {
      await this.load();
    } catch (err) {
      this.logger.warn(`usage: failed to restore from ${this.filePath}: ${errorMessage(err)}`);
    }
  }

  private async shutdown(): Promise<void> {
    this.currentState = "stopping";
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.restoring) {
      await this.restoring;
    }

    try {
      await this.save();
    } catch (err) {
      this.logger.error(`usage: final save failed: ${errorMessage(err)}`);
    }
    this.currentState = "stopped";
  }

  private async writeSnapshot(): Promise<void> {
    if (!this.store) return;

    const snapshot = this.store.snapshot();
    const envelope: PersistedEnvelope = {
      version: CURRENT_VERSION,
      saved_at: this.now().toISOString(),
      data: snapshot,
    };

    try {
      await this.codec.save(this.filePath, envelope);
    } catch (err) {
      throw new PersistenceError(
        `save usage statistics to ${this.filePath}: ${errorMessage(err)}`,
        { path: this.filePath, cause: err },
      );
    }

    this.logger.debug(
      `usage: saved statistics to ${this.filePath} (requests=${snapshot.total_requests}, tokens=${snapshot.total_tokens})`,
    );
  }
}
