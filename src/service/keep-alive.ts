export interface KeepAliveMonitorOptions {
  timeoutMs: number;
  onTimeout: () => void;
}

/**
 * 一定時間 touch されなければ onTimeout を 1 回だけ呼ぶ監視タイマー。
 */
export class KeepAliveMonitor {
  readonly timeoutMs: number;
  private readonly onTimeout: () => void;
  private timer?: NodeJS.Timeout;
  private fired = false;

  constructor(options: KeepAliveMonitorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.onTimeout = options.onTimeout;
  }

  get expired(): boolean {
    return this.fired;
  }

  start(): void {
    this.arm();
  }

  touch(): void {
    this.arm();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private arm(): void {
    if (this.fired) return;
    this.stop();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.fired = true;
      this.onTimeout();
    }, this.timeoutMs);
    this.timer.unref();
  }
}
