export { createUsageApp } from "./app.js";
export type { UsageAppOptions } from "./app.js";
export { KeepAliveMonitor } from "./keep-alive.js";
export type { KeepAliveMonitorOptions } from "./keep-alive.js";
export { UsageService, listenWithNodeServer } from "./server.js";
export type { ListenFn, RunningServer, ServiceHooks, UsageServiceOptions } from "./server.js";
export {
  startService,
  waitForShutdown,
  onShutdownSignal,
  createPersistence,
  KEEP_ALIVE_TIMEOUT_MS,
  SHUTDOWN_SIGNALS,
} from "./lifecycle.js";
export type { SignalSource, ServiceRunner, StartServiceOptions } from "./lifecycle.js";
