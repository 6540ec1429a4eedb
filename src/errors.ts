export class UsageKeeperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UsageKeeperError";
  }
}

export class PersistenceError extends UsageKeeperError {
  readonly path: string;

  constructor(message: string, options: { path: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = "PersistenceError";
    this.path = options.path;
  }
}

export class SerializationError extends PersistenceError {
  constructor(message: string, options: { path: string; cause?: unknown }) {
    super(message, options);
    this.name = "SerializationError";
  }
}

export class CorruptFileError extends PersistenceError {
  /** 退避先。リネームに失敗した場合は undefined */
  readonly quarantinePath?: string;

  constructor(
    message: string,
    options: { path: string; quarantinePath?: string; cause?: unknown },
  ) {
    super(message, { path: options.path, cause: options.cause });
    this.name = "CorruptFileError";
    this.quarantinePath = options.quarantinePath;
  }
}

export class UnsupportedVersionError extends PersistenceError {
  readonly version: number;

  constructor(message: string, options: { path: string; version: number }) {
    super(message, { path: options.path });
    this.name = "UnsupportedVersionError";
    this.version = options.version;
  }
}

export class ConfigError extends UsageKeeperError {
  readonly configPath?: string;

  constructor(
    message: string,
    options: { configPath?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ConfigError";
    this.configPath = options.configPath;
  }
}

export class DurationParseError extends UsageKeeperError {
  readonly input: string;

  constructor(message: string, options: { input: string }) {
    super(message);
    this.name = "DurationParseError";
    this.input = options.input;
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && typeof (err as { code?: unknown }).code === "string";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
