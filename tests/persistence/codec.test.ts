import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import {
  UsageFileCodec,
  ZERO_TIME,
  formatQuarantineStamp,
  type PersistedEnvelope,
} from "../../src/persistence/codec.js";
import { FileSystemStorage } from "../../src/storage/fs.js";
import {
  CorruptFileError,
  PersistenceError,
  SerializationError,
  UnsupportedVersionError,
} from "../../src/errors.js";
import { silentLogger } from "../../src/logging/logger.js";
import { RequestStatistics } from "../../src/usage/statistics.js";
import { emptySnapshot } from "../../src/usage/schema.js";

const NOW = new Date(2026, 0, 2, 3, 4, 5);

function makeEnvelope(): PersistedEnvelope {
  const stats = new RequestStatistics();
  stats.record({
    api: "openai",
    model: "gpt-4o",
    timestamp: new Date("2026-01-01T00:00:00Z"),
    tokens: { input_tokens: 3, output_tokens: 4 },
  });
  return { version: 1, saved_at: "2026-01-02T00:00:00.000Z", data: stats.snapshot() };
}

class FlakyStorage extends FileSystemStorage {
  failOn: "rename" | "write" | "ensureDir" | null = null;

  override async rename(from: string, to: string): Promise<void> {
    if (this.failOn === "rename") throw new Error("rename boom");
    return super.rename(from, to);
  }

  override async writeText(
    filePath: string,
    content: string,
    options?: { mode?: number; dirMode?: number },
  ): Promise<void> {
    if (this.failOn === "write") throw new Error("disk full");
    return super.writeText(filePath, content, options);
  }

  override async ensureDir(dir: string, mode?: number): Promise<void> {
    if (this.failOn === "ensureDir") throw new Error("permission denied");
    return super.ensureDir(dir, mode);
  }
}

describe("UsageFileCodec", () => {
  let tmpDir: string;
  let file: string;
  let storage: FlakyStorage;
  let codec: UsageFileCodec;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "usage-codec-"));
    file = path.join(tmpDir, "state", "usage.json");
    storage = new FlakyStorage();
    codec = new UsageFileCodec({ storage, logger: silentLogger, now: () => NOW });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("save", () => {
    it("writes an indented envelope with snake_case fields", async () => {
      const envelope = makeEnvelope();
      await codec.save(file, envelope);

      const raw = await fs.readFile(file, "utf-8");
      expect(raw).toBe(JSON.stringify(envelope, null, 2));
      const parsed = JSON.parse(raw);
      expect(Object.keys(parsed)).toEqual(["version", "saved_at", "data"]);
      expect(parsed.data.total_tokens).toBe(7);
    });

    it("creates the parent directory and files with owner-only modes", async () => {
      await codec.save(file, makeEnvelope());
      const dirStat = await fs.stat(path.dirname(file));
      const fileStat = await fs.stat(file);
      expect(dirStat.mode & 0o777).toBe(0o700);
      expect(fileStat.mode & 0o777).toBe(0o600);
    });

    it("leaves no temp file behind", async () => {
      await codec.save(file, makeEnvelope());
      expect(await fs.readdir(path.dirname(file))).toEqual(["usage.json"]);
    });

    it("removes the temp file and keeps the previous file when rename fails", async () => {
      const first = makeEnvelope();
      await codec.save(file, first);

      storage.failOn = "rename";
      const second = { ...makeEnvelope(), data: emptySnapshot() };
      const err = await codec.save(file, second).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(PersistenceError);
      expect((err as PersistenceError).message).toBe("rename temp file: rename boom");
      expect((err as PersistenceError).path).toBe(file);
      expect(await fs.readdir(path.dirname(file))).toEqual(["usage.json"]);
      expect(JSON.parse(await fs.readFile(file, "utf-8"))).toEqual(first);
    });

    it("reports temp file write failures", async () => {
      storage.failOn = "write";
      await expect(codec.save(file, makeEnvelope())).rejects.toThrow(
        "write temp file: disk full",
      );
    });

    it("reports directory creation failures", async () => {
      storage.failOn = "ensureDir";
      await expect(codec.save(file, makeEnvelope())).rejects.toThrow(
        `create directory ${path.dirname(file)}: permission denied`,
      );
    });

    it("reports serialization failures", async () => {
      const envelope = makeEnvelope();
      Object.defineProperty(envelope.data, "total_requests", {
        enumerable: true,
        get() {
          throw new Error("boom");
        },
      });
      const err = await codec.save(file, envelope).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SerializationError);
      expect((err as SerializationError).message).toBe("marshal usage data: boom");
    });
  });

  describe("load", () => {
    it("round-trips a saved envelope", async () => {
      const envelope = makeEnvelope();
      await codec.save(file, envelope);
      expect(await codec.load(file)).toEqual(envelope);
    });

    it("returns null when the file does not exist", async () => {
      expect(await codec.load(file)).toBeNull();
    });

    it("quarantines unparsable files", async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, "not json {");

      const err = await codec.load(file).catch((e: unknown) => e);

      const quarantinePath = `${file}.corrupt.20260102-030405`;
      expect(err).toBeInstanceOf(CorruptFileError);
      expect((err as CorruptFileError).quarantinePath).toBe(quarantinePath);
      expect(await fs.readFile(quarantinePath, "utf-8")).toBe("not json {");
      await expect(fs.access(file)).rejects.toThrow();
    });

    it("quarantines JSON that is not an envelope", async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, JSON.stringify({ version: "one", data: {} }));

      await expect(codec.load(file)).rejects.toBeInstanceOf(CorruptFileError);
      expect(await fs.readdir(path.dirname(file))).toEqual([
        "usage.json.corrupt.20260102-030405",
      ]);
    });

    it("quarantines a version 1 envelope with invalid data", async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(
        file,
        JSON.stringify({ version: 1, saved_at: "x", data: { total_requests: "many" } }),
      );
      await expect(codec.load(file)).rejects.toBeInstanceOf(CorruptFileError);
    });

    it("still reports corruption when the quarantine rename fails", async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, "garbage");
      storage.failOn = "rename";

      const err = await codec.load(file).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CorruptFileError);
      expect((err as CorruptFileError).quarantinePath).toBeUndefined();
      expect(await fs.readFile(file, "utf-8")).toBe("garbage");
    });

    it("rejects unsupported versions without touching the file", async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      const content = JSON.stringify({ ...makeEnvelope(), version: 2 });
      await fs.writeFile(file, content);

      const err = await codec.load(file).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UnsupportedVersionError);
      expect((err as UnsupportedVersionError).version).toBe(2);
      expect((err as UnsupportedVersionError).message).toBe("unsupported version: 2");
      expect(await fs.readdir(path.dirname(file))).toEqual(["usage.json"]);
      expect(await fs.readFile(file, "utf-8")).toBe(content);
    });

    const unsupported: Array<[string, Record<string, unknown>, number]> = [
      ["a bare version", { version: 2 }, 2],
      ["a version with partial data", { version: 2, data: {} }, 2],
      ["an envelope without a version", { data: { total_requests: 1 } }, 0],
    ];

    it.each(unsupported)("rejects %s as unsupported and leaves it in place", async (_name, body, version) => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      const content = JSON.stringify(body);
      await fs.writeFile(file, content);

      const err = await codec.load(file).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UnsupportedVersionError);
      expect((err as UnsupportedVersionError).message).toBe(`unsupported version: ${version}`);
      expect(await fs.readdir(path.dirname(file))).toEqual(["usage.json"]);
      expect(await fs.readFile(file, "utf-8")).toBe(content);
    });

    it("defaults a missing timestamp and missing data in a version 1 file", async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, JSON.stringify({ version: 1 }));

      expect(await codec.load(file)).toEqual({
        version: 1,
        saved_at: ZERO_TIME,
        data: emptySnapshot(),
      });
    });

    it("leaves a corrupt file in place when quarantine is off", async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, "not json {");
      const readOnly = new UsageFileCodec({ storage, logger: silentLogger, quarantine: false });

      const err = await readOnly.load(file).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CorruptFileError);
      expect((err as CorruptFileError).quarantinePath).toBeUndefined();
      expect(await fs.readdir(path.dirname(file))).toEqual(["usage.json"]);
    });

    it("fills missing snapshot fields with zero values", async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(
        file,
        JSON.stringify({ version: 1, saved_at: "2026-01-01T00:00:00Z", data: { total_requests: 3 } }),
      );
      const envelope = await codec.load(file);
      expect(envelope).toEqual({
        version: 1,
        saved_at: "2026-01-01T00:00:00Z",
        data: { ...emptySnapshot(), total_requests: 3 },
      });
    });
  });

  describe("checkHealth", () => {
    it("reports a writable location and removes the probe", async () => {
      expect(await codec.checkHealth(file)).toEqual({ ok: true });
      expect(await fs.readdir(path.dirname(file))).toEqual([]);
    });

    it("reports write failures", async () => {
      storage.failOn = "write";
      expect(await codec.checkHealth(file)).toEqual({ ok: false, error: "disk full" });
    });
  });
});

describe("formatQuarantineStamp", () => {
  it("formats local time as YYYYMMDD-HHMMSS", () => {
    expect(formatQuarantineStamp(new Date(2026, 10, 9, 8, 7, 6))).toBe("20261109-080706");
  });
});
