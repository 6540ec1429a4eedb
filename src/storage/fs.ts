import * as fs from "node:fs/promises";
import * as path from "node:path";
import { isErrnoException } from "../errors.js";
import type { DataStorage, FileStats, WriteOptions } from "./storage.js";

export class FileSystemStorage implements DataStorage {
  readonly baseDir: string;

  constructor(baseDir: string = process.cwd()) {
    this.baseDir = baseDir;
  }

  private resolve(filePath: string): string {
    return path.resolve(this.baseDir, filePath);
  }

  async readText(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(this.resolve(filePath), "utf-8");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }
  }

  async writeText(
    filePath: string,
    content: string,
    options: WriteOptions = {},
  ): Promise<void> {
    const full = this.resolve(filePath);
    await this.ensureDir(path.dirname(full), options.dirMode);
    await fs.writeFile(full, content, { encoding: "utf-8", mode: options.mode });
  }

  async ensureDir(dir: string, mode?: number): Promise<void> {
    await fs.mkdir(this.resolve(dir), { recursive: true, mode });
  }

  async rename(from: string, to: string): Promise<void> {
    await fs.rename(this.resolve(from), this.resolve(to));
  }

  async stat(filePath: string): Promise<FileStats | null> {
    try {
      const s = await fs.stat(this.resolve(filePath));
      return {
        size: s.size,
        modifiedAt: s.mtime,
        createdAt: s.birthtime,
      };
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }
  }

  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(this.resolve(filePath));
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") return;
      throw err;
    }
  }
}
