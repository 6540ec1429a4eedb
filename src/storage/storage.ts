export interface FileStats {
  size: number;
  modifiedAt: Date;
  createdAt: Date;
}

export interface WriteOptions {
  /** 新規作成時のファイルパーミッション */
  mode?: number;
  /** 親ディレクトリを作成する際のパーミッション */
  dirMode?: number;
}

export interface DataStorage {
  readText(path: string): Promise<string | null>;
  writeText(path: string, content: string, options?: WriteOptions): Promise<void>;
  ensureDir(dir: string, mode?: number): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  stat(path: string): Promise<FileStats | null>;
  deleteFile(path: string): Promise<void>;
}
