export type { DataStorage, FileStats, WriteOptions } from "./storage.js";
export { FileSystemStorage } from "./fs.js";
