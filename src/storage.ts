// src/storage.ts
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import { CourseSchema, type Course } from "./types.js";
import { StorageFailureError } from "./errors.js";

export interface CourseStore {
  readAll(): Promise<Course[]>;
  writeAll(records: Course[]): Promise<void>;
  saveBlob(originalFilename: string, content: Buffer): Promise<string>;
  blobExists(blobPath: string): Promise<boolean>;
  ownsBlob(blobPath: string): boolean;
  openBlob(blobPath: string): Readable;
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export function parseTable(raw: string, source: string): Course[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    console.warn(`Malformed course table, treating as empty: ${source}`);
    return [];
  }
  if (!Array.isArray(data)) {
    console.warn(`Course table is not an array, treating as empty: ${source}`);
    return [];
  }

  const courses: Course[] = [];
  data.forEach((entry, i) => {
    const parsed = CourseSchema.safeParse(entry);
    if (parsed.success) courses.push(parsed.data);
    else console.warn(`Skipping invalid course record #${i} in ${source}`);
  });
  return courses;
}

export class JsonFileCourseStore implements CourseStore {
  constructor(
    private readonly tablePath: string,
    private readonly uploadDir: string
  ) {}

  async readAll(): Promise<Course[]> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.tablePath, "utf-8");
    } catch (err) {
      if (isErrno(err) && err.code === "ENOENT") return [];
      throw new StorageFailureError(`Cannot read ${this.tablePath}`, err);
    }
    return parseTable(raw, this.tablePath);
  }

  async writeAll(records: Course[]): Promise<void> {
    const dir = path.dirname(this.tablePath);
    const tmp = `${this.tablePath}.${process.pid}.tmp`;
    try {
      await fsp.mkdir(dir, { recursive: true });
      await fsp.writeFile(tmp, JSON.stringify(records, null, 2), "utf-8");
      await fsp.rename(tmp, this.tablePath);
    } catch (err) {
      throw new StorageFailureError(`Cannot write ${this.tablePath}`, err);
    }
  }

  async saveBlob(originalFilename: string, content: Buffer): Promise<string> {
    const blobPath = path.join(this.uploadDir, path.basename(originalFilename));
    try {
      await fsp.mkdir(this.uploadDir, { recursive: true });
      await fsp.writeFile(blobPath, content);
    } catch (err) {
      throw new StorageFailureError(`Cannot store ${blobPath}`, err);
    }
    return blobPath;
  }

  async blobExists(blobPath: string): Promise<boolean> {
    try {
      const st = await fsp.stat(blobPath);
      return st.isFile();
    } catch (err) {
      if (isErrno(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) return false;
      throw new StorageFailureError(`Cannot stat ${blobPath}`, err);
    }
  }

  // True for a file directly inside the upload directory, the only place
  // saveBlob writes to.
  ownsBlob(blobPath: string): boolean {
    const rel = path.relative(path.resolve(this.uploadDir), path.resolve(blobPath));
    return rel !== "" && rel === path.basename(rel) && rel !== "..";
  }

  openBlob(blobPath: string): Readable {
    return fs.createReadStream(blobPath);
  }
}
