// src/service.ts
import path from "node:path";
import type { Readable } from "node:stream";
import type { CourseStore } from "./storage.js";
import type { Course, CourseChange, CourseUpdate, NewCourse } from "./types.js";
import { InvalidInputError, NotFoundError } from "./errors.js";
import { SerialQueue, isPdfFilename } from "./utils.js";

export type CourseServiceOptions = {
  now?: () => Date;
  notify?: (change: CourseChange) => Promise<void>;
};

export type CourseDownload = {
  stream: Readable;
  filename: string;
};

const courseNotFound = () => new NotFoundError("course", "Course not found");

/**
 * CRUD over the course table. Each mutation reads the whole table, edits it
 * in memory and writes it back; mutations go through a single-writer queue
 * so two requests in this process never interleave their read and write.
 * Change notifications are sent once the write has settled.
 * Lookups are linear and first-match wins when names repeat.
 */
export class CourseService {
  private readonly writes = new SerialQueue();
  private readonly now: () => Date;
  private readonly notify?: (change: CourseChange) => Promise<void>;

  constructor(private readonly store: CourseStore, options: CourseServiceOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.notify = options.notify;
  }

  async create(input: NewCourse): Promise<Course> {
    if (!isPdfFilename(input.filename)) {
      throw new InvalidInputError("File must be a PDF");
    }

    const created = await this.writes.run(async () => {
      const pdfPath = await this.store.saveBlob(input.filename, input.content);
      const stamp = this.now().toISOString();
      const course: Course = {
        name: input.name,
        description: input.description,
        pdf_path: pdfPath,
        level: input.level,
        created_at: stamp,
        updated_at: stamp
      };

      const courses = await this.store.readAll();
      courses.push(course);
      await this.store.writeAll(courses);
      return course;
    });
    this.announce({ kind: "created", course: created });
    return created;
  }

  list(): Promise<Course[]> {
    return this.store.readAll();
  }

  async getByName(name: string): Promise<Course> {
    const courses = await this.store.readAll();
    const course = courses.find(c => c.name === name);
    if (!course) throw courseNotFound();
    return course;
  }

  async update(name: string, changes: CourseUpdate): Promise<Course> {
    const updated = await this.writes.run(async () => {
      const courses = await this.store.readAll();
      const idx = courses.findIndex(c => c.name === name);
      const current = courses[idx];
      if (!current) throw courseNotFound();
      if (!this.store.ownsBlob(changes.pdf_path)) {
        throw new InvalidInputError("pdf_path must name a file in the upload directory");
      }

      const course: Course = {
        ...current,
        description: changes.description,
        pdf_path: changes.pdf_path,
        level: changes.level,
        updated_at: this.now().toISOString()
      };
      courses[idx] = course;
      await this.store.writeAll(courses);
      return course;
    });
    this.announce({ kind: "updated", course: updated });
    return updated;
  }

  async delete(name: string): Promise<Course> {
    const deleted = await this.writes.run(async () => {
      const courses = await this.store.readAll();
      const idx = courses.findIndex(c => c.name === name);
      const [course] = idx === -1 ? [] : courses.splice(idx, 1);
      if (!course) throw courseNotFound();

      // The PDF is left in the upload directory.
      await this.store.writeAll(courses);
      return course;
    });
    this.announce({ kind: "deleted", course: deleted });
    return deleted;
  }

  async resolveDownload(name: string): Promise<CourseDownload> {
    const course = await this.getByName(name);
    // A table edited by hand may point anywhere; only upload-directory files are served.
    if (!this.store.ownsBlob(course.pdf_path) || !(await this.store.blobExists(course.pdf_path))) {
      throw new NotFoundError("file", "PDF file not found");
    }
    return {
      stream: this.store.openBlob(course.pdf_path),
      filename: path.basename(course.pdf_path)
    };
  }

  // Not awaited: the caller gets its result while the webhook is in flight.
  private announce(change: CourseChange) {
    const notify = this.notify;
    if (!notify) return;
    void Promise.resolve()
      .then(() => notify(change))
      .catch(e => {
        console.error(`Change notification failed (${change.kind} ${change.course.name})`, e);
      });
  }
}
