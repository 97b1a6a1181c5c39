// src/errors.ts
export type CourseErrorKind = "InvalidInput" | "NotFound" | "StorageFailure";

export class CourseError extends Error {
  readonly kind: CourseErrorKind;

  constructor(kind: CourseErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CourseError";
    this.kind = kind;
  }
}

export class InvalidInputError extends CourseError {
  constructor(message: string) {
    super("InvalidInput", message);
    this.name = "InvalidInputError";
  }
}

export class NotFoundError extends CourseError {
  // "file": the record exists but its PDF is gone from disk
  readonly reason: "course" | "file";

  constructor(reason: "course" | "file", message: string) {
    super("NotFound", message);
    this.name = "NotFoundError";
    this.reason = reason;
  }
}

export class StorageFailureError extends CourseError {
  constructor(message: string, cause: unknown) {
    super("StorageFailure", message, { cause });
    this.name = "StorageFailureError";
  }
}

export function httpStatusOf(err: unknown): number {
  if (!(err instanceof CourseError)) return 500;
  switch (err.kind) {
    case "InvalidInput":
      return 400;
    case "NotFound":
      return 404;
    case "StorageFailure":
      return 500;
  }
}
