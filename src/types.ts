// src/types.ts
import { z } from "zod";

export const CourseSchema = z.object({
  name: z.string(),
  description: z.string(),
  pdf_path: z.string(),
  level: z.string(),
  created_at: z.string(),
  updated_at: z.string()
});

export type Course = z.infer<typeof CourseSchema>;

// PUT body: a full Course is accepted, but only these fields are applied.
// Other keys are stripped on parse.
export const CourseUpdateSchema = CourseSchema.pick({
  description: true,
  pdf_path: true,
  level: true
});

export type CourseUpdate = z.infer<typeof CourseUpdateSchema>;

export type NewCourse = {
  name: string;
  description: string;
  level: string;
  filename: string;
  content: Buffer;
};

export type CourseChange =
  | { kind: "created"; course: Course }
  | { kind: "updated"; course: Course }
  | { kind: "deleted"; course: Course };
