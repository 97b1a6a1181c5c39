// src/server.ts
import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import multer from "multer";
import { z } from "zod";
import type { CourseService } from "./service.js";
import { CourseUpdateSchema } from "./types.js";
import { CourseError, httpStatusOf } from "./errors.js";

const CourseFormSchema = z.object({
  name: z.string(),
  description: z.string(),
  level: z.string()
});

export type AppOptions = {
  service: CourseService;
  corsOrigins?: string[];
  logRequests?: boolean;
};

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler.
const wrap = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res, next).catch(next);
};

function badRequest(res: Response, detail: string) {
  res.status(400).json({ detail });
}

function describeIssues(err: z.ZodError): string {
  return err.issues.map(i => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

export function createApp({ service, corsOrigins = ["*"], logRequests = true }: AppOptions) {
  const app = express();
  const upload = multer({ storage: multer.memoryStorage(), defParamCharset: "utf8" });

  app.use(
    cors({
      origin: corsOrigins.includes("*") ? true : corsOrigins,
      credentials: true,
      methods: ["GET", "POST", "PUT", "DELETE"],
      allowedHeaders: ["X-Custom-Header"]
    })
  );
  if (logRequests) {
    app.use((req, _res, next) => {
      console.log(`${req.method} ${req.url}`);
      next();
    });
  }

  app.post(
    "/courses",
    upload.single("file"),
    wrap(async (req, res) => {
      const form = CourseFormSchema.safeParse(req.body);
      if (!form.success) return badRequest(res, describeIssues(form.error));
      if (!req.file) return badRequest(res, "file: Required");

      const course = await service.create({
        ...form.data,
        filename: req.file.originalname,
        content: req.file.buffer
      });
      res.json(course);
    })
  );

  app.get(
    "/courses",
    wrap(async (_req, res) => {
      res.json(await service.list());
    })
  );

  app.get(
    "/courses/:name",
    wrap(async (req, res) => {
      res.json(await service.getByName(req.params.name));
    })
  );

  app.put(
    "/courses/:name",
    express.json(),
    wrap(async (req, res) => {
      const body = CourseUpdateSchema.safeParse(req.body);
      if (!body.success) return badRequest(res, describeIssues(body.error));
      res.json(await service.update(req.params.name, body.data));
    })
  );

  app.delete(
    "/courses/:name",
    wrap(async (req, res) => {
      res.json(await service.delete(req.params.name));
    })
  );

  app.get(
    "/courses/:name/download",
    wrap(async (req, res, next) => {
      const { stream, filename } = await service.resolveDownload(req.params.name);
      res.attachment(filename);
      res.type("application/pdf");
      stream.on("error", next);
      stream.pipe(res);
    })
  );

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);

    if (err instanceof multer.MulterError || err instanceof SyntaxError) {
      return badRequest(res, err.message);
    }
    const status = httpStatusOf(err);
    if (status >= 500) console.error("Request failed:", err);
    const detail = err instanceof CourseError && status < 500 ? err.message : "Internal server error";
    res.status(status).json({ detail });
  });

  return app;
}
