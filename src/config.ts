// src/config.ts
import "dotenv/config";

export type Config = {
  coursesFile: string;
  uploadDir: string;
  host: string;
  port: number;
  corsOrigins: string[];
  slackWebhook: string;
  outputHtml: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const port = Number(env.PORT ?? "8000");
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    coursesFile: env.COURSES_FILE ?? "courses.json",
    uploadDir: env.UPLOAD_DIR ?? "pdf_files",
    host: env.HOST ?? "0.0.0.0",
    port,
    corsOrigins: (env.CORS_ORIGINS ?? "*")
      .split(",")
      .map(s => s.trim())
      .filter(Boolean),
    slackWebhook: env.SLACK_WEBHOOK_URI ?? "",
    outputHtml: env.OUTPUT_HTML ?? "./public/index.html"
  };
}
