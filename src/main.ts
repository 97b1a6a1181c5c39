// src/main.ts
import fs from "node:fs";
import { loadConfig } from "./config.js";
import { JsonFileCourseStore } from "./storage.js";
import { CourseService } from "./service.js";
import { notifySlack } from "./notify.js";
import { createApp } from "./server.js";

async function main() {
  const config = loadConfig();
  if (!fs.existsSync(config.uploadDir)) fs.mkdirSync(config.uploadDir, { recursive: true });

  const store = new JsonFileCourseStore(config.coursesFile, config.uploadDir);
  const service = new CourseService(store, {
    notify: config.slackWebhook ? change => notifySlack(config.slackWebhook, change) : undefined
  });
  const app = createApp({ service, corsOrigins: config.corsOrigins });

  await new Promise<void>((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => resolve());
    server.on("error", reject);
  });
  console.log(`Course service listening on http://${config.host}:${config.port}`);
  console.log(`Table: ${config.coursesFile}, uploads: ${config.uploadDir}`);
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
