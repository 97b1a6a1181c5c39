// src/build-html.ts
import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "./config.js";
import { JsonFileCourseStore } from "./storage.js";
import { renderCatalogHtml } from "./catalog.js";

async function main() {
  const config = loadConfig();
  const store = new JsonFileCourseStore(config.coursesFile, config.uploadDir);
  const courses = await store.readAll();

  const dir = path.dirname(config.outputHtml);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(config.outputHtml, renderCatalogHtml(courses), "utf-8");
  console.log(`HTML generated: ${config.outputHtml} (${courses.length} courses)`);
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
