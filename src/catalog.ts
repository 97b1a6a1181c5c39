// src/catalog.ts
import type { Course } from "./types.js";
import { escapeHtml, normalizeText } from "./utils.js";

const byName = (a: Course, b: Course) => a.name.localeCompare(b.name, "fr");

function groupByLevel(courses: Course[]): Map<string, Course[]> {
  const groups = new Map<string, Course[]>();
  for (const c of [...courses].sort(byName)) {
    const group = groups.get(c.level);
    if (group) group.push(c);
    else groups.set(c.level, [c]);
  }
  return groups;
}

function renderCourse(c: Course): string {
  const href = `/courses/${encodeURIComponent(c.name)}/download`;
  return `<li class="course">
        <a href="${href}">${escapeHtml(c.name)}</a>
        <p>${escapeHtml(normalizeText(c.description))}</p>
        <small>${escapeHtml(c.updated_at)}</small>
      </li>`;
}

/** One section per level (levels in name order of their first course), courses sorted by name. */
export function renderCatalogHtml(courses: Course[]): string {
  const sections = [...groupByLevel(courses)]
    .map(([level, group]) => `
  <section>
    <h2>${escapeHtml(level)}</h2>
    <ul>
      ${group.map(renderCourse).join("\n      ")}
    </ul>
  </section>`)
    .join("");

  const body = sections || "\n  <p class=\"empty\">Aucun cours.</p>";

  return `<!doctype html>
<html lang="fr">
<head>
  <meta charset="utf-8">
  <title>Catalogue des cours</title>
  <style>
    main { max-width: 48rem; margin: 0 auto; font-family: sans-serif; }
    .course { margin-bottom: 1rem; }
    .course small { color: #666; }
  </style>
</head>
<body>
<main>
  <h1>Catalogue des cours (${courses.length})</h1>${body}
</main>
</body>
</html>`;
}
