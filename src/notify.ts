// src/notify.ts
import fetch from "node-fetch";
import type { CourseChange } from "./types.js";

export function formatChange(change: CourseChange): string {
  const c = change.course;
  switch (change.kind) {
    case "created":
      return `Course created: ${c.name} (${c.level})`;
    case "updated":
      return `Course updated: ${c.name} (${c.level})`;
    case "deleted":
      return `Course deleted: ${c.name}`;
  }
}

export async function notifySlack(webhook: string, change: CourseChange, timeoutMs = 10_000) {
  if (!webhook) return;

  const res = await fetch(webhook, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ text: formatChange(change) }),
    signal: AbortSignal.timeout(timeoutMs)
  });
  if (!res.ok) {
    throw new Error(`Webhook responded ${res.status}`);
  }
}
