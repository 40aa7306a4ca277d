import type { RawIssue } from "../clients/issue-tracker.js";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function cleanText(text: unknown): string {
  if (typeof text !== "string" || !text) {
    return "";
  }
  return text
    .replace(/<[^>]+>/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function issueFields(issue: RawIssue): JsonObject {
  return isObject(issue.fields) ? issue.fields : {};
}

export function issueKey(issue: RawIssue): string {
  return typeof issue.key === "string" && issue.key ? issue.key : "Unknown";
}

/**
 * Flattens `fields[fieldName]` to a display string. Objects are read through
 * `nestedKey` (e.g. `status.name`), arrays are comma-joined.
 */
export function fieldValue(issue: RawIssue, fieldName: string, nestedKey?: string): string {
  const value = issueFields(issue)[fieldName];

  if (value === null || value === undefined) {
    return "Unknown";
  }

  if (isObject(value) && nestedKey) {
    const nested = value[nestedKey];
    return nested === null || nested === undefined ? "Unknown" : String(nested);
  }

  if (Array.isArray(value)) {
    return value.map((entry) => String(entry)).join(", ");
  }

  if (isObject(value)) {
    return JSON.stringify(value);
  }

  return String(value);
}

export function extractComments(issue: RawIssue): string {
  const comment = issueFields(issue).comment;
  const comments: unknown = isObject(comment) ? comment.comments : undefined;
  if (!Array.isArray(comments)) {
    return "";
  }

  const lines: string[] = [];
  for (const entry of comments) {
    if (!isObject(entry)) {
      continue;
    }
    const body = typeof entry.body === "string" ? entry.body : "";
    if (!body) {
      continue;
    }
    const authorInfo = entry.author;
    const displayName = isObject(authorInfo) ? authorInfo.displayName : undefined;
    const author = typeof displayName === "string" && displayName ? displayName : "Unknown";
    lines.push(`${author}: ${cleanText(body)}`);
  }

  return lines.join("\n");
}
