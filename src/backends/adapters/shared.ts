import path from "node:path";
import { readString, toArray, toRecord } from "../../utils/records.js";

const TITLE_MAX_CHARS = 120;

export function summarizeMessage(message: string): string {
  const firstLine = message.split(/\r?\n/)[0]?.trim() ?? "";
  if (firstLine.length <= TITLE_MAX_CHARS) return firstLine;
  return `${firstLine.slice(0, TITLE_MAX_CHARS - 3)}...`;
}

/** Accepts "CWE-89", "CWE-89: SQL Injection", 89, or an array of those. */
export function firstCwe(value: unknown): string | undefined {
  const candidates = Array.isArray(value) ? value : [value];
  for (const candidate of candidates) {
    if (typeof candidate === "number" && Number.isInteger(candidate)) return `CWE-${candidate}`;
    if (typeof candidate !== "string") continue;
    const match = candidate.match(/CWE-(\d+)/i);
    if (match) return `CWE-${match[1]}`;
    if (/^\d+$/.test(candidate.trim())) return `CWE-${candidate.trim()}`;
  }
  return undefined;
}

export function relativeTo(target: string, filePath: string): string {
  if (!path.isAbsolute(filePath)) return filePath;
  const rel = path.relative(target, filePath);
  if (!rel || rel.startsWith("..") || path.isAbsolute(rel)) return filePath;
  return rel;
}

export function referenceUrls(value: unknown): string[] {
  const urls: string[] = [];
  for (const entry of toArray(value)) {
    if (typeof entry === "string" && entry) {
      urls.push(entry);
      continue;
    }
    const url = readString(toRecord(entry), "url", "URL");
    if (url) urls.push(url);
  }
  return urls;
}
