import { createHash } from "node:crypto";
import type { ScanCategory } from "../types/domain/scan-result.js";

export function cacheKey(category: ScanCategory, target: string, backend: string): string {
  return createHash("sha256").update(`${category}:${target}:${backend}`).digest("hex");
}
