import { ConfigInvalidValueError } from "../errors/config.errors.js";

const TRUTHY = new Set(["1", "true", "yes", "y", "on"]);
const FALSY = new Set(["0", "false", "no", "n", "off"]);

export function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value) return null;
  return value.trim() || null;
}

export function readEnvBool(name: string): boolean | null {
  const raw = readEnv(name);
  if (raw == null) return null;
  const normalized = raw.toLowerCase();
  if (TRUTHY.has(normalized)) return true;
  if (FALSY.has(normalized)) return false;
  return null;
}

export function readEnvNumber(name: string): number | null {
  const raw = readEnv(name);
  if (raw == null) return null;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new ConfigInvalidValueError(name, raw, "a number");
  return value;
}

export function readEnvList(name: string): string[] | null {
  const raw = readEnv(name);
  if (raw == null) return null;
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length ? items : null;
}
