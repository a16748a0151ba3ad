import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import YAML from "yaml";
import { isLogLevel } from "../logging/logger";
import { AppConfigSchema, type AppConfig } from "./schema";

function deepFreeze<T>(obj: T): T {
  Object.freeze(obj);
  if (obj !== null && typeof obj === "object") {
    const vals: unknown[] = Object.values(obj);
    for (const val of vals) {
      if (val && typeof val === "object" && !Object.isFrozen(val)) {
        deepFreeze(val);
      }
    }
  }
  return obj;
}

let cached: AppConfig | null = null;

const HERE = path.dirname(fileURLToPath(import.meta.url));
export const REPO_ROOT = path.resolve(HERE, "..", "..", "..", "..");

const DEFAULT_CONFIG = "config/default.yaml";

export function resolveRepoPath(preferred: string): string {
  const candidates = [
    preferred,
    path.resolve(process.cwd(), preferred),
    path.join(REPO_ROOT, preferred),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error(
    `Unable to locate ${preferred}. Tried: ${candidates.join(", ")}`
  );
}

/** `dir/name`, or null when `name` would land outside `dir`. */
export function pathInside(dir: string, name: string): string | null {
  const root = path.resolve(dir);
  const rel = path.relative(root, path.resolve(root, name));
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return path.join(dir, name);
}

export function parseConfig(raw: string): AppConfig {
  const cfg = AppConfigSchema.parse(YAML.parse(raw));
  const envLevel = process.env.LOG_LEVEL;
  return isLogLevel(envLevel) ? { ...cfg, logLevel: envLevel } : cfg;
}

export function loadConfig(configPath = process.env.VOLGRID_CONFIG ?? DEFAULT_CONFIG): AppConfig {
  if (cached) return cached;

  const resolved = resolveRepoPath(configPath);
  const cfg = parseConfig(fs.readFileSync(resolved, "utf-8"));
  cached = deepFreeze(cfg);
  return cached;
}

export function resetConfigCache() {
  cached = null;
}
