import "dotenv/config";
import { ConfigError } from "./errors.js";

export type HarvestConfig = {
  directoryUrl: string;
  profileBase: string;
  concurrency: number;
  timeoutMs: number;
  userAgent: string | null;
  logFile: string;
  outdir: string;
};

export const DEFAULT_DIRECTORY_URL =
  "https://engineering.buffalo.edu/computer-science-engineering/people/faculty-directory/full-time.html";
export const DEFAULT_PROFILE_BASE = "https://engineering.buffalo.edu/";

function str(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return n;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  return {
    directoryUrl: str(env, "FACULTY_DIRECTORY_URL", DEFAULT_DIRECTORY_URL),
    profileBase: str(env, "FACULTY_PROFILE_BASE", DEFAULT_PROFILE_BASE),
    concurrency: positiveInt(env, "FACULTY_CONCURRENCY", 10),
    timeoutMs: positiveInt(env, "HTTP_TIMEOUT_MS", 30_000),
    userAgent: env.HTTP_USER_AGENT?.trim() || null,
    logFile: str(env, "SCRAPER_LOG_FILE", "scraper.log"),
    outdir: str(env, "FACULTY_OUTDIR", "./data/buffalo"),
  };
}
