import { z } from "zod";
import type { LogLevel } from "./types";

export const DEFAULT_API_URL = "http://127.0.0.1:8080";

export interface ClientSettings {
  apiUrl: string;
  logLevel: LogLevel;
}

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const SettingsSchema = z.object({
  apiUrl: z
    .string()
    .trim()
    .url()
    .transform((value) => value.replace(/\/+$/, "")),
  logLevel: LogLevelSchema,
});

function readString(value: string | undefined, fallback: string): string {
  if (typeof value === "string" && value.trim().length > 0) {
    return value.trim();
  }
  return fallback;
}

/**
 * Resolves client settings from an environment map. Node callers pass
 * `process.env`; the web app passes `import.meta.env` with its `VITE_`
 * prefix stripped by `fromViteEnv`.
 *
 * @throws ZodError when `BACKTEST_API_URL` is set but not a URL.
 */
export function loadClientSettings(
  env: Record<string, string | undefined>,
): ClientSettings {
  const level = readString(env.BACKTEST_LOG_LEVEL, "info").toLowerCase();

  return SettingsSchema.parse({
    apiUrl: readString(env.BACKTEST_API_URL, DEFAULT_API_URL),
    logLevel: LogLevelSchema.safeParse(level).success ? level : "info",
  });
}

export function fromViteEnv(
  env: Record<string, string | boolean | undefined>,
): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith("VITE_") || typeof value !== "string") continue;
    out[key.slice("VITE_".length)] = value;
  }
  return out;
}
