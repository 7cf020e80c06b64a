/**
 * Process configuration.
 *
 * Read once at start-up from the environment (optionally seeded from
 * .env.local / .env) and handed to the providers explicitly. API keys are
 * optional; a provider without one reports missing_credential on each call.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

export const ProspectorConfigSchema = z.object({
  tavilyApiKey: z.string().min(1).optional(),
  firecrawlApiKey: z.string().min(1).optional(),
  searchEndpoint: z.string().url("must be a valid URL").optional(),
  scrapeEndpoint: z.string().url("must be a valid URL").optional(),
  searchTimeoutMs: z.coerce.number().int().positive().default(30_000),
  scrapeTimeoutMs: z.coerce.number().int().positive().default(45_000),
  stateDir: z.string().min(1).default(path.join(os.homedir(), ".prospector")),
});

export type ProspectorConfig = z.infer<typeof ProspectorConfigSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/** Environment variable backing each config field */
const ENV_KEYS: Record<keyof ProspectorConfig, string> = {
  tavilyApiKey: "TAVILY_API_KEY",
  firecrawlApiKey: "FIRECRAWL_API_KEY",
  searchEndpoint: "PROSPECTOR_SEARCH_ENDPOINT",
  scrapeEndpoint: "PROSPECTOR_SCRAPE_ENDPOINT",
  searchTimeoutMs: "PROSPECTOR_SEARCH_TIMEOUT_MS",
  scrapeTimeoutMs: "PROSPECTOR_SCRAPE_TIMEOUT_MS",
  stateDir: "PROSPECTOR_STATE_DIR",
};

const ENV_NAME_BY_FIELD = new Map<string, string>(Object.entries(ENV_KEYS));

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = env[name];
  return v && v.trim() ? v.trim() : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProspectorConfig {
  const raw: Record<string, string | undefined> = {};
  for (const [field, name] of Object.entries(ENV_KEYS)) {
    raw[field] = readEnv(env, name);
  }

  const parsed = ProspectorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => {
        const field = issue.path.join(".");
        return `${ENV_NAME_BY_FIELD.get(field) ?? field}: ${issue.message}`;
      }),
    );
  }
  return parsed.data;
}

/**
 * Minimal .env reader. Existing non-empty variables win; quotes around a
 * value are stripped; `export KEY=value` is accepted.
 */
export function loadEnvFileIfExists(filePath: string, env: NodeJS.ProcessEnv = process.env): boolean {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }

  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const normalized = trimmed.startsWith("export ") ? trimmed.slice("export ".length).trim() : trimmed;
    const eq = normalized.indexOf("=");
    if (eq <= 0) continue;

    const key = normalized.slice(0, eq).trim();
    if (!key) continue;
    if (readEnv(env, key)) continue;

    let value = normalized.slice(eq + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
      (value.startsWith("'") && value.endsWith("'") && value.length >= 2)
    ) {
      value = value.slice(1, -1);
    }

    env[key] = value;
  }
  return true;
}

/** .env.local first, so it overrides .env */
export function loadEnvFiles(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
  loadEnvFileIfExists(path.join(cwd, ".env.local"), env);
  loadEnvFileIfExists(path.join(cwd, ".env"), env);
}
