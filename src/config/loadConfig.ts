import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";
import { appConfigSchema, type AppConfig } from "./schema.js";
import { warn } from "../utils/logger.js";

interface LoadConfigOptions {
  silent?: boolean;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: RawConfig, key: string): RawConfig {
  const existing = raw[key];
  if (isRecord(existing)) {
    return existing;
  }
  const created: RawConfig = {};
  raw[key] = created;
  return created;
}

function applyEnvOverrides(raw: RawConfig): void {
  const env = process.env;

  if (env.MEMLANE_DB_PATH) {
    section(raw, "storage").dbPath = env.MEMLANE_DB_PATH;
  }

  if (env.MEMLANE_USER) {
    raw.defaultUser = env.MEMLANE_USER;
  }

  const embedding = (): RawConfig => section(section(raw, "ai"), "embedding");
  if (env.MEMLANE_EMBED_PROVIDER) {
    const provider = env.MEMLANE_EMBED_PROVIDER;
    if (provider === "hashing" || provider === "openai" || provider === "ollama") {
      embedding().provider = provider;
    } else {
      warn(`Ignoring unknown MEMLANE_EMBED_PROVIDER "${provider}"`);
    }
  }
  if (env.MEMLANE_EMBED_MODEL) {
    embedding().model = env.MEMLANE_EMBED_MODEL;
  }
  if (env.MEMLANE_EMBED_DIMENSIONS) {
    const dimensions = Number.parseInt(env.MEMLANE_EMBED_DIMENSIONS, 10);
    if (Number.isInteger(dimensions) && dimensions > 0) {
      embedding().dimensions = dimensions;
    } else {
      warn(`Ignoring invalid MEMLANE_EMBED_DIMENSIONS "${env.MEMLANE_EMBED_DIMENSIONS}"`);
    }
  }
  if (env.MEMLANE_EMBED_BASE_URL) {
    embedding().baseUrl = env.MEMLANE_EMBED_BASE_URL;
  }
  if (env.OPENAI_API_KEY) {
    embedding().apiKey = env.OPENAI_API_KEY;
    section(section(raw, "ai"), "llm").apiKey = env.OPENAI_API_KEY;
  }
}

export function loadAppConfig(
  configPath: string = "./config.json",
  options: LoadConfigOptions = {}
): AppConfig {
  loadDotenv();

  let raw: RawConfig = {};
  const absolute = resolve(configPath);
  if (existsSync(absolute)) {
    const parsed: unknown = JSON.parse(readFileSync(absolute, "utf-8"));
    if (!isRecord(parsed)) {
      throw new Error(`Config file ${configPath} must contain a JSON object`);
    }
    raw = parsed;
  } else if (!options.silent) {
    warn(`No config file found at ${configPath}, using defaults`);
  }

  applyEnvOverrides(raw);
  return appConfigSchema.parse(raw);
}
