import { existsSync, readFileSync } from "fs";
import { parse } from "@iarna/toml";
import { z } from "zod";
import { homeFile } from "@/home";
import { LOG_LEVELS, type LogLevel } from "@/logger/levels";

export const DEFAULT_GAMMA_BASE_URL = "https://gamma-api.polymarket.com";

const appConfigSchema = z.object({
  log_level: z.enum(LOG_LEVELS).optional(),
  gamma: z
    .object({
      base_url: z.string().url().optional(),
      timeout_ms: z.number().int().positive().optional(),
    })
    .optional(),
  search: z
    .object({
      bulk_limit: z.number().int().positive().optional(),
      default_limit: z.number().int().positive().optional(),
    })
    .optional(),
});

type AppConfig = z.infer<typeof appConfigSchema>;

export type GammaConfig = {
  baseUrl: string;
  timeoutMs: number;
};

export type SearchConfig = {
  bulkLimit: number;
  defaultLimit: number;
};

let _config: AppConfig | null = null;

function loadConfig(): AppConfig {
  if (_config) return _config;
  const configPath = homeFile("config.toml");
  if (!existsSync(configPath)) {
    _config = {};
    return _config;
  }
  const parsed = appConfigSchema.safeParse(parse(readFileSync(configPath, "utf-8")));
  if (!parsed.success) {
    throw new Error(`invalid_config:${configPath}: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
  }
  _config = parsed.data;
  return _config;
}

export function resetConfig(): void {
  _config = null;
}

export function getLogLevel(): LogLevel {
  const fromEnv = (process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  if (fromEnv) {
    const parsed = z.enum(LOG_LEVELS).safeParse(fromEnv);
    if (!parsed.success) {
      throw new Error(`invalid_config:LOG_LEVEL: expected one of ${LOG_LEVELS.join(", ")}, got "${fromEnv}"`);
    }
    return parsed.data;
  }
  return loadConfig().log_level ?? "warn";
}

export function getGammaConfig(): GammaConfig {
  const cfg = loadConfig();
  const envBaseUrl = (process.env.GAMMA_BASE_URL ?? "").trim();
  return {
    baseUrl: envBaseUrl || cfg.gamma?.base_url || DEFAULT_GAMMA_BASE_URL,
    timeoutMs: cfg.gamma?.timeout_ms ?? 30000,
  };
}

export function getSearchConfig(): SearchConfig {
  const cfg = loadConfig();
  return {
    bulkLimit: cfg.search?.bulk_limit ?? 200,
    defaultLimit: cfg.search?.default_limit ?? 5,
  };
}
