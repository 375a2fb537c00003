import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_GEMINI_MODEL } from "./adapters/gemini-vision.js";

dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

function num(name: string, fallback: number): number {
  const raw = process.env[name];
  const v = Number(raw || fallback);
  if (!Number.isFinite(v)) throw new Error(`${name} must be a number, got "${raw}"`);
  return v;
}

function opt(name: string): string | undefined {
  const v = (process.env[name] || "").trim();
  return v || undefined;
}

export function loadConfig() {
  const store = z.enum(["file", "sqlite"]).parse((process.env.STORE || "file").toLowerCase());

  return {
    port: num("PORT", 7090),
    dataDir: process.env.DATA_DIR || "./data",
    store,
    dbPath: process.env.DB_PATH || "./data/grievances.sqlite",
    logLevel: process.env.LOG_LEVEL || "info",

    telegramToken: opt("TELEGRAM_BOT_TOKEN"),
    telegramWebhookSecret: opt("TELEGRAM_WEBHOOK_SECRET"),
    officerChatId: opt("OFFICER_CHAT_ID"),

    geminiApiKey: opt("GEMINI_API_KEY"),
    geminiModel: process.env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
    classifierTimeoutMs: num("CLASSIFIER_TIMEOUT_MS", 30_000),

    geocoderUrl: opt("GEOCODER_URL"),
    geocoderTimeoutMs: num("GEOCODER_TIMEOUT_MS", 5_000),

    rateLimitMax: num("RATE_LIMIT_MAX_PER_HOUR", 5),
    rateLimitWindowSeconds: num("RATE_LIMIT_WINDOW_SECONDS", 3600),
    maxAccuracyMeters: num("LOCATION_MAX_ACCURACY_METERS", 25),
    dedupeMaxEntries: num("DEDUPE_MAX_ENTRIES", 10_000),
    officerCacheTtlSeconds: num("OFFICER_CACHE_TTL_SECONDS", 300),
    reportCacheTtlSeconds: num("REPORT_CACHE_TTL_SECONDS", 60),
    slaHours: num("DEFAULT_SLA_HOURS", 48),
    sweepIntervalSeconds: num("SWEEP_INTERVAL_SECONDS", 600),

    reportApiKey: opt("REPORT_API_KEY"),
    httpRateLimitMax: num("HTTP_RATE_LIMIT_MAX", 60),
    httpRateLimitWindowMs: num("HTTP_RATE_LIMIT_WINDOW_MS", 60_000)
  };
}

export type Config = ReturnType<typeof loadConfig>;
