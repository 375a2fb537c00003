import fs from "fs";
import path from "path";

import express from "express";
import pino from "pino";

import { loadConfig } from "./config.js";
import { makeRoutes } from "./api/routes.js";
import { makeTelegramRoutes } from "./api/telegram-webhook.js";
import { createAgent } from "./plugin/createAgent.js";
import { ReportingCache } from "./core/reporting.js";
import { FileStore } from "./store/file.js";
import { SqliteStore } from "./store/sqlite.js";
import { GrievanceStore } from "./store/store.js";
import { TelegramMessenger } from "./adapters/telegram.js";
import { GeminiClassifier } from "./adapters/gemini-vision.js";
import { NominatimGeocoder } from "./adapters/geocoder.js";

const cfg = loadConfig();
const log = pino({ level: cfg.logLevel });

fs.mkdirSync(cfg.dataDir, { recursive: true });
const store: GrievanceStore = cfg.store === "sqlite"
  ? new SqliteStore(path.resolve(cfg.dbPath))
  : new FileStore(path.resolve(cfg.dataDir));

async function main() {
  await store.init();

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  const reporting = new ReportingCache({ store, ttlSeconds: cfg.reportCacheTtlSeconds, logger: log.child({ component: "reporting" }) });
  app.use("/api", makeRoutes({
    reporting,
    reportKey: cfg.reportApiKey,
    rateLimit: { windowMs: cfg.httpRateLimitWindowMs, max: cfg.httpRateLimitMax },
    logger: log
  }));

  let stopSweep = () => {};
  let drain = async () => {};

  if (cfg.telegramToken && cfg.geminiApiKey) {
    const telegram = new TelegramMessenger({ token: cfg.telegramToken });
    const agent = createAgent({
      store,
      messenger: telegram,
      classifier: new GeminiClassifier({ apiKey: cfg.geminiApiKey, model: cfg.geminiModel }),
      geocoder: new NominatimGeocoder({ baseUrl: cfg.geocoderUrl, timeoutMs: cfg.geocoderTimeoutMs }),
      loadEvidence: (fileId) => telegram.downloadFile(fileId),
      officerChatId: cfg.officerChatId,
      rateLimitMax: cfg.rateLimitMax,
      rateLimitWindowSeconds: cfg.rateLimitWindowSeconds,
      maxAccuracyMeters: cfg.maxAccuracyMeters,
      dedupeMaxEntries: cfg.dedupeMaxEntries,
      officerCacheTtlSeconds: cfg.officerCacheTtlSeconds,
      slaHours: cfg.slaHours,
      classifierTimeoutMs: cfg.classifierTimeoutMs,
      geocoderTimeoutMs: cfg.geocoderTimeoutMs,
      logger: log.child({ component: "agent" })
    });

    app.use("/telegram", makeTelegramRoutes({
      agent,
      webhookSecret: cfg.telegramWebhookSecret,
      officerChatId: cfg.officerChatId,
      logger: log
    }));

    const timer = setInterval(() => {
      const out = agent.sweep();
      if (out.submittersDropped > 0) log.debug(out, "sweep: idle submitters dropped");
    }, cfg.sweepIntervalSeconds * 1000);
    timer.unref();
    stopSweep = () => clearInterval(timer);
    drain = () => agent.background.drain();
  } else {
    log.warn("TELEGRAM_BOT_TOKEN or GEMINI_API_KEY missing: chat intake disabled, reporting API only");
  }

  const server = app.listen(cfg.port, () => {
    log.info(
      {
        PORT: cfg.port,
        DATA_DIR: cfg.dataDir,
        STORE: cfg.store,
        OFFICER_CHAT_ID: cfg.officerChatId ?? null
      },
      "grievance desk listening"
    );
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    stopSweep();
    server.close();
    drain()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, "shutdown: background drain failed");
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.fatal({ err }, "fatal");
  process.exit(1);
});
