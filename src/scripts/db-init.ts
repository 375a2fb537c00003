import path from "path";
import pino from "pino";
import { SqliteStore } from "../store/sqlite.js";
import { parseRoster } from "../store/store.js";
import { readJsonFile } from "../lib/_util.js";

// Creates the sqlite schema and loads officers from a roster JSON file (ROSTER_PATH).
const log = pino({ level: process.env.LOG_LEVEL || "info" });
const DB_PATH = process.env.DB_PATH || "./data/grievances.sqlite";
const ROSTER_PATH = process.env.ROSTER_PATH || path.join(process.env.DATA_DIR || "./data", "roster.json");

async function main() {
  const store = new SqliteStore(DB_PATH);
  await store.init();

  const raw = readJsonFile(ROSTER_PATH);
  if (Array.isArray(raw)) {
    const officers = parseRoster(raw);
    for (const o of officers) await store.upsertOfficer(o);
    log.info({ roster: ROSTER_PATH, officers: officers.length, skipped: raw.length - officers.length }, "db-init: roster loaded");
  } else {
    log.warn({ roster: ROSTER_PATH }, "db-init: no roster array found, officers table left as is");
  }

  await store.close();
  log.info({ db: DB_PATH }, "db-init: ok");
}

main().catch((err: unknown) => {
  log.fatal({ err }, "db-init failed");
  process.exit(1);
});
