import { Router, type Response } from "express";
import { z } from "zod";
import pino from "pino";
import { ReportingCache, SnapshotUnavailableError, filters, listTickets, locations, stats } from "../core/reporting.js";
import { ReportRow } from "../types/contracts.js";
import { requireReportKey } from "./report-key.js";
import { makeRateLimiter, type HttpRateLimit } from "./rate-limit.js";

const WorksQuery = z.object({
  category: z.string().min(1).optional(),
  status: z.string().min(1).optional(),
  severity: z.string().min(1).optional(),
  officer: z.string().min(1).optional(),
  search: z.string().min(1).optional()
});

/** Read-only reporting API over the cached ticket snapshot. */
export function makeRoutes(args: {
  reporting: ReportingCache;
  reportKey?: string;
  rateLimit?: HttpRateLimit;
  logger?: pino.Logger;
}) {
  const r = Router();
  const log = args.logger ?? pino({ level: "silent" });

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  r.use(makeRateLimiter(args.rateLimit ?? { windowMs: 60_000, max: 60 }, log));
  r.use((req, res, next) => {
    const rk = requireReportKey(req, args.reportKey);
    if (!rk.ok) return res.status(rk.status).json({ ok: false, error: rk.error });
    next();
  });

  async function withSnapshot(res: Response, fn: (rows: ReportRow[]) => unknown) {
    let rows: ReportRow[];
    try {
      rows = await args.reporting.getSnapshot();
    } catch (e) {
      if (e instanceof SnapshotUnavailableError) {
        return res.status(503).json({ ok: false, error: "snapshot_unavailable" });
      }
      log.error({ err: e }, "reporting: unexpected failure");
      return res.status(500).json({ ok: false, error: "internal_error" });
    }
    return res.json(fn(rows));
  }

  r.get("/stats", (_req, res) => withSnapshot(res, stats));

  r.get("/filters", (_req, res) => withSnapshot(res, filters));

  r.get("/works", (req, res) => {
    const q = WorksQuery.safeParse(req.query);
    if (!q.success) return res.status(400).json({ ok: false, error: "invalid_request" });
    return withSnapshot(res, (rows) => listTickets(rows, q.data));
  });

  r.get("/locations", (_req, res) => withSnapshot(res, locations));

  return r;
}
