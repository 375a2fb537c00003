import type { Request } from "express";
import crypto from "crypto";

function getKeyFromReq(req: Request): string {
  const h = (req.header("x-report-key") || "").trim();
  if (h) return h;

  // dashboard links: /api/...?k=REPORT_KEY
  return (typeof req.query.k === "string" ? req.query.k : "").trim();
}

function sameKey(a: string, b: string) {
  const x = Buffer.from(a);
  const y = Buffer.from(b);
  return x.length === y.length && crypto.timingSafeEqual(x, y);
}

/** Open when no key is configured. */
export function requireReportKey(req: Request, expected: string | undefined) {
  if (!expected) return { ok: true as const };

  const key = getKeyFromReq(req);
  if (!key) return { ok: false as const, status: 401, error: "missing_report_key" as const };
  if (!sameKey(key, expected)) return { ok: false as const, status: 401, error: "invalid_report_key" as const };
  return { ok: true as const };
}
