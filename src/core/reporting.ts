import pino from "pino";
import { Clock, RawTicketRow, ReportRow } from "../types/contracts.js";
import { GrievanceStore } from "../store/store.js";
import { TtlCache } from "./cache.js";

export class SnapshotUnavailableError extends Error {
  constructor(cause: unknown) {
    super("ticket snapshot unavailable", { cause });
    this.name = "SnapshotUnavailableError";
  }
}

// Non-numeric (or empty) values become null instead of failing the refresh.
export function toNumberOrNull(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function normalizeRow(r: RawTicketRow): ReportRow {
  return {
    ...r,
    lat: toNumberOrNull(r.lat),
    lon: toNumberOrNull(r.lon),
    rating: toNumberOrNull(r.rating)
  };
}

export class ReportingCache {
  private readonly cache: TtlCache<ReportRow[]>;
  private readonly log: pino.Logger;

  constructor(args: { store: GrievanceStore; ttlSeconds?: number; now?: Clock; logger?: pino.Logger }) {
    this.log = args.logger ?? pino({ level: "silent" });
    this.cache = new TtlCache<ReportRow[]>({
      ttlSeconds: args.ttlSeconds ?? 60,
      now: args.now,
      load: async () => {
        const rows = await args.store.listTickets();
        const out = rows.map(normalizeRow);
        this.log.info({ rows: out.length }, "reporting: snapshot refreshed");
        return out;
      }
    });
  }

  /** Throws SnapshotUnavailableError only when no snapshot was ever loaded. */
  async getSnapshot(): Promise<ReportRow[]> {
    const r = await this.cache.read();
    if (r.ok) {
      if (r.stale) this.log.warn("reporting: refresh failed, serving last snapshot");
      return r.value;
    }
    this.log.error({ err: r.error }, "reporting: refresh failed with no snapshot");
    throw new SnapshotUnavailableError(r.error);
  }
}

export type TicketFilter = {
  category?: string;
  status?: string;
  severity?: string;
  officer?: string;
  search?: string;
};

export function stats(rows: ReportRow[]) {
  const breakdown: Record<string, number> = {};
  for (const r of rows) {
    if (!r.status) continue;
    breakdown[r.status] = (breakdown[r.status] ?? 0) + 1;
  }
  const resolved = breakdown["Resolved"] ?? 0;
  return { total: rows.length, open: rows.length - resolved, resolved, breakdown };
}

function uniqueOf(rows: ReportRow[], pick: (r: ReportRow) => string): string[] {
  const set = new Set<string>();
  for (const r of rows) {
    const v = String(pick(r)).trim();
    if (v) set.add(v);
  }
  return [...set].sort();
}

export function filters(rows: ReportRow[]) {
  return {
    categories: uniqueOf(rows, (r) => r.category),
    severities: uniqueOf(rows, (r) => r.severity),
    statuses: uniqueOf(rows, (r) => r.status),
    officers: uniqueOf(rows, (r) => r.officer)
  };
}

export function listTickets(rows: ReportRow[], q: TicketFilter): ReportRow[] {
  const search = (q.search ?? "").toLowerCase().trim();
  return rows.filter((r) => {
    if (q.category && r.category !== q.category) return false;
    if (q.status && r.status !== q.status) return false;
    if (q.severity && r.severity !== q.severity) return false;
    if (q.officer && r.officer !== q.officer) return false;
    if (search) {
      const hay = `${r.ticketId} ${r.description}`.toLowerCase();
      if (!hay.includes(search)) return false;
    }
    return true;
  });
}

export function locations(rows: ReportRow[]) {
  const out: Array<{ id: string; lat: number; lng: number; category: string; severity: string; status: string; desc: string }> = [];
  for (const r of rows) {
    if (r.lat === null || r.lon === null) continue;
    out.push({ id: r.ticketId, lat: r.lat, lng: r.lon, category: r.category, severity: r.severity, status: r.status, desc: r.description });
  }
  return out;
}
