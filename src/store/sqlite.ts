import sqlite3 from "sqlite3";
import { GrievanceStore, parseRoster } from "./store.js";
import { OfficerRecord, RawTicketRow, Ticket, TicketMeta, TicketStatus } from "../types/contracts.js";
import { nowUtc } from "../lib/_util.js";

type Param = string | number | null;

function run(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<number>((resolve, reject) => {
    db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
      if (err) reject(err);
      else resolve(this.changes);
    });
  });
}
function get<T>(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<T | undefined>((resolve, reject) => {
    db.get<T>(sql, params, (err, row) => (err ? reject(err) : resolve(row)));
  });
}
function all<T>(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<T[]>((resolve, reject) => {
    db.all<T>(sql, params, (err, rows) => (err ? reject(err) : resolve(rows)));
  });
}

export interface TicketRow {
  ticketId: string;
  createdAt: string;
  category: Ticket["category"];
  severity: Ticket["severity"];
  description: string;
  status: TicketStatus;
  assignedOfficer: string;
  escalationOfficer: string;
  slaHours: number;
  latitude: number | string | null;
  longitude: number | string | null;
  mapLink: string;
  area: string;
  postalCode: string;
  submitterRef: string;
  beforeEvidenceRef: string;
  afterEvidenceRef: string | null;
  rating: number | null;
  resolvedAt: string | null;
  ratedAt: string | null;
}

// A missing or blank coordinate reads as NaN, never as 0.
function coordinate(v: number | string | null): number {
  if (v === null) return Number.NaN;
  if (typeof v === "string" && v.trim() === "") return Number.NaN;
  return Number(v);
}

export function ticketFromRow(r: TicketRow): Ticket {
  return {
    ticketId: r.ticketId,
    createdAt: r.createdAt,
    category: r.category,
    severity: r.severity,
    description: r.description,
    status: r.status,
    assignedOfficer: r.assignedOfficer,
    escalationOfficer: r.escalationOfficer,
    slaHours: r.slaHours,
    latitude: coordinate(r.latitude),
    longitude: coordinate(r.longitude),
    mapLink: r.mapLink,
    area: r.area,
    postalCode: r.postalCode,
    submitterRef: r.submitterRef,
    beforeEvidenceRef: r.beforeEvidenceRef,
    ...(r.afterEvidenceRef ? { afterEvidenceRef: r.afterEvidenceRef } : {}),
    ...(r.rating !== null ? { rating: r.rating } : {}),
    ...(r.resolvedAt ? { resolvedAt: r.resolvedAt } : {}),
    ...(r.ratedAt ? { ratedAt: r.ratedAt } : {})
  };
}

export class SqliteStore implements GrievanceStore {
  private db: sqlite3.Database;

  constructor(private dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async init(): Promise<void> {
    if (this.dbPath !== ":memory:") await run(this.db, `pragma journal_mode = wal;`);
    await run(this.db, `
      create table if not exists tickets (
        ticketId text primary key,
        createdAt text not null,
        category text not null,
        severity text not null,
        description text not null,
        status text not null,
        assignedOfficer text not null,
        escalationOfficer text not null,
        slaHours integer not null,
        latitude real,
        longitude real,
        mapLink text not null,
        area text not null,
        postalCode text not null,
        submitterRef text not null,
        beforeEvidenceRef text not null,
        afterEvidenceRef text,
        rating integer,
        resolvedAt text,
        ratedAt text
      );
    `);
    await run(this.db, `create index if not exists idx_tickets_created on tickets(createdAt);`);

    await run(this.db, `
      create table if not exists officers (
        officerId text primary key,
        name text not null,
        reportsTo text,
        level text,
        sector text,
        chatId text
      );
    `);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => this.db.close((err) => (err ? reject(err) : resolve())));
  }

  async appendTicket(t: Ticket): Promise<boolean> {
    // "or ignore": a retried append for the same ticketId is a no-op
    const inserted = await run(this.db, `
      insert or ignore into tickets (
        ticketId, createdAt, category, severity, description, status,
        assignedOfficer, escalationOfficer, slaHours, latitude, longitude,
        mapLink, area, postalCode, submitterRef, beforeEvidenceRef,
        afterEvidenceRef, rating, resolvedAt, ratedAt
      ) values (?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?,?)
    `, [
      t.ticketId, t.createdAt, t.category, t.severity, t.description, t.status,
      t.assignedOfficer, t.escalationOfficer, t.slaHours, t.latitude, t.longitude,
      t.mapLink, t.area, t.postalCode, t.submitterRef, t.beforeEvidenceRef,
      t.afterEvidenceRef ?? null, t.rating ?? null, t.resolvedAt ?? null, t.ratedAt ?? null
    ]);
    if (inserted > 0) return true;
    // the id is taken; only a retry from the same submitter counts as stored
    const held = await get<Pick<TicketRow, "submitterRef">>(this.db, `select submitterRef from tickets where ticketId=?`, [t.ticketId]);
    return held?.submitterRef === t.submitterRef;
  }

  async findTicket(ticketId: string): Promise<Ticket | null> {
    const row = await get<TicketRow>(this.db, `select * from tickets where ticketId=?`, [ticketId]);
    return row ? ticketFromRow(row) : null;
  }

  async updateStatus(ticketId: string, status: TicketStatus, afterEvidenceRef?: string): Promise<boolean> {
    const changes = await run(this.db, `
      update tickets
      set status=?, afterEvidenceRef=coalesce(?, afterEvidenceRef), resolvedAt=?
      where ticketId=?
    `, [status, afterEvidenceRef ?? null, status === "Resolved" ? nowUtc() : null, ticketId]);
    return changes > 0;
  }

  async getMeta(ticketId: string): Promise<TicketMeta | null> {
    const row = await get<Pick<TicketRow, "submitterRef" | "beforeEvidenceRef">>(this.db,
      `select submitterRef, beforeEvidenceRef from tickets where ticketId=?`, [ticketId]);
    return row ? { submitterRef: row.submitterRef, beforeEvidenceRef: row.beforeEvidenceRef } : null;
  }

  async updateRating(ticketId: string, score: number): Promise<boolean> {
    const changes = await run(this.db, `update tickets set rating=?, ratedAt=? where ticketId=?`, [score, nowUtc(), ticketId]);
    return changes > 0;
  }

  async upsertOfficer(o: OfficerRecord): Promise<void> {
    await run(this.db, `
      insert into officers (officerId, name, reportsTo, level, sector, chatId)
      values (?,?,?,?,?,?)
      on conflict(officerId) do update set
        name=excluded.name, reportsTo=excluded.reportsTo, level=excluded.level,
        sector=excluded.sector, chatId=excluded.chatId
    `, [o.officerId, o.name, o.reportsTo, o.level, o.sector, o.chatId ?? null]);
  }

  async listRoster(): Promise<OfficerRecord[]> {
    const rows = await all<Record<string, unknown>>(this.db, `select * from officers order by rowid asc`);
    return parseRoster(rows);
  }

  async listTickets(): Promise<RawTicketRow[]> {
    const rows = await all<TicketRow>(this.db, `select * from tickets order by createdAt desc`);
    return rows.map((r) => ({
      ticketId: r.ticketId,
      createdAt: r.createdAt,
      category: r.category,
      severity: r.severity,
      status: r.status,
      officer: r.assignedOfficer,
      description: r.description,
      lat: r.latitude,
      lon: r.longitude,
      mapLink: r.mapLink,
      area: r.area,
      postalCode: r.postalCode,
      rating: r.rating
    }));
  }

}
