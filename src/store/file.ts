import fs from "fs";
import path from "path";
import { z } from "zod";
import { GrievanceStore, parseRoster, ticketToRow } from "./store.js";
import {
  CATEGORIES,
  OfficerRecord,
  RawTicketRow,
  SEVERITIES,
  TICKET_STATUSES,
  Ticket,
  TicketMeta,
  TicketStatus
} from "../types/contracts.js";
import { appendJsonl, ensureDir, nowUtc, readJsonFile, readJsonl } from "../lib/_util.js";

const StoredTicket = z.object({
  ticketId: z.string().min(1),
  createdAt: z.string(),
  category: z.enum(CATEGORIES),
  severity: z.enum(SEVERITIES),
  description: z.string(),
  status: z.enum(TICKET_STATUSES),
  assignedOfficer: z.string(),
  escalationOfficer: z.string(),
  slaHours: z.number(),
  latitude: z.number(),
  longitude: z.number(),
  mapLink: z.string(),
  area: z.string(),
  postalCode: z.string(),
  submitterRef: z.string(),
  beforeEvidenceRef: z.string(),
  afterEvidenceRef: z.string().optional(),
  rating: z.number().int().optional(),
  resolvedAt: z.string().optional(),
  ratedAt: z.string().optional()
});

function acceptTicket(row: unknown): Ticket | null {
  const p = StoredTicket.safeParse(row);
  return p.success ? p.data : null;
}

/**
 * Append-only JSONL ticket log (latest line per ticketId wins) plus a
 * hand-maintained roster.json. Good for a single process.
 */
export class FileStore implements GrievanceStore {
  private dir: string;
  private ticketsPath: string;
  private rosterPath: string;

  private tickets: Ticket[] = [];
  private byId = new Map<string, Ticket>();
  // lines of tickets.jsonl that did not parse as a ticket at the last init()
  skippedLines = 0;

  constructor(dataDir: string) {
    this.dir = dataDir;
    this.ticketsPath = path.join(this.dir, "tickets.jsonl");
    this.rosterPath = path.join(this.dir, "roster.json");
  }

  async init(): Promise<void> {
    ensureDir(this.dir);
    if (!fs.existsSync(this.ticketsPath)) fs.writeFileSync(this.ticketsPath, "", "utf8");
    this.tickets = [];
    this.byId.clear();
    const { rows, skipped } = readJsonl(this.ticketsPath, acceptTicket);
    for (const t of rows) this.index(t);
    this.skippedLines = skipped;
  }

  private index(t: Ticket) {
    const had = this.byId.has(t.ticketId);
    this.byId.set(t.ticketId, t);
    if (had) this.tickets = this.tickets.map((x) => (x.ticketId === t.ticketId ? t : x));
    else this.tickets.unshift(t);
  }

  private write(t: Ticket) {
    appendJsonl(this.ticketsPath, t);
    this.index(t);
  }

  async appendTicket(ticket: Ticket): Promise<boolean> {
    const held = this.byId.get(ticket.ticketId);
    // the id is taken; only a retry from the same submitter counts as stored
    if (held) return held.submitterRef === ticket.submitterRef;
    this.write(ticket);
    return true;
  }

  async findTicket(ticketId: string): Promise<Ticket | null> {
    return this.byId.get(ticketId) ?? null;
  }

  async updateStatus(ticketId: string, status: TicketStatus, afterEvidenceRef?: string): Promise<boolean> {
    const cur = this.byId.get(ticketId);
    if (!cur) return false;
    this.write({
      ...cur,
      status,
      ...(afterEvidenceRef ? { afterEvidenceRef } : {}),
      ...(status === "Resolved" ? { resolvedAt: nowUtc() } : {})
    });
    return true;
  }

  async getMeta(ticketId: string): Promise<TicketMeta | null> {
    const cur = this.byId.get(ticketId);
    if (!cur) return null;
    return { submitterRef: cur.submitterRef, beforeEvidenceRef: cur.beforeEvidenceRef };
  }

  async updateRating(ticketId: string, score: number): Promise<boolean> {
    const cur = this.byId.get(ticketId);
    if (!cur) return false;
    this.write({ ...cur, rating: score, ratedAt: nowUtc() });
    return true;
  }

  async listRoster(): Promise<OfficerRecord[]> {
    const raw = readJsonFile(this.rosterPath);
    if (raw === null) throw new Error(`roster not readable: ${this.rosterPath}`);
    if (!Array.isArray(raw)) throw new Error("roster.json must hold an array");
    return parseRoster(raw);
  }

  async listTickets(): Promise<RawTicketRow[]> {
    return this.tickets.map(ticketToRow);
  }
}
