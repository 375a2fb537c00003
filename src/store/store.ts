import { z } from "zod";
import { OfficerRecord, RawTicketRow, Ticket, TicketMeta, TicketStatus } from "../types/contracts.js";

/**
 * Backing store adapter. Every call is a best-effort I/O operation with no
 * transaction spanning calls; a write may not be visible to a read issued
 * immediately after it.
 */
export interface GrievanceStore {
  init(): Promise<void>;

  // Idempotent on ticketId: re-appending an existing id returns true without a
  // second row, or false when the held ticket belongs to another submitter.
  appendTicket(ticket: Ticket): Promise<boolean>;
  findTicket(ticketId: string): Promise<Ticket | null>;
  updateStatus(ticketId: string, status: TicketStatus, afterEvidenceRef?: string): Promise<boolean>;
  getMeta(ticketId: string): Promise<TicketMeta | null>;
  updateRating(ticketId: string, score: number): Promise<boolean>;

  listRoster(): Promise<OfficerRecord[]>;
  listTickets(): Promise<RawTicketRow[]>;
}

export function ticketToRow(t: Ticket): RawTicketRow {
  return {
    ticketId: t.ticketId,
    createdAt: t.createdAt,
    category: t.category,
    severity: t.severity,
    status: t.status,
    officer: t.assignedOfficer,
    description: t.description,
    lat: t.latitude,
    lon: t.longitude,
    mapLink: t.mapLink,
    area: t.area,
    postalCode: t.postalCode,
    rating: t.rating ?? null
  };
}

const text = z.union([z.string(), z.number()]).transform((v) => String(v).trim());

const RosterRow = z.object({
  officerId: text.pipe(z.string().min(1)),
  name: text.pipe(z.string().min(1)),
  reportsTo: text.nullish(),
  level: text.nullish(),
  sector: text.nullish(),
  chatId: text.nullish()
});

// Rows that do not fit the roster schema are dropped, not fatal.
export function parseRoster(rows: unknown[]): OfficerRecord[] {
  const out: OfficerRecord[] = [];
  for (const row of rows) {
    const p = RosterRow.safeParse(row);
    if (!p.success) continue;
    const r = p.data;
    out.push({
      officerId: r.officerId,
      name: r.name,
      reportsTo: r.reportsTo ?? "",
      level: r.level ?? "",
      sector: r.sector ?? "",
      ...(r.chatId ? { chatId: r.chatId } : {})
    });
  }
  return out;
}
