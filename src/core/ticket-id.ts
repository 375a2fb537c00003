const TICKET_REF = /Ticket(?: ID)?:\s*#?(TKT-\d+)/i;

export function ticketIdFor(eventId: number): string {
  return `TKT-${eventId}`;
}

export function isTicketId(s: string): boolean {
  return /^TKT-\d+$/.test(s);
}

/**
 * Pulls the ticket id out of an officer notification. The match is
 * case-insensitive; the id comes back upper-cased.
 */
export function extractTicketId(text: string | undefined): { ok: true; ticketId: string } | { ok: false; error: "ticket_ref_missing" } {
  const m = TICKET_REF.exec(text ?? "");
  if (!m) return { ok: false, error: "ticket_ref_missing" };
  return { ok: true, ticketId: m[1].toUpperCase() };
}
