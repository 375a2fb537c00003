import { TicketStatus } from "../types/contracts.js";

// Open is set at creation; Resolved only through the resolution workflow. Nothing re-opens.
const allowed: Record<TicketStatus, TicketStatus[]> = {
  Open: ["Resolved"],
  Resolved: []
};

export function canTransition(from: TicketStatus, to: TicketStatus): boolean {
  return allowed[from].includes(to);
}
