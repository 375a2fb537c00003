import { Ticket, TriageVerdict } from "../types/contracts.js";
import { Notice } from "../core/session.js";
import { Markup, html, link } from "./html.js";

export function welcome(displayName?: string): string {
  return html`Hi ${displayName || "there"}!

I am the <b>Public Grievance Bot</b>.
Please <b>send me a photo</b> of the issue (pothole, garbage, broken streetlight, leaking pipe...) and I will route it to the right officer.`;
}

export const HELP =
  "Send a clear photo of the problem. I will check it, ask for your location, and file a ticket with the responsible officer.\n" +
  "Send /cancel to drop a report you started.";

export function notice(n: Notice): string {
  switch (n.kind) {
    case "analyzing":
      return "🧐 Analyzing your photo... Please wait.";
    case "rate_limited":
      return "⏳ You have reached the hourly limit for new reports. Please try again later.";
    case "duplicate":
      return "♻️ This photo has already been reported. Please send a new photo of the issue.";
    case "rejected":
      return html`❌ <b>Report not accepted</b>\n${n.reason}`;
    case "technical_error":
      return "⚠️ I could not analyze the photo because of a technical problem. Please try again.";
    case "cancelled":
      return "Report cancelled. Send a new photo whenever you are ready.";
    case "nothing_to_cancel":
      return "There is no report in progress.";
    case "no_active_session":
      return "Please send a photo of the issue first, then share your location.";
    case "still_analyzing":
      return "Still analyzing your photo, one moment...";
  }
}

export function requestLocation(v: TriageVerdict): string {
  return html`✅ <b>Issue verified</b>
📂 <b>Category:</b> ${v.category}
⚠️ <b>Severity:</b> ${v.severity}
📝 ${v.description}

📍 Please share the <b>exact location</b> of the issue using the button below.`;
}

export function askResample(accuracyMeters: number, maxAccuracyMeters: number): string {
  const got = Number.isFinite(accuracyMeters)
    ? html`Your location is accurate to about ${Math.round(accuracyMeters)} m`
    : "That location came without an accuracy reading";
  return html`📡 ${new Markup(got)}, but I need ${maxAccuracyMeters} m or better.
Please turn on GPS, wait a few seconds and share your live location again.`;
}

export function ticketConfirmation(t: Ticket): string {
  return html`🎫 <b>Ticket Created:</b> #${t.ticketId}
📂 <b>Category:</b> ${t.category}
⚠️ <b>Severity:</b> ${t.severity}
👮 <b>Assigned To:</b> ${t.assignedOfficer}
⏱️ <b>Resolution target:</b> ${t.slaHours} hours

You will get a message with a photo once the issue is resolved.`;
}

// The "Ticket: #TKT-..." line is what the resolution flow reads back out of the officer's reply.
export function officerNotification(t: Ticket): string {
  return html`🚨 New Grievance Assigned!
Ticket: #${t.ticketId}
📂 Category: ${t.category} | Severity: ${t.severity}
👮 Officer: ${t.assignedOfficer} (escalation: ${t.escalationOfficer})
📝 ${t.description}
📍 ${t.area || "Unknown area"}${t.postalCode ? ` - ${t.postalCode}` : ""}
🗺️ ${link(t.mapLink, "Open map")}

Reply to this message with a photo of the fixed site to resolve the ticket.`;
}

export const RESOLUTION = {
  notAReply: "Please <b>reply</b> to the ticket notification with the photo of the resolved site.",
  refMissing: "❌ I could not find a ticket id in the message you replied to.",
  notFound: (ticketId: string) =>
    html`❌ Ticket ${ticketId} was not found. If it was created just now it may still be syncing; please try again in a minute.`,
  alreadyResolved: (ticketId: string) => html`ℹ️ Ticket ${ticketId} is already resolved.`,
  notAssigned: (ticketId: string) => html`⛔ Ticket ${ticketId} is assigned to another officer.`,
  updateFailed: (ticketId: string) => html`⚠️ Could not update ticket ${ticketId}. Please try again.`,
  resolved: (ticketId: string, citizenNotified: boolean) =>
    citizenNotified
      ? html`✅ Ticket ${ticketId} marked as <b>Resolved</b>. The citizen has been notified.`
      : html`✅ Ticket ${ticketId} marked as <b>Resolved</b>. The citizen could not be notified.`
};

export function citizenResolved(ticketId: string): string {
  return html`🎉 <b>Your grievance ${ticketId} has been resolved!</b>
Before and after photos are attached.`;
}

export function ratingPrompt(ticketId: string): string {
  return html`How satisfied are you with the resolution of ${ticketId}? Tap a rating:`;
}

export function ratingThanks(score: number): string {
  return `Thank you! You rated the resolution ${"⭐".repeat(score)}`;
}

export const RATING_INVALID = "That rating is not valid.";
