import { EvidenceRef, LocationSample, Submitter, TriageVerdict } from "../types/contracts.js";
import { DEFAULT_MAX_ACCURACY_METERS, isAccurateEnough } from "./location.js";
import { ticketIdFor } from "./ticket-id.js";

export type SessionState =
  | { kind: "NEW" }
  | { kind: "TRIAGING"; originEventId: number; startedAt: string }
  | {
      kind: "AWAITING_LOCATION";
      verdict: TriageVerdict;
      evidenceRef: EvidenceRef;
      originEventId: number;
      createdAt: string;
    };

export type Outcome = "REJECTED" | "COMPLETED" | "CANCELLED";

export type SessionEvent =
  | { type: "photo_received"; eventId: number; at: string }
  | { type: "photo_denied"; reason: "rate_limited" | "duplicate" }
  | { type: "photo_rejected"; reason: string }
  | { type: "photo_failed" }
  | { type: "photo_accepted"; verdict: TriageVerdict; evidenceRef: EvidenceRef }
  | { type: "location"; sample: LocationSample }
  | { type: "cancel" };

export type Notice =
  | { kind: "analyzing" }
  | { kind: "rate_limited" }
  | { kind: "duplicate" }
  | { kind: "rejected"; reason: string }
  | { kind: "technical_error" }
  | { kind: "cancelled" }
  | { kind: "nothing_to_cancel" }
  | { kind: "no_active_session" }
  | { kind: "still_analyzing" };

export interface TicketDraft {
  ticketId: string;
  verdict: TriageVerdict;
  evidenceRef: EvidenceRef;
  sample: LocationSample;
  sessionCreatedAt: string;
}

export type Effect =
  | { type: "reply"; notice: Notice }
  | { type: "mark_seen" }
  | { type: "request_location"; verdict: TriageVerdict }
  | { type: "ask_resample"; accuracyMeters: number; maxAccuracyMeters: number }
  | { type: "create_ticket"; draft: TicketDraft };

export interface Step {
  state: SessionState;
  outcome?: Outcome;
  effects: Effect[];
}

export const NEW: SessionState = { kind: "NEW" };

const reply = (notice: Notice): Effect => ({ type: "reply", notice });

/**
 * Pure transition function for one submitter's intake session. The caller
 * performs the effects in order; terminal outcomes always land back in NEW.
 */
export function transition(
  state: SessionState,
  event: SessionEvent,
  opts: { maxAccuracyMeters?: number } = {}
): Step {
  const maxAccuracyMeters = opts.maxAccuracyMeters ?? DEFAULT_MAX_ACCURACY_METERS;

  // A new photo supersedes whatever was pending.
  if (event.type === "photo_received") {
    return {
      state: { kind: "TRIAGING", originEventId: event.eventId, startedAt: event.at },
      effects: [reply({ kind: "analyzing" })]
    };
  }

  switch (state.kind) {
    case "TRIAGING":
      switch (event.type) {
        case "photo_denied":
          return { state: NEW, outcome: "REJECTED", effects: [reply({ kind: event.reason })] };
        case "photo_rejected":
          return { state: NEW, outcome: "REJECTED", effects: [reply({ kind: "rejected", reason: event.reason })] };
        case "photo_failed":
          return { state: NEW, outcome: "REJECTED", effects: [reply({ kind: "technical_error" })] };
        case "photo_accepted":
          return {
            state: {
              kind: "AWAITING_LOCATION",
              verdict: event.verdict,
              evidenceRef: event.evidenceRef,
              originEventId: state.originEventId,
              createdAt: state.startedAt
            },
            effects: [{ type: "mark_seen" }, { type: "request_location", verdict: event.verdict }]
          };
        case "location":
        case "cancel":
          return { state, effects: [reply({ kind: "still_analyzing" })] };
      }
      return { state, effects: [] };

    case "AWAITING_LOCATION":
      switch (event.type) {
        case "location": {
          if (!isAccurateEnough(event.sample, maxAccuracyMeters)) {
            return {
              state,
              effects: [{ type: "ask_resample", accuracyMeters: event.sample.accuracyMeters, maxAccuracyMeters }]
            };
          }
          const draft: TicketDraft = {
            ticketId: ticketIdFor(state.originEventId),
            verdict: state.verdict,
            evidenceRef: state.evidenceRef,
            sample: event.sample,
            sessionCreatedAt: state.createdAt
          };
          return { state: NEW, outcome: "COMPLETED", effects: [{ type: "create_ticket", draft }] };
        }
        case "cancel":
          return { state: NEW, outcome: "CANCELLED", effects: [reply({ kind: "cancelled" })] };
        default:
          // triage results only belong to TRIAGING
          return { state, effects: [] };
      }

    case "NEW":
      switch (event.type) {
        case "location":
          return { state, effects: [reply({ kind: "no_active_session" })] };
        case "cancel":
          return { state, effects: [reply({ kind: "nothing_to_cancel" })] };
        default:
          return { state, effects: [] };
      }
  }

  return { state, effects: [] };
}

/** In-memory session registry, at most one session per submitter. */
export class SessionRegistry {
  private sessions = new Map<Submitter, SessionState>();

  get(submitter: Submitter): SessionState {
    return this.sessions.get(submitter) ?? NEW;
  }

  set(submitter: Submitter, state: SessionState): void {
    if (state.kind === "NEW") this.sessions.delete(submitter);
    else this.sessions.set(submitter, state);
  }

  size(): number {
    return this.sessions.size;
  }
}
