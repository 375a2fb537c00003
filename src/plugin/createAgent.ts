import pino from "pino";
import { GrievanceStore } from "../store/store.js";
import {
  Assignment,
  Clock,
  EvidenceRef,
  Geocoder,
  GeoPlace,
  InboundEvent,
  Messenger,
  Submitter,
  Ticket,
  VisionClassifier
} from "../types/contracts.js";
import { RateLimiter } from "../core/rate-limiter.js";
import { DuplicateDetector } from "../core/dedupe.js";
import { TriageGate, withTimeout } from "../core/triage.js";
import { OfficerDirectory } from "../core/officers.js";
import { BackgroundTasks, SerialQueue } from "../core/background.js";
import { Effect, SessionEvent, SessionRegistry, SessionState, Step, TicketDraft, transition } from "../core/session.js";
import { canTransition } from "../core/transitions.js";
import { extractTicketId, isTicketId } from "../core/ticket-id.js";
import { mapLinkFor } from "../core/location.js";
import { EMPTY_PLACE } from "../adapters/geocoder.js";
import * as msg from "../lib/messages.js";

export type ResolutionResult =
  | { ok: true; ticketId: string; citizenNotified: boolean }
  | {
      ok: false;
      error: "not_an_officer" | "not_a_reply" | "ticket_ref_missing" | "ticket_not_found" | "not_assigned" | "already_resolved" | "update_failed";
      ticketId?: string;
    };

export type RatingResult = { ok: true; ticketId: string; score: number } | { ok: false; error: "invalid_rating" };

type PhotoSubmitted = Extract<InboundEvent, { type: "photo_submitted" }>;
type ReplyWithPhoto = Extract<InboundEvent, { type: "reply_with_photo" }>;

export interface AgentOptions {
  store: GrievanceStore;
  messenger: Messenger;
  classifier: VisionClassifier;
  geocoder: Geocoder;
  // Fetches photo bytes for events that carry only a reference.
  loadEvidence?: (ref: EvidenceRef) => Promise<Buffer>;
  officerChatId?: string;
  rateLimitMax?: number;
  rateLimitWindowSeconds?: number;
  maxAccuracyMeters?: number;
  dedupeMaxEntries?: number;
  officerCacheTtlSeconds?: number;
  slaHours?: number;
  classifierTimeoutMs?: number;
  geocoderTimeoutMs?: number;
  storeTimeoutMs?: number;
  now?: Clock;
  logger?: pino.Logger;
  // Pre-built components, mostly for tests.
  directory?: OfficerDirectory;
  background?: BackgroundTasks;
}

export function createAgent(args: AgentOptions) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const now = args.now ?? Date.now;
  const storeTimeoutMs = args.storeTimeoutMs ?? 15_000;
  const geocoderTimeoutMs = args.geocoderTimeoutMs ?? 5_000;

  const rateLimiter = new RateLimiter({ max: args.rateLimitMax ?? 5, windowSeconds: args.rateLimitWindowSeconds ?? 3600, now });
  const duplicates = new DuplicateDetector({ maxEntries: args.dedupeMaxEntries });
  const gate = new TriageGate({ classifier: args.classifier, timeoutMs: args.classifierTimeoutMs, logger: log });
  const directory = args.directory ?? new OfficerDirectory({
    store: args.store,
    ttlSeconds: args.officerCacheTtlSeconds,
    slaHours: args.slaHours,
    now,
    logger: log
  });
  const background = args.background ?? new BackgroundTasks({ logger: log });
  const sessions = new SessionRegistry();
  const queue = new SerialQueue();

  // Outbound messages are best-effort: a failed send is logged, never thrown.
  async function deliver(what: string, context: Record<string, unknown>, send: () => Promise<void>): Promise<boolean> {
    try {
      await send();
      return true;
    } catch (err) {
      log.error({ ...context, err }, `messenger: ${what} failed`);
      return false;
    }
  }

  async function advance(submitter: Submitter, event: SessionEvent, evidenceBytes?: Buffer): Promise<Step> {
    const step = transition(sessions.get(submitter), event, { maxAccuracyMeters: args.maxAccuracyMeters });
    sessions.set(submitter, step.state);
    if (step.outcome) log.info({ submitter, outcome: step.outcome }, "session: closed");

    for (const effect of step.effects) {
      await runEffect(submitter, effect, evidenceBytes);
    }
    return step;
  }

  async function runEffect(submitter: Submitter, effect: Effect, evidenceBytes?: Buffer): Promise<void> {
    const ctx = { submitter };
    switch (effect.type) {
      case "reply": {
        const text = msg.notice(effect.notice);
        const closing = effect.notice.kind === "cancelled";
        await deliver("reply", ctx, () => args.messenger.sendText(submitter, text, { removeKeyboard: closing }));
        return;
      }
      case "mark_seen":
        if (evidenceBytes) duplicates.markSeen(evidenceBytes);
        return;
      case "request_location": {
        const text = msg.requestLocation(effect.verdict);
        await deliver("request_location", ctx, () => args.messenger.requestLocation(submitter, text));
        return;
      }
      case "ask_resample": {
        const text = msg.askResample(effect.accuracyMeters, effect.maxAccuracyMeters);
        await deliver("ask_resample", ctx, () => args.messenger.requestLocation(submitter, text));
        return;
      }
      case "create_ticket":
        await createTicket(submitter, effect.draft);
        return;
    }
  }

  async function evidenceOf(ev: PhotoSubmitted, submitter: Submitter): Promise<Buffer | null> {
    if (ev.evidenceBytes) return ev.evidenceBytes;
    try {
      if (!args.loadEvidence) throw new Error("no evidence loader configured");
      return await args.loadEvidence(ev.evidenceRef);
    } catch (err) {
      log.error({ submitter, evidenceRef: ev.evidenceRef, err }, "intake: photo could not be fetched");
      await deliver("reply", { submitter }, () => args.messenger.sendText(submitter, msg.notice({ kind: "technical_error" })));
      return null;
    }
  }

  async function onPhoto(ev: PhotoSubmitted & { evidenceBytes: Buffer }): Promise<Step> {
    const submitter = ev.submitter;
    await advance(submitter, { type: "photo_received", eventId: ev.eventId, at: new Date(now()).toISOString() });

    if (!rateLimiter.allow(submitter)) {
      log.info({ submitter }, "intake: rate_limited");
      return advance(submitter, { type: "photo_denied", reason: "rate_limited" });
    }
    if (duplicates.isDuplicate(ev.evidenceBytes)) {
      log.info({ submitter }, "intake: duplicate");
      return advance(submitter, { type: "photo_denied", reason: "duplicate" });
    }

    const out = await gate.classify(ev.evidenceBytes);
    if (out.ok) {
      log.info({ submitter, category: out.verdict.category, severity: out.verdict.severity }, "triage: accepted");
      return advance(submitter, { type: "photo_accepted", verdict: out.verdict, evidenceRef: ev.evidenceRef }, ev.evidenceBytes);
    }
    if (out.error === "rejected") {
      log.info({ submitter, reason: out.reason }, "triage: rejected");
      return advance(submitter, { type: "photo_rejected", reason: out.reason });
    }
    log.error({ submitter, detail: out.detail }, "triage: classification_failed");
    return advance(submitter, { type: "photo_failed" });
  }

  async function lookupPlace(latitude: number, longitude: number, ticketId: string): Promise<GeoPlace> {
    try {
      return await withTimeout(args.geocoder.reverse(latitude, longitude), geocoderTimeoutMs);
    } catch (err) {
      log.warn({ ticketId, err }, "geocoder: lookup failed, continuing without area");
      return EMPTY_PLACE;
    }
  }

  async function notifyOfficer(ticket: Ticket, assignment: Assignment): Promise<boolean> {
    const target = args.officerChatId ?? assignment.l1ChatId;
    if (!target) {
      log.warn({ ticketId: ticket.ticketId }, "officer: no chat to notify");
      return false;
    }
    return deliver("officer_notification", { ticketId: ticket.ticketId }, () =>
      args.messenger.sendPhoto(target, ticket.beforeEvidenceRef, msg.officerNotification(ticket))
    );
  }

  /**
   * Confirms to the citizen right away; geocoding, the store write and the
   * officer notification run in the background. The ticket may not be
   * readable from the store for a moment after the confirmation.
   */
  async function createTicket(submitter: Submitter, draft: TicketDraft): Promise<Ticket> {
    const assignment = await directory.resolve(draft.verdict.category);
    const { latitude, longitude } = draft.sample;
    const ticket: Ticket = {
      ticketId: draft.ticketId,
      createdAt: new Date(now()).toISOString(),
      category: draft.verdict.category,
      severity: draft.verdict.severity,
      description: draft.verdict.description,
      status: "Open",
      assignedOfficer: assignment.l1Assignee,
      escalationOfficer: assignment.l2Assignee,
      slaHours: assignment.slaHours,
      latitude,
      longitude,
      mapLink: mapLinkFor(latitude, longitude),
      area: "",
      postalCode: "",
      submitterRef: submitter,
      beforeEvidenceRef: draft.evidenceRef
    };

    log.info({ submitter, ticketId: ticket.ticketId, officer: ticket.assignedOfficer }, "ticket: created");
    await deliver("ticket_confirmation", { submitter, ticketId: ticket.ticketId }, () =>
      args.messenger.sendText(submitter, msg.ticketConfirmation(ticket), { removeKeyboard: true })
    );

    background.submit("ticket_create", { ticketId: ticket.ticketId, submitter }, async () => {
      const place = await lookupPlace(latitude, longitude, ticket.ticketId);
      const full: Ticket = { ...ticket, area: place.area, postalCode: place.postalCode };

      let stored = false;
      try {
        stored = await withTimeout(args.store.appendTicket(full), storeTimeoutMs);
      } catch (err) {
        log.error({ ticketId: full.ticketId, err }, "store: append_ticket threw");
      }
      if (!stored) log.error({ ticketId: full.ticketId }, "store: ticket not persisted");

      await notifyOfficer(full, assignment);
    });

    return ticket;
  }

  /**
   * Officer resolution. Only the officer chat or the assigned officer's own
   * chat may resolve a ticket; a reply from any other chat is `not_an_officer`
   * and gets no answer here.
   */
  async function onReplyWithPhoto(ev: ReplyWithPhoto): Promise<ResolutionResult> {
    const officer = ev.replier;
    const tell = (html: string) => deliver("officer_reply", { officer }, () => args.messenger.sendText(officer, html));

    const chats = await directory.officerChats();
    const isOfficerChat = officer === args.officerChatId;
    if (!isOfficerChat && ![...chats.values()].includes(officer)) {
      return { ok: false, error: "not_an_officer" };
    }

    if (ev.inReplyToText === undefined) {
      await tell(msg.RESOLUTION.notAReply);
      return { ok: false, error: "not_a_reply" };
    }

    const ref = extractTicketId(ev.inReplyToText);
    if (!ref.ok) {
      log.warn({ officer }, "resolution: no ticket id in replied message");
      await tell(msg.RESOLUTION.refMissing);
      return { ok: false, error: "ticket_ref_missing" };
    }
    const ticketId = ref.ticketId;

    let ticket: Ticket | null = null;
    try {
      ticket = await withTimeout(args.store.findTicket(ticketId), storeTimeoutMs);
    } catch (err) {
      log.error({ ticketId, err }, "store: find_ticket failed");
      await tell(msg.RESOLUTION.updateFailed(ticketId));
      return { ok: false, error: "update_failed", ticketId };
    }
    if (!ticket) {
      log.warn({ ticketId }, "resolution: ticket not found");
      await tell(msg.RESOLUTION.notFound(ticketId));
      return { ok: false, error: "ticket_not_found", ticketId };
    }
    if (!isOfficerChat && chats.get(ticket.assignedOfficer) !== officer) {
      log.warn({ ticketId, officer, assigned: ticket.assignedOfficer }, "resolution: replier is not the assigned officer");
      await tell(msg.RESOLUTION.notAssigned(ticketId));
      return { ok: false, error: "not_assigned", ticketId };
    }
    if (!canTransition(ticket.status, "Resolved")) {
      await tell(msg.RESOLUTION.alreadyResolved(ticketId));
      return { ok: false, error: "already_resolved", ticketId };
    }

    let updated = false;
    try {
      updated = await withTimeout(args.store.updateStatus(ticketId, "Resolved", ev.evidenceRef), storeTimeoutMs);
    } catch (err) {
      log.error({ ticketId, err }, "store: update_status failed");
    }
    if (!updated) {
      await tell(msg.RESOLUTION.updateFailed(ticketId));
      return { ok: false, error: "update_failed", ticketId };
    }
    log.info({ ticketId, officer }, "ticket: resolved");

    let meta = { submitterRef: ticket.submitterRef, beforeEvidenceRef: ticket.beforeEvidenceRef };
    try {
      meta = (await withTimeout(args.store.getMeta(ticketId), storeTimeoutMs)) ?? meta;
    } catch (err) {
      log.warn({ ticketId, err }, "store: get_meta failed, using ticket row");
    }

    const ctx = { ticketId, submitter: meta.submitterRef };
    const mediaSent = await deliver("resolution_media", ctx, () =>
      args.messenger.sendMediaGroup(meta.submitterRef, [meta.beforeEvidenceRef, ev.evidenceRef], msg.citizenResolved(ticketId))
    );
    const promptSent = await deliver("rating_prompt", ctx, () =>
      args.messenger.sendRatingPrompt(meta.submitterRef, ticketId, msg.ratingPrompt(ticketId))
    );
    const citizenNotified = mediaSent && promptSent;

    await tell(msg.RESOLUTION.resolved(ticketId, citizenNotified));
    return { ok: true, ticketId, citizenNotified };
  }

  async function onRating(ev: Extract<InboundEvent, { type: "rating_chosen" }>): Promise<RatingResult> {
    const { ticketId, score } = ev;
    if (!isTicketId(ticketId) || !Number.isInteger(score) || score < 1 || score > 5) {
      await deliver("rating_ack", { ticketId }, () => args.messenger.acknowledge(ev.callbackId, msg.RATING_INVALID));
      return { ok: false, error: "invalid_rating" };
    }

    // last click wins
    background.submit("ticket_rating", { ticketId, score }, async () => {
      const ok = await withTimeout(args.store.updateRating(ticketId, score), storeTimeoutMs);
      if (!ok) throw new Error(`rating not stored for ${ticketId}`);
    });

    await deliver("rating_ack", { ticketId }, () => args.messenger.acknowledge(ev.callbackId, msg.ratingThanks(score)));
    await deliver("rating_thanks", { ticketId }, () => args.messenger.sendText(ev.chatId, msg.ratingThanks(score)));
    return { ok: true, ticketId, score };
  }

  async function dispatch(ev: InboundEvent): Promise<void> {
    switch (ev.type) {
      case "photo_submitted": {
        const bytes = await evidenceOf(ev, ev.submitter);
        if (bytes) await onPhoto({ ...ev, evidenceBytes: bytes });
        return;
      }
      case "location_shared":
        await advance(ev.submitter, {
          type: "location",
          sample: { latitude: ev.latitude, longitude: ev.longitude, accuracyMeters: ev.accuracy }
        });
        return;
      case "cancel_requested":
        await advance(ev.submitter, { type: "cancel" });
        return;
      case "reply_with_photo": {
        const out = await onReplyWithPhoto(ev);
        if (out.ok || out.error !== "not_an_officer") return;
        // a citizen replying to a bot message with a photo is filing a report
        log.info({ submitter: ev.replier }, "resolution: reply from a citizen chat, taken as a new report");
        const report: PhotoSubmitted = {
          type: "photo_submitted",
          eventId: ev.eventId,
          submitter: ev.replier,
          evidenceRef: ev.evidenceRef,
          ...(ev.evidenceBytes ? { evidenceBytes: ev.evidenceBytes } : {})
        };
        const bytes = await evidenceOf(report, report.submitter);
        if (bytes) await onPhoto({ ...report, evidenceBytes: bytes });
        return;
      }
      case "rating_chosen":
        await onRating(ev);
        return;
      case "command": {
        const submitter = ev.submitter;
        const text = ev.command === "start" ? msg.welcome(ev.displayName) : msg.HELP;
        await deliver("command", { submitter }, () => args.messenger.sendText(submitter, text));
        return;
      }
    }
  }

  /** Events from one chat are handled strictly one after another. */
  function handle(ev: InboundEvent): Promise<void> {
    const key = ev.type === "rating_chosen" ? ev.chatId : ev.type === "reply_with_photo" ? ev.replier : ev.submitter;
    return queue.run(key, () => dispatch(ev));
  }

  function sessionOf(submitter: Submitter): SessionState {
    return sessions.get(submitter);
  }

  function sweep() {
    return { submittersDropped: rateLimiter.sweep() };
  }

  return { handle, onPhoto, onReplyWithPhoto, onRating, sessionOf, sweep, background, directory };
}

export type Agent = ReturnType<typeof createAgent>;
