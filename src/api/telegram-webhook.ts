import { Router } from "express";
import crypto from "crypto";
import pino from "pino";
import { ZodError } from "zod";
import { Agent } from "../plugin/createAgent.js";
import { telegramToInboundEvent } from "../adapters/telegram.js";
import { InboundEvent } from "../types/contracts.js";

function secretMatches(got: string, expected: string) {
  const a = Buffer.from(got);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

/**
 * Telegram webhook. Answers 200 as soon as the update is parsed so Telegram
 * does not redeliver while a slow classification runs. The event enters its
 * chat's queue before anything is awaited; photo bytes are fetched inside the
 * queued job, so events from one chat are handled in arrival order.
 */
export function makeTelegramRoutes(args: {
  agent: Agent;
  webhookSecret?: string;
  officerChatId?: string;
  logger?: pino.Logger;
}) {
  const r = Router();
  const log = args.logger ?? pino({ level: "silent" });

  r.post("/webhook", (req, res) => {
    if (args.webhookSecret) {
      const got = req.header("x-telegram-bot-api-secret-token") || "";
      if (!secretMatches(got, args.webhookSecret)) return res.status(401).json({ ok: false, error: "invalid_webhook_secret" });
    }

    let ev: InboundEvent | null;
    try {
      ev = telegramToInboundEvent({ body: req.body, officerChatId: args.officerChatId });
    } catch (e) {
      if (e instanceof ZodError) return res.status(400).json({ ok: false, error: "invalid_update" });
      throw e;
    }

    if (!ev) return res.json({ ok: true, ignored: true });
    const type = ev.type;

    args.agent.handle(ev).catch((err: unknown) => {
      log.error({ err, type }, "agent: event handling failed");
    });
    return res.json({ ok: true });
  });

  return r;
}
