import { z } from "zod";
import { EvidenceRef, InboundEvent, Messenger, SendOptions } from "../types/contracts.js";

/**
 * Telegram Bot API update — only the parts the engine reads:
 * - photo / location / text commands from a chat
 * - replies to a bot message (officer resolution)
 * - inline-button callbacks (ratings)
 */
const Chat = z.object({ id: z.number() }).passthrough();

const PhotoSize = z.object({
  file_id: z.string(),
  file_unique_id: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  file_size: z.number().optional()
}).passthrough();

const Message = z.object({
  message_id: z.number(),
  chat: Chat,
  from: z.object({ id: z.number(), first_name: z.string().optional(), is_bot: z.boolean().optional() }).passthrough().optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  photo: z.array(PhotoSize).optional(),
  location: z.object({
    latitude: z.number(),
    longitude: z.number(),
    horizontal_accuracy: z.number().optional()
  }).passthrough().optional(),
  reply_to_message: z.object({
    message_id: z.number(),
    from: z.object({ id: z.number(), is_bot: z.boolean().optional() }).passthrough().optional(),
    text: z.string().optional(),
    caption: z.string().optional()
  }).passthrough().optional()
}).passthrough();

const Update = z.object({
  update_id: z.number(),
  message: Message.optional(),
  callback_query: z.object({
    id: z.string(),
    data: z.string().optional(),
    message: z.object({ chat: Chat }).passthrough().optional(),
    from: z.object({ id: z.number() }).passthrough()
  }).passthrough().optional()
}).passthrough();

export type TelegramUpdate = z.infer<typeof Update>;

export function ratingCallbackData(ticketId: string, score: number): string {
  return `rate:${ticketId}:${score}`;
}

export function parseRatingCallback(data: string | undefined): { ticketId: string; score: number } | null {
  const m = /^rate:(TKT-\d+):(\d+)$/.exec(data ?? "");
  if (!m) return null;
  return { ticketId: m[1], score: Number(m[2]) };
}

function commandOf(text: string | undefined): string | null {
  const m = /^\/([a-z]+)(?:@\w+)?(?:\s|$)/i.exec((text ?? "").trim());
  return m ? m[1].toLowerCase() : null;
}

// Largest rendition is last.
function bestPhoto(photo: Array<{ file_id: string }> | undefined): EvidenceRef | null {
  if (!photo || photo.length === 0) return null;
  return photo[photo.length - 1].file_id;
}

/**
 * Maps a Telegram update to an engine event, or null for updates the engine
 * ignores. Photos are passed on by file id; their bytes are fetched later.
 *
 * A photo counts as an officer resolution when it is sent in the officer chat,
 * or when it replies to a bot message that mentions a ticket. Whether the
 * replier may resolve that ticket is for the agent to decide.
 */
export function telegramToInboundEvent(args: { body: unknown; officerChatId?: string }): InboundEvent | null {
  const u = Update.parse(args.body);

  if (u.callback_query) {
    const cq = u.callback_query;
    const rating = parseRatingCallback(cq.data);
    if (!rating) return null;
    return {
      type: "rating_chosen",
      callbackId: cq.id,
      chatId: String(cq.message?.chat.id ?? cq.from.id),
      ticketId: rating.ticketId,
      score: rating.score
    };
  }

  const msg = u.message;
  if (!msg) return null;
  const chatId = String(msg.chat.id);
  // message_id repeats across chats
  const eventId = u.update_id;

  const fileId = bestPhoto(msg.photo);
  if (fileId) {
    const replied = msg.reply_to_message;
    const replyText = replied?.from?.is_bot === true ? (replied.text ?? replied.caption) : undefined;
    const inOfficerChat = args.officerChatId !== undefined && chatId === args.officerChatId;
    const isResolution = inOfficerChat || (replyText !== undefined && /ticket/i.test(replyText));

    if (isResolution) {
      return {
        type: "reply_with_photo",
        eventId,
        replier: chatId,
        evidenceRef: fileId,
        ...(replyText !== undefined ? { inReplyToText: replyText } : {})
      };
    }
    return { type: "photo_submitted", eventId, submitter: chatId, evidenceRef: fileId };
  }

  if (msg.location) {
    return {
      type: "location_shared",
      eventId,
      submitter: chatId,
      latitude: msg.location.latitude,
      longitude: msg.location.longitude,
      // a dropped pin carries no accuracy and cannot pass the accuracy gate
      accuracy: msg.location.horizontal_accuracy ?? Number.POSITIVE_INFINITY
    };
  }

  const cmd = commandOf(msg.text);
  if (cmd === "cancel") return { type: "cancel_requested", eventId, submitter: chatId };
  if (cmd === "start" || cmd === "help") {
    return {
      type: "command",
      eventId,
      submitter: chatId,
      command: cmd,
      ...(msg.from?.first_name ? { displayName: msg.from.first_name } : {})
    };
  }
  return null;
}

const TelegramReply = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.unknown().optional()
});

const FileResult = z.object({ file_path: z.string() }).passthrough();

export class TelegramMessenger implements Messenger {
  private token: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(args: { token: string; baseUrl?: string; timeoutMs?: number }) {
    this.token = args.token;
    this.baseUrl = args.baseUrl || "https://api.telegram.org";
    this.timeoutMs = args.timeoutMs ?? 15_000;
  }

  private async call(method: string, payload: Record<string, unknown>): Promise<unknown> {
    const r = await fetch(`${this.baseUrl}/bot${this.token}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    const body = TelegramReply.safeParse(await r.json().catch(() => null));
    if (!r.ok || !body.success || !body.data.ok) {
      const why = body.success ? body.data.description : "unreadable response";
      throw new Error(`telegram ${method} failed (${r.status}): ${why ?? "unknown"}`);
    }
    return body.data.result;
  }

  async downloadFile(fileId: string): Promise<Buffer> {
    const file = FileResult.parse(await this.call("getFile", { file_id: fileId }));
    const r = await fetch(`${this.baseUrl}/file/bot${this.token}/${file.file_path}`, {
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (!r.ok) throw new Error(`telegram file download failed (${r.status})`);
    return Buffer.from(await r.arrayBuffer());
  }

  async sendText(chatId: string, html: string, opts: SendOptions = {}): Promise<void> {
    await this.call("sendMessage", {
      chat_id: chatId,
      text: html,
      parse_mode: "HTML",
      ...(opts.removeKeyboard ? { reply_markup: { remove_keyboard: true } } : {})
    });
  }

  async sendPhoto(chatId: string, photo: EvidenceRef, captionHtml: string): Promise<void> {
    await this.call("sendPhoto", { chat_id: chatId, photo, caption: captionHtml, parse_mode: "HTML" });
  }

  async sendMediaGroup(chatId: string, photos: EvidenceRef[], captionHtml: string): Promise<void> {
    await this.call("sendMediaGroup", {
      chat_id: chatId,
      media: photos.map((media, i) => ({
        type: "photo",
        media,
        ...(i === 0 ? { caption: captionHtml, parse_mode: "HTML" } : {})
      }))
    });
  }

  async sendRatingPrompt(chatId: string, ticketId: string, html: string): Promise<void> {
    const buttons = [1, 2, 3, 4, 5].map((n) => ({ text: "⭐".repeat(n), callback_data: ratingCallbackData(ticketId, n) }));
    await this.call("sendMessage", {
      chat_id: chatId,
      text: html,
      parse_mode: "HTML",
      reply_markup: { inline_keyboard: [buttons.slice(0, 3), buttons.slice(3)] }
    });
  }

  async requestLocation(chatId: string, html: string): Promise<void> {
    await this.call("sendMessage", {
      chat_id: chatId,
      text: html,
      parse_mode: "HTML",
      reply_markup: {
        keyboard: [[{ text: "📍 Share Location", request_location: true }]],
        resize_keyboard: true,
        one_time_keyboard: true
      }
    });
  }

  async acknowledge(callbackId: string, text: string): Promise<void> {
    await this.call("answerCallbackQuery", { callback_query_id: callbackId, text });
  }
}
