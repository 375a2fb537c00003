export const CATEGORIES = ["Sanitation", "Drainage", "WaterSupply", "RoadInfra", "Lighting", "Fire", "Other"] as const;
export const SEVERITIES = ["High", "Medium", "Low"] as const;
export const TICKET_STATUSES = ["Open", "Resolved"] as const;

export type Category = (typeof CATEGORIES)[number];
export type Severity = (typeof SEVERITIES)[number];
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export type Clock = () => number; // epoch ms

// Chat participant id (Telegram chat id as a string).
export type Submitter = string;

// Opaque handle to a photo held by the chat transport (Telegram file_id).
export type EvidenceRef = string;

export interface TriageVerdict {
  readonly isValid: boolean;
  readonly rejectionReason?: string;
  readonly category: Category;
  readonly severity: Severity;
  readonly description: string;
}

export interface LocationSample {
  latitude: number;
  longitude: number;
  accuracyMeters: number;
}

export interface Ticket {
  ticketId: string;
  createdAt: string; // ISO
  category: Category;
  severity: Severity;
  description: string;
  status: TicketStatus;
  assignedOfficer: string;
  escalationOfficer: string;
  slaHours: number;
  latitude: number; // NaN when a store holds no value
  longitude: number;
  mapLink: string;
  area: string;
  postalCode: string;
  submitterRef: Submitter;
  beforeEvidenceRef: EvidenceRef;
  afterEvidenceRef?: EvidenceRef;
  rating?: number;
  resolvedAt?: string; // ISO
  ratedAt?: string; // ISO
}

export interface TicketMeta {
  submitterRef: Submitter;
  beforeEvidenceRef: EvidenceRef;
}

export interface OfficerRecord {
  officerId: string;
  name: string;
  reportsTo: string;
  level: string;
  sector: string;
  chatId?: string;
}

export interface Assignment {
  l1Assignee: string;
  l2Assignee: string;
  slaHours: number;
  l1ChatId?: string;
}

// Flat row served to the reporting surface. lat/lon are null when the stored
// value is not numeric.
export interface ReportRow {
  ticketId: string;
  createdAt: string;
  category: string;
  severity: string;
  status: string;
  officer: string;
  description: string;
  lat: number | null;
  lon: number | null;
  mapLink: string;
  area: string;
  postalCode: string;
  rating: number | null;
}

// Row as the store hands it out, before numeric normalisation.
export type RawTicketRow = Omit<ReportRow, "lat" | "lon" | "rating"> & {
  lat: unknown;
  lon: unknown;
  rating: unknown;
};

/**
 * Chat events. `eventId` is unique per bot (Telegram's update_id), so ticket
 * ids derived from it never collide across chats. Photo events may arrive
 * without bytes; the agent then fetches them by `evidenceRef`, in chat order.
 */
export type InboundEvent =
  | { type: "photo_submitted"; eventId: number; submitter: Submitter; evidenceRef: EvidenceRef; evidenceBytes?: Buffer }
  | { type: "location_shared"; eventId: number; submitter: Submitter; latitude: number; longitude: number; accuracy: number }
  | { type: "cancel_requested"; eventId: number; submitter: Submitter }
  | { type: "reply_with_photo"; eventId: number; replier: Submitter; evidenceRef: EvidenceRef; evidenceBytes?: Buffer; inReplyToText?: string }
  | { type: "rating_chosen"; callbackId: string; chatId: Submitter; ticketId: string; score: number }
  | { type: "command"; eventId: number; submitter: Submitter; command: "start" | "help"; displayName?: string };

export interface SendOptions {
  removeKeyboard?: boolean;
}

/** Outbound side of the chat transport. Text is Telegram-flavoured HTML. */
export interface Messenger {
  sendText(chatId: string, html: string, opts?: SendOptions): Promise<void>;
  sendPhoto(chatId: string, photo: EvidenceRef, captionHtml: string): Promise<void>;
  sendMediaGroup(chatId: string, photos: EvidenceRef[], captionHtml: string): Promise<void>;
  sendRatingPrompt(chatId: string, ticketId: string, html: string): Promise<void>;
  requestLocation(chatId: string, html: string): Promise<void>;
  acknowledge(callbackId: string, text: string): Promise<void>;
}

export interface GeoPlace {
  postalCode: string;
  area: string;
}

export interface Geocoder {
  reverse(latitude: number, longitude: number): Promise<GeoPlace>;
}

/** Vision model: returns the raw text answer for an image + instructions. */
export interface VisionClassifier {
  classify(image: Buffer, instructions: string): Promise<string>;
}
