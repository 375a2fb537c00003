import pino from "pino";
import { Assignment, Category, Clock, OfficerRecord } from "../types/contracts.js";
import { GrievanceStore } from "../store/store.js";
import { TtlCache } from "./cache.js";

export const UNASSIGNED = "Unassigned";
export const GENERAL_ADMIN = "General_Admin";

const GROUND_LEVELS = new Set(["1", "l1", "field"]);

export type OfficerMap = Record<string, Assignment>;

export function isGroundLevel(level: string): boolean {
  return GROUND_LEVELS.has(level.trim().toLowerCase());
}

/**
 * Sector -> { L1, L2 }. L1 is the ground-level row for the sector, L2 one hop
 * up its reports_to. With several ground-level rows for a sector the last row
 * wins; `onConflict` is told about each override.
 */
export function buildOfficerMap(
  records: OfficerRecord[],
  slaHours: number,
  onConflict?: (sector: string, replaced: string, by: string) => void
): OfficerMap {
  const byId = new Map<string, OfficerRecord>();
  for (const r of records) byId.set(r.officerId.trim(), r);

  const mapping: OfficerMap = {};
  for (const r of records) {
    const sector = r.sector.trim();
    if (!sector) continue;
    if (!isGroundLevel(r.level)) continue;

    const parent = byId.get(r.reportsTo.trim());
    const prev = mapping[sector];
    if (prev && onConflict) onConflict(sector, prev.l1Assignee, r.name);

    mapping[sector] = {
      l1Assignee: r.name,
      l2Assignee: parent?.name || UNASSIGNED,
      slaHours,
      ...(r.chatId ? { l1ChatId: r.chatId } : {})
    };
  }
  return mapping;
}

export class OfficerDirectory {
  private readonly cache: TtlCache<OfficerMap>;
  private readonly slaHours: number;
  private readonly log: pino.Logger;

  constructor(args: {
    store: GrievanceStore;
    ttlSeconds?: number;
    slaHours?: number;
    now?: Clock;
    logger?: pino.Logger;
  }) {
    this.slaHours = args.slaHours ?? 48;
    this.log = args.logger ?? pino({ level: "silent" });
    this.cache = new TtlCache<OfficerMap>({
      ttlSeconds: args.ttlSeconds ?? 300,
      now: args.now,
      load: async () => {
        const records = await args.store.listRoster();
        const mapping = buildOfficerMap(records, this.slaHours, (sector, replaced, by) => {
          this.log.warn({ sector, replaced, by }, "officers: several ground-level officers for sector, last one wins");
        });
        this.log.info({ sectors: Object.keys(mapping).length }, "officers: directory refreshed");
        return mapping;
      }
    });
  }

  // Empty mapping when the roster has never loaded.
  async snapshot(): Promise<OfficerMap> {
    const r = await this.cache.read();
    if (r.ok) {
      if (r.stale) this.log.warn("officers: roster refresh failed, serving stale directory");
      return r.value;
    }
    this.log.error({ err: r.error }, "officers: roster unavailable and no cached directory");
    return {};
  }

  /** Chat ids of ground-level officers that have one, by officer name. */
  async officerChats(): Promise<Map<string, string>> {
    const chats = new Map<string, string>();
    for (const a of Object.values(await this.snapshot())) {
      if (a.l1ChatId) chats.set(a.l1Assignee, a.l1ChatId);
    }
    return chats;
  }

  async resolve(category: Category): Promise<Assignment> {
    const mapping = await this.snapshot();
    const hit = mapping[category];
    if (hit) return hit;
    return { l1Assignee: GENERAL_ADMIN, l2Assignee: UNASSIGNED, slaHours: this.slaHours };
  }
}
