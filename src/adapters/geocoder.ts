import { z } from "zod";
import { GeoPlace, Geocoder } from "../types/contracts.js";

const NominatimReverse = z.object({
  address: z.object({
    postcode: z.string().optional(),
    suburb: z.string().optional(),
    neighbourhood: z.string().optional(),
    city_district: z.string().optional(),
    village: z.string().optional(),
    town: z.string().optional(),
    city: z.string().optional()
  }).passthrough().optional()
}).passthrough();

export const EMPTY_PLACE: GeoPlace = { postalCode: "", area: "" };

export function placeFromNominatim(body: unknown): GeoPlace {
  const p = NominatimReverse.safeParse(body);
  if (!p.success || !p.data.address) return EMPTY_PLACE;
  const a = p.data.address;
  return {
    postalCode: a.postcode ?? "",
    area: a.suburb ?? a.neighbourhood ?? a.city_district ?? a.village ?? a.town ?? a.city ?? ""
  };
}

/**
 * OpenStreetMap Nominatim reverse lookup. Throws on transport errors and
 * timeouts; callers treat any failure as "no place".
 */
export class NominatimGeocoder implements Geocoder {
  private baseUrl: string;
  private timeoutMs: number;
  private userAgent: string;

  constructor(args: { baseUrl?: string; timeoutMs?: number; userAgent?: string } = {}) {
    this.baseUrl = args.baseUrl || "https://nominatim.openstreetmap.org";
    this.timeoutMs = args.timeoutMs ?? 5000;
    this.userAgent = args.userAgent || "grievance-desk/1.0";
  }

  async reverse(latitude: number, longitude: number): Promise<GeoPlace> {
    const params = new URLSearchParams({
      format: "jsonv2",
      lat: String(latitude),
      lon: String(longitude),
      addressdetails: "1"
    });
    const r = await fetch(`${this.baseUrl}/reverse?${params.toString()}`, {
      headers: { "User-Agent": this.userAgent, Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs)
    });
    if (!r.ok) throw new Error(`geocoder http ${r.status}`);
    return placeFromNominatim(await r.json());
  }
}
