import { z } from "zod";
import pino from "pino";
import { CATEGORIES, Category, SEVERITIES, Severity, TriageVerdict, VisionClassifier } from "../types/contracts.js";

export const TRIAGE_INSTRUCTIONS = `
You are the intake screener of a public grievance system. Look at the photo and answer with ONE JSON object, no prose.

Reject the photo (is_valid=false) when EITHER is true:
1. It is a photo of a screen or display (monitor, phone, TV, printed screenshot) rather than a direct photo of a real place.
   Look for moire patterns, pixel grids, screen bezels, glare from a glass panel, UI chrome.
2. It does not show a public infrastructure defect: portraits, selfies, documents, food, pets, unrelated objects,
   or an image too blurry or dark to tell.

When rejecting, set rejection_reason to one short sentence the citizen can read.

When accepting (is_valid=true), fill:
- category: one of ${CATEGORIES.join(", ")}
- severity: one of ${SEVERITIES.join(", ")}
- description: one sentence describing the defect

Schema:
{"is_valid": boolean, "rejection_reason": string | null, "category": string | null, "severity": string | null, "description": string | null}
`.trim();

const RawVerdict = z.object({
  is_valid: z.boolean(),
  rejection_reason: z.string().nullish(),
  category: z.string().nullish(),
  severity: z.string().nullish(),
  description: z.string().nullish()
});

// Labels models tend to answer with instead of the canonical category.
const categoryAliases: Array<{ category: Category; any: string[] }> = [
  { category: "RoadInfra", any: ["road", "pothole", "footpath", "pavement", "sidewalk", "bridge"] },
  { category: "Sanitation", any: ["sanitation", "garbage", "trash", "waste", "litter", "dump"] },
  { category: "Drainage", any: ["drain", "sewage", "sewer", "gutter", "waterlogging", "flood"] },
  { category: "WaterSupply", any: ["water", "pipe", "leak"] },
  { category: "Lighting", any: ["light", "lamp", "electric", "power"] },
  { category: "Fire", any: ["fire", "smoke", "burn"] }
];

export function normalizeCategory(raw: string | null | undefined): Category {
  const v = (raw ?? "").trim();
  const exact = CATEGORIES.find((c) => c.toLowerCase() === v.toLowerCase());
  if (exact) return exact;

  const lower = v.toLowerCase().replace(/[\s_-]+/g, "");
  for (const rule of categoryAliases) {
    if (rule.any.some((k) => lower.includes(k))) return rule.category;
  }
  return "Other";
}

export function normalizeSeverity(raw: string | null | undefined): Severity {
  const v = (raw ?? "").trim().toLowerCase();
  const exact = SEVERITIES.find((s) => s.toLowerCase() === v);
  if (exact) return exact;
  if (v === "critical" || v === "severe") return "High";
  if (v === "minor") return "Low";
  return "Medium";
}

// Models wrap JSON in code fences or chatter; keep the outermost object.
export function extractJsonObject(text: string): string | null {
  const cleaned = text.replace(/```json/gi, "").replace(/```/g, "");
  const first = cleaned.indexOf("{");
  const last = cleaned.lastIndexOf("}");
  if (first === -1 || last <= first) return null;
  return cleaned.slice(first, last + 1);
}

export type TriageResult =
  | { ok: true; verdict: TriageVerdict }
  | { ok: false; error: "rejected"; reason: string }
  | { ok: false; error: "classification_failed"; detail: string };

export function interpretVerdict(text: string): TriageResult {
  const json = extractJsonObject(text);
  if (!json) return { ok: false, error: "classification_failed", detail: "no_json_object" };

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return { ok: false, error: "classification_failed", detail: "invalid_json" };
  }

  const p = RawVerdict.safeParse(parsed);
  if (!p.success) return { ok: false, error: "classification_failed", detail: "schema_mismatch" };

  const raw = p.data;
  if (!raw.is_valid) {
    const reason = (raw.rejection_reason ?? "").trim();
    return { ok: false, error: "rejected", reason: reason || "The photo does not show a public infrastructure issue." };
  }

  const description = (raw.description ?? "").trim();
  return {
    ok: true,
    verdict: Object.freeze({
      isValid: true,
      category: normalizeCategory(raw.category),
      severity: normalizeSeverity(raw.severity),
      description: description || "No description provided."
    })
  };
}

export class TriageGate {
  private readonly classifier: VisionClassifier;
  private readonly timeoutMs: number;
  private readonly log: pino.Logger;

  constructor(args: { classifier: VisionClassifier; timeoutMs?: number; logger?: pino.Logger }) {
    this.classifier = args.classifier;
    this.timeoutMs = args.timeoutMs ?? 30_000;
    this.log = args.logger ?? pino({ level: "silent" });
  }

  async classify(evidence: Buffer): Promise<TriageResult> {
    let text: string;
    try {
      text = await withTimeout(this.classifier.classify(evidence, TRIAGE_INSTRUCTIONS), this.timeoutMs);
    } catch (err) {
      this.log.error({ err }, "triage: classifier call failed");
      return { ok: false, error: "classification_failed", detail: err instanceof Error ? err.message : String(err) };
    }

    const out = interpretVerdict(text);
    if (!out.ok && out.error === "classification_failed") {
      this.log.warn({ detail: out.detail }, "triage: malformed classifier output");
    }
    return out;
  }
}

export function withTimeout<T>(p: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`timeout after ${ms}ms`)), ms);
    p.then(
      (v) => { clearTimeout(timer); resolve(v); },
      (e: unknown) => { clearTimeout(timer); reject(e); }
    );
  });
}
