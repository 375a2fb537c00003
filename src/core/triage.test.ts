import { describe, it } from "node:test";
import assert from "node:assert";
import {
  TRIAGE_INSTRUCTIONS,
  TriageGate,
  extractJsonObject,
  interpretVerdict,
  normalizeCategory,
  normalizeSeverity,
  withTimeout
} from "./triage.js";
import { VisionClassifier } from "../types/contracts.js";

function classifierReturning(text: string): VisionClassifier & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async classify(_image, instructions) {
      calls.push(instructions);
      return text;
    }
  };
}

describe("normalizeCategory", () => {
  it("keeps canonical names regardless of case", () => {
    assert.strictEqual(normalizeCategory("roadinfra"), "RoadInfra");
    assert.strictEqual(normalizeCategory(" Fire "), "Fire");
  });

  it("maps common labels onto categories", () => {
    assert.strictEqual(normalizeCategory("Pothole"), "RoadInfra");
    assert.strictEqual(normalizeCategory("Garbage dump"), "Sanitation");
    assert.strictEqual(normalizeCategory("Water logging"), "Drainage");
    assert.strictEqual(normalizeCategory("pipe leak"), "WaterSupply");
    assert.strictEqual(normalizeCategory("Street light"), "Lighting");
  });

  it("falls back to Other", () => {
    assert.strictEqual(normalizeCategory("graffiti"), "Other");
    assert.strictEqual(normalizeCategory(null), "Other");
  });
});

describe("normalizeSeverity", () => {
  it("maps synonyms and defaults to Medium", () => {
    assert.strictEqual(normalizeSeverity("high"), "High");
    assert.strictEqual(normalizeSeverity("Critical"), "High");
    assert.strictEqual(normalizeSeverity("minor"), "Low");
    assert.strictEqual(normalizeSeverity("whatever"), "Medium");
    assert.strictEqual(normalizeSeverity(undefined), "Medium");
  });
});

describe("extractJsonObject", () => {
  it("strips code fences and surrounding chatter", () => {
    const text = "Sure! ```json\n{\"is_valid\": false}\n``` hope that helps";
    assert.strictEqual(extractJsonObject(text), "{\"is_valid\": false}");
  });

  it("returns null without an object", () => {
    assert.strictEqual(extractJsonObject("no json here"), null);
  });
});

describe("interpretVerdict", () => {
  it("accepts a valid verdict and normalizes it", () => {
    const out = interpretVerdict(JSON.stringify({
      is_valid: true,
      rejection_reason: null,
      category: "pothole",
      severity: "severe",
      description: "  Deep pothole in the left lane.  "
    }));
    assert.deepStrictEqual(out, {
      ok: true,
      verdict: { isValid: true, category: "RoadInfra", severity: "High", description: "Deep pothole in the left lane." }
    });
    if (out.ok) assert.ok(Object.isFrozen(out.verdict));
  });

  it("fills a missing description", () => {
    const out = interpretVerdict("{\"is_valid\": true, \"category\": \"Fire\", \"severity\": \"Low\"}");
    assert.ok(out.ok);
    if (out.ok) assert.strictEqual(out.verdict.description, "No description provided.");
  });

  it("returns the model's rejection reason", () => {
    const out = interpretVerdict("{\"is_valid\": false, \"rejection_reason\": \"This is a photo of a screen.\"}");
    assert.deepStrictEqual(out, { ok: false, error: "rejected", reason: "This is a photo of a screen." });
  });

  it("uses a default reason when the model gives none", () => {
    const out = interpretVerdict("{\"is_valid\": false, \"rejection_reason\": \"  \"}");
    assert.deepStrictEqual(out, {
      ok: false,
      error: "rejected",
      reason: "The photo does not show a public infrastructure issue."
    });
  });

  it("classifies malformed output as a failure, not a rejection", () => {
    assert.deepStrictEqual(interpretVerdict("I cannot help"), { ok: false, error: "classification_failed", detail: "no_json_object" });
    assert.deepStrictEqual(interpretVerdict("{is_valid: yes}"), { ok: false, error: "classification_failed", detail: "invalid_json" });
    assert.deepStrictEqual(interpretVerdict("{\"valid\": true}"), { ok: false, error: "classification_failed", detail: "schema_mismatch" });
  });
});

describe("TriageGate", () => {
  it("sends the triage instructions with the photo", async () => {
    const classifier = classifierReturning("{\"is_valid\": true, \"category\": \"Drainage\", \"severity\": \"Medium\", \"description\": \"Blocked drain.\"}");
    const gate = new TriageGate({ classifier });
    const out = await gate.classify(Buffer.from("img"));
    assert.strictEqual(out.ok, true);
    assert.deepStrictEqual(classifier.calls, [TRIAGE_INSTRUCTIONS]);
  });

  it("turns a classifier error into classification_failed", async () => {
    const gate = new TriageGate({
      classifier: { classify: async () => { throw new Error("quota exceeded"); } }
    });
    assert.deepStrictEqual(await gate.classify(Buffer.from("img")), {
      ok: false,
      error: "classification_failed",
      detail: "quota exceeded"
    });
  });

  it("gives up after the timeout", async () => {
    const gate = new TriageGate({
      timeoutMs: 10,
      classifier: { classify: () => new Promise<string>((resolve) => setTimeout(() => resolve("{}"), 200)) }
    });
    assert.deepStrictEqual(await gate.classify(Buffer.from("img")), {
      ok: false,
      error: "classification_failed",
      detail: "timeout after 10ms"
    });
  });
});

describe("withTimeout", () => {
  it("passes the value through when in time", async () => {
    assert.strictEqual(await withTimeout(Promise.resolve(3), 50), 3);
  });
});
