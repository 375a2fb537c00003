import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";

export function nowUtc(): string {
  return new Date().toISOString();
}

export function sha256Hex(input: string | Buffer): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

// undefined when the text is not JSON
function parseJson(s: string): unknown {
  try { return JSON.parse(s); } catch { return undefined; }
}

export function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

/**
 * Reads a JSONL file through `accept`, which returns null for rows it does
 * not recognise. Torn or foreign lines are counted, not fatal.
 */
export function readJsonl<T>(filePath: string, accept: (row: unknown) => T | null): { rows: T[]; skipped: number } {
  if (!fs.existsSync(filePath)) return { rows: [], skipped: 0 };
  const lines = fs.readFileSync(filePath, "utf8").split("\n").map(x => x.trim()).filter(Boolean);
  const rows: T[] = [];
  let skipped = 0;
  for (const line of lines) {
    const v = accept(parseJson(line));
    if (v === null) skipped++;
    else rows.push(v);
  }
  return { rows, skipped };
}

export function appendJsonl(filePath: string, obj: unknown) {
  ensureDir(path.dirname(filePath));
  fs.appendFileSync(filePath, JSON.stringify(obj) + "\n");
}

// null when the file does not exist; throws when it is not JSON.
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  const v = parseJson(fs.readFileSync(filePath, "utf8"));
  if (v === undefined) throw new Error(`not valid JSON: ${filePath}`);
  return v;
}
