import { sha256Hex } from "../lib/_util.js";

export function digestOf(content: Buffer): string {
  return sha256Hex(content);
}

/**
 * Content-addressed duplicate suppression. Checked before triage, marked only
 * after triage accepts, so a rejected photo can be sent again and re-triaged.
 * Bounded: past maxEntries the least recently seen digest is evicted.
 */
export class DuplicateDetector {
  // Map keeps insertion order; re-inserting moves a digest to the back.
  private seen = new Map<string, true>();
  private readonly maxEntries: number;

  constructor(args: { maxEntries?: number } = {}) {
    this.maxEntries = Math.max(1, args.maxEntries ?? 10_000);
  }

  isDuplicate(content: Buffer): boolean {
    const d = digestOf(content);
    if (!this.seen.has(d)) return false;
    this.seen.delete(d);
    this.seen.set(d, true);
    return true;
  }

  markSeen(content: Buffer): void {
    const d = digestOf(content);
    this.seen.delete(d);
    this.seen.set(d, true);

    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
  }

  size(): number {
    return this.seen.size;
  }
}
