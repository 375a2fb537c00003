import { Clock, Submitter } from "../types/contracts.js";

/**
 * Sliding-window admission per submitter. A rejected call records nothing,
 * so a submitter hammering the limit does not extend their own lockout.
 */
export class RateLimiter {
  private history = new Map<Submitter, number[]>();
  private readonly windowMs: number;
  private readonly max: number;
  private readonly now: Clock;

  constructor(args: { max: number; windowSeconds?: number; now?: Clock }) {
    this.max = args.max;
    this.windowMs = (args.windowSeconds ?? 3600) * 1000;
    this.now = args.now ?? Date.now;
  }

  allow(submitter: Submitter): boolean {
    const now = this.now();
    const recent = this.prune(this.history.get(submitter) ?? [], now);

    if (recent.length >= this.max) {
      this.history.set(submitter, recent);
      return false;
    }

    recent.push(now);
    this.history.set(submitter, recent);
    return true;
  }

  // Drops submitters with no admissions inside the window. Returns how many were removed.
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [submitter, stamps] of this.history) {
      const recent = this.prune(stamps, now);
      if (recent.length === 0) {
        this.history.delete(submitter);
        removed++;
      } else {
        this.history.set(submitter, recent);
      }
    }
    return removed;
  }

  size(): number {
    return this.history.size;
  }

  private prune(stamps: number[], now: number): number[] {
    const since = now - this.windowMs;
    return stamps.filter((t) => t > since);
  }
}
