import { nanoid } from "nanoid";
import pino from "pino";

/**
 * Fire-and-forget work (store writes, geocoding). The submitting handler never
 * awaits or observes the result; failures end up in the log. `drain()` waits
 * for everything in flight and is meant for shutdown and tests.
 */
export class BackgroundTasks {
  private pending = new Map<string, Promise<void>>();
  private readonly log: pino.Logger;

  constructor(args: { logger?: pino.Logger } = {}) {
    this.log = args.logger ?? pino({ level: "silent" });
  }

  submit(label: string, context: Record<string, unknown>, work: () => Promise<unknown>): string {
    const id = nanoid(10);
    const p = Promise.resolve()
      .then(work)
      .then(
        () => {
          this.log.debug({ task: label, taskId: id, ...context }, "background: done");
        },
        (err: unknown) => {
          this.log.error({ task: label, taskId: id, ...context, err }, "background: failed");
        }
      )
      .finally(() => {
        this.pending.delete(id);
      });
    this.pending.set(id, p);
    return id;
  }

  inFlight(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending.values()]);
    }
  }
}

/**
 * Runs jobs one at a time per key, in submission order. Different keys run
 * concurrently.
 */
export class SerialQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, job: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const result = prev.then(job);
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  activeKeys(): number {
    return this.tails.size;
  }
}
