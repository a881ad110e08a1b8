import type { MarketplaceClient } from "./marketplace";
import type { MarketplaceEvent } from "./validators";

export type EventHandler = (event: MarketplaceEvent) => Promise<void>;

/**
 * Single consumer for marketplace events. Events are handled strictly one
 * after another, whichever source pushed them; a failing handler is logged
 * and the queue moves on.
 */
export class EventQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private readonly handler: EventHandler) {}

  push(event: MarketplaceEvent): void {
    this.pending += 1;
    this.tail = this.tail.then(() => this.process(event));
  }

  size(): number {
    return this.pending;
  }

  drain(): Promise<void> {
    return this.tail;
  }

  private async process(event: MarketplaceEvent): Promise<void> {
    try {
      await this.handler(event);
    } catch (error) {
      console.error("EVENT_HANDLER_ERR", {
        type: event.type,
        event: JSON.stringify(event).slice(0, 300),
        message: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    } finally {
      this.pending -= 1;
    }
  }
}

interface PollerOptions {
  delayMs: number;
}

/** Pulls the marketplace event feed every `delayMs` and feeds the queue. */
export class MarketplacePoller {
  private cursor: string | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly marketplace: MarketplaceClient,
    private readonly queue: EventQueue,
    private readonly options: PollerOptions,
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  async pollOnce(): Promise<number> {
    try {
      const batch = await this.marketplace.fetchEvents(this.cursor);
      this.cursor = batch.cursor;
      for (const event of batch.events) {
        this.queue.push(event);
      }
      return batch.events.length;
    } catch (error) {
      console.error("MARKETPLACE_POLL_ERR", {
        cursor: this.cursor,
        message: error instanceof Error ? error.message : String(error),
      });
      return 0;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    await this.pollOnce();
    // no new poll while the previous batch is still being handled
    await this.queue.drain();
    if (this.running) {
      this.schedule(this.options.delayMs);
    }
  }
}
