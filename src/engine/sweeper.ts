import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { DEFAULT_SWEEP_INTERVAL_MS } from "../configs";
import { getLogger, type Logger } from "../utils/logger";
import type { Engine } from "./engine";

export interface SweeperOptions {
  intervalMs?: number;
  logger?: Logger;
}

export class ExpirySweeper {
  /**
   * Periodically evicts expired keys from every database
   * Reads never depend on it; it only bounds memory
   */
  private readonly engine: Engine;
  readonly intervalMs: number;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<number> | null = null;

  constructor(engine: Engine, options: SweeperOptions = {}) {
    this.engine = engine;
    this.intervalMs = options.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.log = options.logger ?? getLogger("sweeper");
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.schedule();
    this.log.debug({ intervalMs: this.intervalMs }, "expiry sweeper started");
  }

  /**
   * Cancels the next pass and waits for one in progress
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
  }

  /**
   * One pass over all databases, one store at a time.
   * Yields between stores so clients on other databases keep going.
   */
  async runOnce(now?: number): Promise<number> {
    let total = 0;
    for (const record of this.engine.list()) {
      if (record.database.closed) continue;

      const removed = record.database.sweep(now);
      if (removed > 0) {
        total += removed;
        this.log.info({ database: record.name, removed }, "evicted expired keys");
        await this.engine.flush(record.name);
      }
      await yieldToEventLoop();
    }
    return total;
  }

  private schedule(): void {
    const timer = setTimeout(() => {
      void this.tick(timer);
    }, this.intervalMs);
    timer.unref();
    this.timer = timer;
  }

  private async tick(fired: NodeJS.Timeout): Promise<void> {
    const pass = this.runOnce().catch((error: unknown) => {
      this.log.error({ err: error }, "expiry sweep failed");
      return 0;
    });
    this.running = pass;
    await pass;
    if (this.running === pass) this.running = null;
    // a stop() or a stop()/start() during the pass replaced the timer
    if (this.timer === fired) this.schedule();
  }
}
