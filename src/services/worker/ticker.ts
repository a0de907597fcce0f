import { CronJob } from "cron";

export type TickHandler = () => void;

/** Drives a recurring job. `start` may be called once; `stop` is idempotent. */
export interface Ticker {
  start(onTick: TickHandler): void;
  stop(): void;
}

/** Longest delay setInterval honours; anything above silently becomes 1 ms. */
export const MAX_INTERVAL_MS = 2_147_483_647;

export class IntervalTicker implements Ticker {
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly intervalMs: number) {
    if (!(intervalMs > 0) || intervalMs > MAX_INTERVAL_MS) {
      throw new RangeError(`Invalid ticker interval: ${intervalMs}`);
    }
  }

  start(onTick: TickHandler): void {
    if (this.timer) return;
    this.timer = setInterval(onTick, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

export class CronTicker implements Ticker {
  private job: CronJob | null = null;

  constructor(
    private readonly expression: string,
    private readonly timeZone = "UTC"
  ) {}

  start(onTick: TickHandler): void {
    if (this.job) return;
    this.job = new CronJob(this.expression, onTick, null, true, this.timeZone);
  }

  stop(): void {
    if (this.job) {
      this.job.stop();
      this.job = null;
    }
  }

  nextRun(): Date | null {
    return this.job ? this.job.nextDate().toJSDate() : null;
  }
}

/** Fires only when told to. */
export class ManualTicker implements Ticker {
  private handler: TickHandler | null = null;

  start(onTick: TickHandler): void {
    this.handler = onTick;
  }

  stop(): void {
    this.handler = null;
  }

  get started(): boolean {
    return this.handler !== null;
  }

  tick(): void {
    this.handler?.();
  }
}
