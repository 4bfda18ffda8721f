/**
 * Rental expiry sweeper.
 *
 * Runs `sweepExpired` on a fixed cadence. The interval is unref'd so it never
 * keeps the process alive, and a tick that is still running makes the next one
 * a no-op.
 */
import type { Result } from "@/utils/result";
import { getLogger } from "@/utils/logger";
import type { WorldError } from "../errors";

const log = getLogger("sweeper");

export interface RentalSweepTarget {
  sweepExpiredRentals(): Promise<Result<string[], WorldError>>;
}

export class RentalSweeper {
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(
    private readonly target: RentalSweepTarget,
    private readonly intervalMs: number,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    this.timer.unref?.();
    log.info(`[RentalSweeper] started (every ${this.intervalMs}ms)`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** One sweep; returns the ids vacated, or an empty list when skipped or failed. */
  async tick(): Promise<string[]> {
    if (this.ticking) return [];
    this.ticking = true;

    try {
      const res = await this.target.sweepExpiredRentals();
      if (res.isErr()) {
        log.error("[RentalSweeper] sweep failed", res.error.message);
        return [];
      }
      const cleared = res.unwrap();
      if (cleared.length) log.info(`[RentalSweeper] vacated ${cleared.length} expired rental(s)`);
      return cleared;
    } catch (error) {
      log.error("[RentalSweeper] sweep threw", error);
      return [];
    } finally {
      this.ticking = false;
    }
  }
}
