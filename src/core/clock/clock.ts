/**
 * Lending Ledger - Block Clock
 *
 * The ledger measures time in block heights. Heights never go backwards;
 * every operation reads the clock once and uses that value throughout.
 */

export interface Clock {
  /** Current block height */
  now(): number;
}

/**
 * Derives a block height from wall time: one block per `intervalMs`
 * since `genesis`. Clamped so a system clock step backwards cannot
 * produce a lower height than one already handed out.
 */
export class BlockClock implements Clock {
  private lastHeight = 0;

  constructor(
    private readonly genesis: Date,
    private readonly intervalMs: number,
    private readonly currentTimeMs: () => number = Date.now
  ) {
    if (!Number.isInteger(intervalMs) || intervalMs <= 0) {
      throw new Error(`Block interval must be a positive integer, got ${intervalMs}`);
    }
  }

  now(): number {
    const elapsed = this.currentTimeMs() - this.genesis.getTime();
    const height = Math.max(0, Math.floor(elapsed / this.intervalMs));
    this.lastHeight = Math.max(this.lastHeight, height);
    return this.lastHeight;
  }
}

/**
 * Height set by hand. Used by tests and by tooling that replays history.
 */
export class ManualClock implements Clock {
  constructor(private height: number = 0) {}

  now(): number {
    return this.height;
  }

  set(height: number): void {
    if (height < this.height) {
      throw new Error(`Clock cannot move backwards: ${height} < ${this.height}`);
    }
    this.height = height;
  }

  advance(blocks: number): void {
    this.set(this.height + blocks);
  }
}
