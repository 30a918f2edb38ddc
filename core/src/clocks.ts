import { DEFAULT_BLOCK_INTERVAL_MS } from './constants.js'
import type { HeightClock } from './types.js'

/**
 * Height that only moves when told to. Used when an external chain drives
 * the ledger, and in tests.
 */
export class ManualHeightClock implements HeightClock {
  constructor(private height: number = 0) {
    this.check(height)
  }

  currentHeight(): number {
    return this.height
  }

  set(height: number): void {
    this.check(height)
    this.height = height
  }

  advance(blocks: number = 1): number {
    this.set(this.height + blocks)
    return this.height
  }

  private check(height: number): void {
    if (!Number.isSafeInteger(height) || height < 0) {
      throw new Error(`Height must be a non-negative integer, got ${height}`)
    }
  }
}

/**
 * Height derived from wall-clock time: one block per interval since genesis.
 */
export class IntervalHeightClock implements HeightClock {
  constructor(
    private readonly genesisTime: number,
    private readonly blockIntervalMs: number = DEFAULT_BLOCK_INTERVAL_MS,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isFinite(genesisTime)) {
      throw new Error(`Invalid genesis time: ${genesisTime}`)
    }
    if (!Number.isFinite(blockIntervalMs) || blockIntervalMs <= 0) {
      throw new Error(`Block interval must be positive, got ${blockIntervalMs}`)
    }
  }

  currentHeight(): number {
    return Math.max(0, Math.floor((this.now() - this.genesisTime) / this.blockIntervalMs))
  }
}
