import type { Clock } from '../../governance/ports.js';

/** Seconds per block used by mine() when no spacing is given. */
export const DEFAULT_BLOCK_TIME_SECONDS = 12n;

/**
 * Clock advanced by hand. Block height and time only move forward.
 */
export class ManualClock implements Clock {
  constructor(
    private block = 1n,
    private time = 1_700_000_000n,
  ) {}

  async blockNumber(): Promise<bigint> {
    return this.block;
  }

  async timestamp(): Promise<bigint> {
    return this.time;
  }

  get currentBlock(): bigint {
    return this.block;
  }

  get currentTime(): bigint {
    return this.time;
  }

  /** Advance `blocks` blocks, moving time forward `secondsPerBlock` each. */
  mine(blocks = 1n, secondsPerBlock = DEFAULT_BLOCK_TIME_SECONDS): void {
    if (blocks < 0n) throw new RangeError('cannot mine a negative number of blocks');
    this.block += blocks;
    this.time += blocks * secondsPerBlock;
  }

  /** Advance time without producing blocks. */
  increaseTime(seconds: bigint): void {
    if (seconds < 0n) throw new RangeError('time only moves forward');
    this.time += seconds;
  }
}
