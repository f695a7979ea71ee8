/**
 * Timestamp source for deadline checks, in unix seconds
 */
export interface Clock {
  now(): bigint;
}

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/**
 * Clock pinned to a settable timestamp, for hosts that supply block time
 */
export class FixedClock implements Clock {
  constructor(private timestamp: bigint) {}

  now(): bigint {
    return this.timestamp;
  }

  set(timestamp: bigint): void {
    this.timestamp = timestamp;
  }

  advance(seconds: bigint): void {
    this.timestamp += seconds;
  }
}
