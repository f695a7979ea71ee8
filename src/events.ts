import { EventEmitter } from "node:events";

export interface DepositEvent {
  user: string;
  assetA: string;
  assetB: string;
  amountA: bigint;
  amountB: bigint;
  liquidity: bigint;
}

export interface WithdrawalEvent {
  user: string;
  assetA: string;
  assetB: string;
  amountA: bigint;
  amountB: bigint;
  liquidity: bigint;
}

export interface SwapEvent {
  user: string;
  tokenIn: string;
  tokenOut: string;
  amountIn: bigint;
  amountOut: bigint;
  to: string;
}

/** Reserves after any update, in pool asset order */
export interface SyncEvent {
  reserveA: bigint;
  reserveB: bigint;
}

export interface PoolEvents {
  Deposit: DepositEvent;
  Withdrawal: WithdrawalEvent;
  Swap: SwapEvent;
  Sync: SyncEvent;
}

export type PoolEventName = keyof PoolEvents;

/**
 * EventEmitter restricted to the pool's event names and payloads
 */
export class PoolEventEmitter {
  private readonly emitter = new EventEmitter();

  on<K extends PoolEventName>(event: K, listener: (payload: PoolEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends PoolEventName>(event: K, listener: (payload: PoolEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends PoolEventName>(event: K, listener: (payload: PoolEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  emit<K extends PoolEventName>(event: K, payload: PoolEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  removeAllListeners(event?: PoolEventName): this {
    this.emitter.removeAllListeners(event);
    return this;
  }
}
