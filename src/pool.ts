/**
 * Constant Product Pool
 *
 * State machine for a single token-pair pool: deposits mint claim tokens,
 * withdrawals burn them, swaps trade one asset for the other along
 * x * y = k with an input-side fee that stays in the pool.
 *
 * Operations are synchronous and run one at a time. Each one checks every
 * precondition first, then moves assets through the ledger and rewrites the
 * reserves from the pool's ledger balances. If any step after the first
 * transfer fails, the ledger checkpoint and the previous reserves are
 * restored, so a rejected call leaves no trace.
 *
 * Events are queued while an operation runs and delivered once it has
 * committed and released the pool, so listeners only ever observe committed
 * state and may start operations of their own.
 */

import { systemClock, type Clock } from "./clock";
import { resolvePoolConfig, type Env, type PoolConfig } from "./config";
import { LOCKED_LIQUIDITY_HOLDER } from "./constants";
import { isPoolError, PoolError } from "./errors";
import { PoolEventEmitter, type PoolEventName, type PoolEvents } from "./events";
import type { FungibleLedger } from "./ledger";
import { Logger } from "./logger";
import {
  assertUint,
  calcDepositAmounts,
  calcLiquidityMinted,
  calcRemoveLiquidity,
  checkedMul,
  getAmountIn,
  getAmountOut,
  spotPrice,
} from "./math";

// ============================================
// Parameter & Result Types
// ============================================

export interface PoolOptions {
  assetA: string;
  assetB: string;
  ledger: FungibleLedger;
  /** Asset id of the claim token (default `lp:<assetA>:<assetB>`) */
  claimAsset?: string;
  /** Holder id of the pool in the ledger (default `pool:<assetA>:<assetB>`) */
  address?: string;
  clock?: Clock;
  config?: Partial<PoolConfig>;
  /** Environment consulted for config defaults (default `process.env`) */
  env?: Env;
  logger?: Logger;
}

export interface AddLiquidityParams {
  caller: string;
  assetA: string;
  assetB: string;
  amountADesired: bigint;
  amountBDesired: bigint;
  amountAMin: bigint;
  amountBMin: bigint;
  to: string;
  deadline: bigint;
}

export interface RemoveLiquidityParams {
  caller: string;
  assetA: string;
  assetB: string;
  liquidity: bigint;
  amountAMin: bigint;
  amountBMin: bigint;
  to: string;
  deadline: bigint;
}

export interface SwapParams {
  caller: string;
  amountIn: bigint;
  amountOutMin: bigint;
  path: readonly string[];
  to: string;
  deadline: bigint;
}

/** Amounts are in the caller's asset order, not the pool's */
export interface LiquidityResult {
  amountA: bigint;
  amountB: bigint;
  liquidity: bigint;
}

export interface SwapResult {
  amountIn: bigint;
  amountOut: bigint;
}

export interface Reserves {
  reserveA: bigint;
  reserveB: bigint;
  blockTimestampLast: bigint;
}

interface DepositPlan {
  /** Pool order */
  amountA: bigint;
  amountB: bigint;
  liquidity: bigint;
  locked: bigint;
  reversed: boolean;
}

interface WithdrawalPlan {
  /** Pool order */
  amountA: bigint;
  amountB: bigint;
  reversed: boolean;
}

interface SwapPlan {
  tokenIn: string;
  tokenOut: string;
  amountOut: bigint;
}

// ============================================
// Pool
// ============================================

export class ConstantProductPool {
  readonly assetA: string;
  readonly assetB: string;
  readonly claimAsset: string;
  readonly address: string;
  readonly config: Readonly<PoolConfig>;
  readonly events = new PoolEventEmitter();

  private readonly ledger: FungibleLedger;
  private readonly clock: Clock;
  private readonly log: Logger;

  private reserveA = 0n;
  private reserveB = 0n;
  private blockTimestampLast = 0n;
  private locked = false;
  private pending: Array<() => void> = [];

  constructor(options: PoolOptions) {
    if (options.assetA === options.assetB) {
      throw new PoolError("InvalidPair", `pool assets must differ (got ${options.assetA} twice)`);
    }

    this.assetA = options.assetA;
    this.assetB = options.assetB;
    this.claimAsset = options.claimAsset ?? `lp:${options.assetA}:${options.assetB}`;
    this.address = options.address ?? `pool:${options.assetA}:${options.assetB}`;
    if (this.claimAsset === this.assetA || this.claimAsset === this.assetB) {
      throw new PoolError("InvalidPair", `claim asset ${this.claimAsset} collides with a pool asset`);
    }

    this.config = resolvePoolConfig(options.config, options.env);
    this.ledger = options.ledger;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? new Logger("amm", this.config.logLevel)).child(
      `${this.assetA}/${this.assetB}`
    );
  }

  // ============================================
  // Views
  // ============================================

  getReserves(): Reserves {
    return {
      reserveA: this.reserveA,
      reserveB: this.reserveB,
      blockTimestampLast: this.blockTimestampLast,
    };
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply(this.claimAsset);
  }

  /** Claim-token balance of `holder` */
  balanceOf(holder: string): bigint {
    return this.ledger.balanceOf(this.claimAsset, holder);
  }

  /**
   * Price of one unit of `base` in units of `quoteAsset`, scaled by 1e18
   */
  getPrice(base: string, quoteAsset: string): bigint {
    const reversed = this.orient(base, quoteAsset, "getPrice");
    const [reserveBase, reserveQuote] = reversed
      ? [this.reserveB, this.reserveA]
      : [this.reserveA, this.reserveB];
    return spotPrice(reserveBase, reserveQuote);
  }

  /**
   * Output the pool would pay for `amountIn` of `tokenIn` at current reserves
   */
  getAmountOut(amountIn: bigint, tokenIn: string, tokenOut: string): bigint {
    const [reserveIn, reserveOut] = this.reservesFor(tokenIn, tokenOut, "getAmountOut");
    return getAmountOut(amountIn, reserveIn, reserveOut, this.config.feeBps);
  }

  /**
   * Input of `tokenIn` needed to receive exactly `amountOut` of `tokenOut`
   */
  getAmountIn(amountOut: bigint, tokenIn: string, tokenOut: string): bigint {
    const [reserveIn, reserveOut] = this.reservesFor(tokenIn, tokenOut, "getAmountIn");
    return getAmountIn(amountOut, reserveIn, reserveOut, this.config.feeBps);
  }

  /**
   * Preview a deposit without touching balances (deadline and allowances are not checked)
   */
  quoteAddLiquidity(params: Omit<AddLiquidityParams, "caller" | "to" | "deadline">): LiquidityResult {
    const plan = this.planDeposit(params, "quoteAddLiquidity");
    return this.toCallerOrder(plan.amountA, plan.amountB, plan.liquidity, plan.reversed);
  }

  /**
   * Preview a withdrawal of `liquidity` claim tokens
   */
  quoteRemoveLiquidity(
    params: Omit<RemoveLiquidityParams, "caller" | "to" | "deadline">
  ): LiquidityResult {
    const plan = this.planWithdrawal(params, "quoteRemoveLiquidity");
    return this.toCallerOrder(plan.amountA, plan.amountB, params.liquidity, plan.reversed);
  }

  // ============================================
  // Deposit
  // ============================================

  addLiquidity(params: AddLiquidityParams): LiquidityResult {
    const op = "addLiquidity";
    return this.run(op, () => {
      this.checkDeadline(params.deadline, op);
      const plan = this.planDeposit(params, op);
      this.requireSpendable(this.assetA, params.caller, plan.amountA, op);
      this.requireSpendable(this.assetB, params.caller, plan.amountB, op);

      const result = this.toCallerOrder(plan.amountA, plan.amountB, plan.liquidity, plan.reversed);

      this.atomically(op, () => {
        this.pull(this.assetA, params.caller, plan.amountA, op);
        this.pull(this.assetB, params.caller, plan.amountB, op);
        if (plan.locked > 0n) {
          this.ledger.mint(this.claimAsset, LOCKED_LIQUIDITY_HOLDER, plan.locked);
        }
        this.ledger.mint(this.claimAsset, params.to, plan.liquidity);
        this.update();
        this.queue("Deposit", {
          user: params.caller,
          assetA: params.assetA,
          assetB: params.assetB,
          amountA: result.amountA,
          amountB: result.amountB,
          liquidity: plan.liquidity,
        });
      });

      this.log.info(
        `${op}: ${params.caller} deposited ${result.amountA} ${params.assetA} + ${result.amountB} ${params.assetB}, minted ${plan.liquidity} to ${params.to}`
      );
      return result;
    });
  }

  private planDeposit(
    params: Omit<AddLiquidityParams, "caller" | "to" | "deadline">,
    op: string
  ): DepositPlan {
    const reversed = this.orient(params.assetA, params.assetB, op);

    for (const [name, value] of [
      ["amountADesired", params.amountADesired],
      ["amountBDesired", params.amountBDesired],
      ["amountAMin", params.amountAMin],
      ["amountBMin", params.amountBMin],
    ] as const) {
      assertUint(value, `${op}: ${name}`);
    }
    if (params.amountADesired === 0n || params.amountBDesired === 0n) {
      throw new PoolError("InvalidAmount", `${op}: desired amounts must be positive`);
    }
    if (params.amountAMin > params.amountADesired || params.amountBMin > params.amountBDesired) {
      throw new PoolError("InvalidAmount", `${op}: minimum exceeds desired amount`);
    }

    const [desiredA, desiredB, minA, minB] = reversed
      ? [params.amountBDesired, params.amountADesired, params.amountBMin, params.amountAMin]
      : [params.amountADesired, params.amountBDesired, params.amountAMin, params.amountBMin];

    // Without outstanding claims the depositor sets the price, whatever
    // balance was donated and synced beforehand
    const totalSupply = this.totalSupply();
    const { amountA, amountB } =
      totalSupply === 0n
        ? { amountA: desiredA, amountB: desiredB }
        : calcDepositAmounts(desiredA, desiredB, minA, minB, this.reserveA, this.reserveB);

    const locked = totalSupply === 0n ? this.config.minimumLiquidity : 0n;
    const liquidity = calcLiquidityMinted(
      amountA,
      amountB,
      this.reserveA,
      this.reserveB,
      totalSupply,
      locked
    );
    if (liquidity <= 0n) {
      throw new PoolError("InsufficientLiquidityMinted", `${op}: deposit mints no claim tokens`);
    }

    return { amountA, amountB, liquidity, locked, reversed };
  }

  // ============================================
  // Withdrawal
  // ============================================

  removeLiquidity(params: RemoveLiquidityParams): LiquidityResult {
    const op = "removeLiquidity";
    return this.run(op, () => {
      this.checkDeadline(params.deadline, op);
      const plan = this.planWithdrawal(params, op, params.caller);

      const result = this.toCallerOrder(plan.amountA, plan.amountB, params.liquidity, plan.reversed);

      this.atomically(op, () => {
        this.ledger.burn(this.claimAsset, params.caller, params.liquidity);
        this.push(this.assetA, params.to, plan.amountA, op);
        this.push(this.assetB, params.to, plan.amountB, op);
        this.update();
        this.queue("Withdrawal", {
          user: params.caller,
          assetA: params.assetA,
          assetB: params.assetB,
          amountA: result.amountA,
          amountB: result.amountB,
          liquidity: params.liquidity,
        });
      });

      this.log.info(
        `${op}: ${params.caller} burned ${params.liquidity}, received ${result.amountA} ${params.assetA} + ${result.amountB} ${params.assetB}`
      );
      return result;
    });
  }

  private planWithdrawal(
    params: Omit<RemoveLiquidityParams, "caller" | "to" | "deadline">,
    op: string,
    holder?: string
  ): WithdrawalPlan {
    const reversed = this.orient(params.assetA, params.assetB, op);
    assertUint(params.liquidity, `${op}: liquidity`);
    assertUint(params.amountAMin, `${op}: amountAMin`);
    assertUint(params.amountBMin, `${op}: amountBMin`);
    if (params.liquidity === 0n) {
      throw new PoolError("InvalidAmount", `${op}: liquidity must be positive`);
    }
    if (holder !== undefined) {
      const held = this.balanceOf(holder);
      if (params.liquidity > held) {
        throw new PoolError(
          "InsufficientBalance",
          `${op}: ${holder} holds ${held} claim tokens, cannot burn ${params.liquidity}`
        );
      }
    }

    // Balances and supply are read together, before anything moves
    const balanceA = this.ledger.balanceOf(this.assetA, this.address);
    const balanceB = this.ledger.balanceOf(this.assetB, this.address);
    const totalSupply = this.totalSupply();
    if (params.liquidity > totalSupply) {
      throw new PoolError(
        "InsufficientBalance",
        `${op}: liquidity ${params.liquidity} exceeds total supply ${totalSupply}`
      );
    }

    const { amountA, amountB } = calcRemoveLiquidity(params.liquidity, balanceA, balanceB, totalSupply);
    if (amountA === 0n || amountB === 0n) {
      throw new PoolError("InsufficientLiquidity", `${op}: burn releases nothing`);
    }

    const [minA, minB] = reversed
      ? [params.amountBMin, params.amountAMin]
      : [params.amountAMin, params.amountBMin];
    if (amountA < minA || amountB < minB) {
      throw new PoolError(
        "SlippageExceeded",
        `${op}: received (${amountA}, ${amountB}) below minimum (${minA}, ${minB})`
      );
    }

    return { amountA, amountB, reversed };
  }

  // ============================================
  // Swap
  // ============================================

  swapExactTokensForTokens(params: SwapParams): SwapResult {
    const op = "swapExactTokensForTokens";
    return this.run(op, () => {
      this.checkDeadline(params.deadline, op);
      const plan = this.planSwap(params, op);
      this.requireSpendable(plan.tokenIn, params.caller, params.amountIn, op);

      const kLast = checkedMul(this.reserveA, this.reserveB);

      this.atomically(op, () => {
        this.pull(plan.tokenIn, params.caller, params.amountIn, op);
        this.push(plan.tokenOut, params.to, plan.amountOut, op);
        this.update();
        if (checkedMul(this.reserveA, this.reserveB) < kLast) {
          throw new PoolError("InsufficientLiquidity", `${op}: K`);
        }
        this.queue("Swap", {
          user: params.caller,
          tokenIn: plan.tokenIn,
          tokenOut: plan.tokenOut,
          amountIn: params.amountIn,
          amountOut: plan.amountOut,
          to: params.to,
        });
      });

      this.log.info(
        `${op}: ${params.caller} swapped ${params.amountIn} ${plan.tokenIn} for ${plan.amountOut} ${plan.tokenOut}`
      );
      return { amountIn: params.amountIn, amountOut: plan.amountOut };
    });
  }

  private planSwap(params: SwapParams, op: string): SwapPlan {
    if (params.path.length !== 2) {
      throw new PoolError("InvalidPair", `${op}: path must have exactly 2 assets (got ${params.path.length})`);
    }
    const [tokenIn, tokenOut] = params.path;
    this.orient(tokenIn, tokenOut, op);

    assertUint(params.amountIn, `${op}: amountIn`);
    assertUint(params.amountOutMin, `${op}: amountOutMin`);
    if (params.amountIn === 0n) {
      throw new PoolError("InvalidAmount", `${op}: amountIn must be positive`);
    }

    const [reserveIn, reserveOut] = this.reservesFor(tokenIn, tokenOut, op);

    const amountOut = getAmountOut(params.amountIn, reserveIn, reserveOut, this.config.feeBps);
    if (amountOut === 0n || amountOut >= reserveOut) {
      throw new PoolError("InsufficientLiquidity", `${op}: output rounds to ${amountOut}`);
    }
    if (amountOut < params.amountOutMin) {
      throw new PoolError(
        "SlippageExceeded",
        `${op}: amountOut ${amountOut} is below minimum ${params.amountOutMin}`
      );
    }

    return { tokenIn, tokenOut, amountOut };
  }

  // ============================================
  // Reconciliation
  // ============================================

  /**
   * Force reserves to match the pool's ledger balances
   */
  sync(): Reserves {
    return this.run("sync", () => {
      this.atomically("sync", () => this.update());
      return this.getReserves();
    });
  }

  /**
   * Send any ledger balance above the recorded reserves to `to`
   */
  skim(to: string): { amountA: bigint; amountB: bigint } {
    const op = "skim";
    return this.run(op, () => {
      const amountA = this.ledger.balanceOf(this.assetA, this.address) - this.reserveA;
      const amountB = this.ledger.balanceOf(this.assetB, this.address) - this.reserveB;
      const excess = { amountA: amountA > 0n ? amountA : 0n, amountB: amountB > 0n ? amountB : 0n };

      this.atomically(op, () => {
        if (excess.amountA > 0n) this.push(this.assetA, to, excess.amountA, op);
        if (excess.amountB > 0n) this.push(this.assetB, to, excess.amountB, op);
      });
      return excess;
    });
  }

  // ============================================
  // Internals
  // ============================================

  /**
   * Single-entry guard around a public operation; rejections are logged and
   * rethrown, and queued events are delivered only after a clean return
   */
  private run<T>(op: string, fn: () => T): T {
    if (this.locked) {
      throw new PoolError("Locked", `${op}: pool is locked by an operation in progress`);
    }
    this.locked = true;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.pending = [];
      this.log.debug(`${op} rejected: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    } finally {
      this.locked = false;
    }
    this.flushEvents();
    return result;
  }

  private queue<K extends PoolEventName>(event: K, payload: PoolEvents[K]): void {
    this.pending.push(() => this.events.emit(event, payload));
  }

  /**
   * A listener that throws stops delivery of the rest of the batch; its error
   * reaches the caller, but the operation stays committed
   */
  private flushEvents(): void {
    const batch = this.pending;
    this.pending = [];
    for (const deliver of batch) deliver();
  }

  /**
   * Run the mutating part of an operation; on any failure the ledger and the
   * reserves are rolled back and non-pool errors surface as TransferFailed
   */
  private atomically(op: string, fn: () => void): void {
    const checkpoint = this.ledger.checkpoint();
    const saved = this.getReserves();
    try {
      fn();
    } catch (err) {
      checkpoint.restore();
      this.reserveA = saved.reserveA;
      this.reserveB = saved.reserveB;
      this.blockTimestampLast = saved.blockTimestampLast;
      if (isPoolError(err)) throw err;
      throw new PoolError(
        "TransferFailed",
        `${op}: ledger call failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
    checkpoint.release();
  }

  private update(): void {
    this.reserveA = this.ledger.balanceOf(this.assetA, this.address);
    this.reserveB = this.ledger.balanceOf(this.assetB, this.address);
    this.blockTimestampLast = this.clock.now();
    this.queue("Sync", { reserveA: this.reserveA, reserveB: this.reserveB });
  }

  private pull(asset: string, from: string, amount: bigint, op: string): void {
    if (!this.ledger.transferFrom(asset, this.address, from, this.address, amount)) {
      throw new PoolError("TransferFailed", `${op}: transferFrom of ${amount} ${asset} from ${from} failed`);
    }
  }

  private push(asset: string, to: string, amount: bigint, op: string): void {
    if (!this.ledger.transfer(asset, this.address, to, amount)) {
      throw new PoolError("TransferFailed", `${op}: transfer of ${amount} ${asset} to ${to} failed`);
    }
  }

  private requireSpendable(asset: string, owner: string, amount: bigint, op: string): void {
    const balance = this.ledger.balanceOf(asset, owner);
    if (balance < amount) {
      throw new PoolError(
        "InsufficientBalance",
        `${op}: ${owner} holds ${balance} ${asset}, needs ${amount}`
      );
    }
    const allowance = this.ledger.allowance(asset, owner, this.address);
    if (allowance < amount) {
      throw new PoolError(
        "InsufficientBalance",
        `${op}: ${owner} approved ${allowance} ${asset} to the pool, needs ${amount}`
      );
    }
  }

  private checkDeadline(deadline: bigint, op: string): void {
    const now = this.clock.now();
    if (now > deadline) {
      throw new PoolError("Expired", `${op}: deadline ${deadline} passed (now ${now})`);
    }
  }

  /**
   * @returns true when (x, y) is (assetB, assetA)
   * @throws PoolError(InvalidPair) unless (x, y) is the pool's pair in some order
   */
  private orient(x: string, y: string, op: string): boolean {
    if (x === this.assetA && y === this.assetB) return false;
    if (x === this.assetB && y === this.assetA) return true;
    throw new PoolError(
      "InvalidPair",
      `${op}: (${x}, ${y}) is not the pool pair (${this.assetA}, ${this.assetB})`
    );
  }

  private reservesFor(tokenIn: string, tokenOut: string, op: string): [bigint, bigint] {
    const reversed = this.orient(tokenIn, tokenOut, op);
    const reserves: [bigint, bigint] = reversed
      ? [this.reserveB, this.reserveA]
      : [this.reserveA, this.reserveB];
    if (reserves[0] === 0n || reserves[1] === 0n) {
      throw new PoolError("InsufficientLiquidity", `${op}: pool has no liquidity`);
    }
    return reserves;
  }

  private toCallerOrder(
    amountA: bigint,
    amountB: bigint,
    liquidity: bigint,
    reversed: boolean
  ): LiquidityResult {
    return reversed
      ? { amountA: amountB, amountB: amountA, liquidity }
      : { amountA, amountB, liquidity };
  }
}
