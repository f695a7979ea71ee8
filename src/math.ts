/**
 * Constant Product Math
 *
 * Pure unsigned-integer formulas for an x*y=k pair with a proportional
 * input-side fee. Every division truncates toward zero, so rounding always
 * favors the pool over the caller.
 *
 * Invariant: (x + dx * (1 - fee)) * (y - dy) >= x * y
 */

import { BPS_DENOMINATOR, DEFAULT_FEE_BPS, MAX_UINT256, SCALE } from "./constants";
import { PoolError } from "./errors";

// ============================================
// Checked uint256 Arithmetic
// ============================================

function checkRange(value: bigint, op: string): bigint {
  if (value < 0n || value > MAX_UINT256) {
    throw new PoolError("Overflow", `${op}: result ${value} is outside the uint256 range`);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return checkRange(a + b, "checkedAdd");
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return checkRange(a - b, "checkedSub");
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return checkRange(a * b, "checkedMul");
}

/**
 * Truncating division; a zero divisor is reported as InsufficientLiquidity,
 * as every divisor here is a reserve or a supply figure.
 */
export function checkedDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new PoolError("InsufficientLiquidity", "checkedDiv: division by zero");
  }
  return checkRange(a / b, "checkedDiv");
}

/**
 * Reject amounts that are not valid uint256 values
 */
export function assertUint(value: bigint, name: string): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new PoolError("InvalidAmount", `${name} must be a uint256 value (got ${value})`);
  }
}

// ============================================
// Integer Helpers
// ============================================

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

/**
 * Floor square root using the Babylonian method
 * Matches the classic pair-contract sqrt: z*z <= y < (z+1)*(z+1)
 *
 * @param y - Non-negative integer
 * @returns floor(sqrt(y))
 */
export function isqrt(y: bigint): bigint {
  checkRange(y, "isqrt");

  if (y > 3n) {
    let z = y;
    let x = y / 2n + 1n;
    while (x < z) {
      z = x;
      x = (y / x + x) / 2n;
    }
    return z;
  }
  if (y !== 0n) return 1n;
  return 0n;
}

// ============================================
// Swap Pricing
// ============================================

/**
 * Validate a fee expressed in basis points
 * @throws PoolError(InvalidConfig) unless 0 <= feeBps < 10000
 */
export function validateFeeBps(feeBps: bigint): bigint {
  if (feeBps < 0n || feeBps >= BPS_DENOMINATOR) {
    throw new PoolError(
      "InvalidConfig",
      `Invalid fee: ${feeBps}. Must be 0-${BPS_DENOMINATOR - 1n} bps`
    );
  }
  return feeBps;
}

/**
 * Calculate output amount for an exact input
 *
 * amountInWithFee = amountIn * (10000 - feeBps)
 * amountOut = amountInWithFee * reserveOut / (reserveIn * 10000 + amountInWithFee)
 *
 * With the default 30 bps this is exactly the 997/1000 formula, since both
 * numerator and denominator carry the same extra factor of 10.
 *
 * @param amountIn - Exact input amount
 * @param reserveIn - Reserve of the input asset
 * @param reserveOut - Reserve of the output asset
 * @param feeBps - Input-side fee in basis points
 * @returns Output amount, truncated
 */
export function getAmountOut(
  amountIn: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: bigint = DEFAULT_FEE_BPS
): bigint {
  if (amountIn <= 0n) {
    throw new PoolError("InvalidAmount", "getAmountOut: amountIn must be positive");
  }
  if (reserveIn === 0n || reserveOut === 0n) {
    throw new PoolError("InsufficientLiquidity", "getAmountOut: reserves are empty");
  }
  validateFeeBps(feeBps);

  const amountInWithFee = checkedMul(amountIn, BPS_DENOMINATOR - feeBps);
  const numerator = checkedMul(amountInWithFee, reserveOut);
  const denominator = checkedAdd(checkedMul(reserveIn, BPS_DENOMINATOR), amountInWithFee);
  return numerator / denominator;
}

/**
 * Calculate the input needed to receive an exact output
 * Reverse of getAmountOut, rounded up so the quoted input always suffices
 *
 * @param amountOut - Desired output amount
 * @param reserveIn - Reserve of the input asset
 * @param reserveOut - Reserve of the output asset
 * @param feeBps - Input-side fee in basis points
 * @returns Required input amount
 */
export function getAmountIn(
  amountOut: bigint,
  reserveIn: bigint,
  reserveOut: bigint,
  feeBps: bigint = DEFAULT_FEE_BPS
): bigint {
  if (amountOut <= 0n) {
    throw new PoolError("InvalidAmount", "getAmountIn: amountOut must be positive");
  }
  if (reserveIn === 0n || reserveOut === 0n) {
    throw new PoolError("InsufficientLiquidity", "getAmountIn: reserves are empty");
  }
  if (amountOut >= reserveOut) {
    throw new PoolError(
      "InsufficientLiquidity",
      `getAmountIn: amountOut ${amountOut} exceeds reserve ${reserveOut}`
    );
  }
  validateFeeBps(feeBps);

  const numerator = checkedMul(checkedMul(reserveIn, amountOut), BPS_DENOMINATOR);
  const denominator = checkedMul(reserveOut - amountOut, BPS_DENOMINATOR - feeBps);
  return checkedAdd(numerator / denominator, 1n);
}

/**
 * Amount of B matching amountA at the current reserve ratio
 */
export function quote(amountA: bigint, reserveA: bigint, reserveB: bigint): bigint {
  if (amountA <= 0n) {
    throw new PoolError("InvalidAmount", "quote: amount must be positive");
  }
  if (reserveA === 0n || reserveB === 0n) {
    throw new PoolError("InsufficientLiquidity", "quote: reserves are empty");
  }
  return checkedMul(amountA, reserveB) / reserveA;
}

/**
 * Spot price of one base unit in quote units, scaled by 1e18
 *
 * @param reserveBase - Reserve of the asset being priced
 * @param reserveQuote - Reserve of the asset the price is expressed in
 * @returns reserveQuote * SCALE / reserveBase
 */
export function spotPrice(reserveBase: bigint, reserveQuote: bigint): bigint {
  if (reserveBase === 0n) {
    throw new PoolError("InsufficientLiquidity", "spotPrice: base reserve is zero");
  }
  return checkedMul(reserveQuote, SCALE) / reserveBase;
}

// ============================================
// Liquidity Functions
// ============================================

export interface PairAmounts {
  amountA: bigint;
  amountB: bigint;
}

/**
 * Choose the amounts actually deposited so the reserve ratio is preserved
 * and neither side exceeds what the caller offered.
 *
 * Empty pools accept the desired amounts as-is (the depositor sets the price).
 *
 * @throws PoolError(SlippageExceeded) if the matched side falls below its minimum
 */
export function calcDepositAmounts(
  amountADesired: bigint,
  amountBDesired: bigint,
  amountAMin: bigint,
  amountBMin: bigint,
  reserveA: bigint,
  reserveB: bigint
): PairAmounts {
  if (reserveA === 0n && reserveB === 0n) {
    return { amountA: amountADesired, amountB: amountBDesired };
  }

  const amountBOptimal = quote(amountADesired, reserveA, reserveB);
  if (amountBOptimal <= amountBDesired) {
    if (amountBOptimal < amountBMin) {
      throw new PoolError(
        "SlippageExceeded",
        `calcDepositAmounts: amountB ${amountBOptimal} is below minimum ${amountBMin}`
      );
    }
    return { amountA: amountADesired, amountB: amountBOptimal };
  }

  const amountAOptimal = quote(amountBDesired, reserveB, reserveA);
  if (amountAOptimal > amountADesired) {
    throw new PoolError(
      "InvalidAmount",
      `calcDepositAmounts: amountA ${amountAOptimal} exceeds desired ${amountADesired}`
    );
  }
  if (amountAOptimal < amountAMin) {
    throw new PoolError(
      "SlippageExceeded",
      `calcDepositAmounts: amountA ${amountAOptimal} is below minimum ${amountAMin}`
    );
  }
  return { amountA: amountAOptimal, amountB: amountBDesired };
}

/**
 * Calculate claim tokens minted for a deposit
 *
 * First deposit: isqrt(amountA * amountB) minus the locked minimum.
 * Later deposits: the smaller of the two proportional shares, so a deposit
 * that drifts from the reserve ratio is paid for its scarcer side only.
 *
 * @returns Claim tokens credited to the depositor (may be zero or negative
 *          when the bootstrap deposit does not cover the locked minimum)
 */
export function calcLiquidityMinted(
  amountA: bigint,
  amountB: bigint,
  reserveA: bigint,
  reserveB: bigint,
  totalSupply: bigint,
  minimumLiquidity: bigint = 0n
): bigint {
  if (totalSupply === 0n) {
    return isqrt(checkedMul(amountA, amountB)) - minimumLiquidity;
  }
  return min(
    checkedDiv(checkedMul(amountA, totalSupply), reserveA),
    checkedDiv(checkedMul(amountB, totalSupply), reserveB)
  );
}

/**
 * Calculate balanced (proportional) removal of liquidity
 *
 * @param liquidity - Claim tokens to burn
 * @param balanceA - Pool balance of asset A
 * @param balanceB - Pool balance of asset B
 * @param totalSupply - Claim token supply before the burn
 * @returns Amounts of each asset released
 */
export function calcRemoveLiquidity(
  liquidity: bigint,
  balanceA: bigint,
  balanceB: bigint,
  totalSupply: bigint
): PairAmounts {
  return {
    amountA: checkedDiv(checkedMul(liquidity, balanceA), totalSupply),
    amountB: checkedDiv(checkedMul(liquidity, balanceB), totalSupply),
  };
}
