/**
 * Shared constants used across the pool engine.
 *
 * Values follow the conventions of constant-product pair contracts.
 */

// ============================================
// Precision Constants
// ============================================

/** Fixed-point scale for reported prices (1e18) */
export const SCALE = 10n ** 18n;

/** Largest value representable as an unsigned 256-bit integer */
export const MAX_UINT256 = 2n ** 256n - 1n;

// ============================================
// Basis Points
// ============================================

/** Basis points denominator (10000 = 100%) */
export const BPS_DENOMINATOR = 10000n;

/** Default swap fee in basis points (30 = 0.3%, i.e. the 997/1000 split) */
export const DEFAULT_FEE_BPS = 30n;

// ============================================
// Liquidity
// ============================================

/** Claim tokens locked on the first deposit unless configured otherwise */
export const DEFAULT_MINIMUM_LIQUIDITY = 0n;

/** Holder that receives permanently locked claim tokens */
export const LOCKED_LIQUIDITY_HOLDER = "0x000000000000000000000000000000000000dEaD";
