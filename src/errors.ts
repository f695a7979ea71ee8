/**
 * Pool rejections.
 *
 * Every failed operation throws a PoolError before any state changes, so
 * callers can branch on `code` and resubmit.
 */

export type PoolErrorCode =
  | "Expired"
  | "InvalidPair"
  | "InvalidAmount"
  | "SlippageExceeded"
  | "InsufficientLiquidity"
  | "InsufficientLiquidityMinted"
  | "InsufficientBalance"
  | "TransferFailed"
  | "Overflow"
  | "Locked"
  | "InvalidConfig";

export class PoolError extends Error {
  readonly code: PoolErrorCode;

  constructor(code: PoolErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PoolError";
    this.code = code;
  }
}

/**
 * Narrow an unknown thrown value to a PoolError, optionally of a given code
 */
export function isPoolError(err: unknown, code?: PoolErrorCode): err is PoolError {
  return err instanceof PoolError && (code === undefined || err.code === code);
}
