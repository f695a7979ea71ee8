/**
 * Constant-product pool engine
 *
 * Single-pair AMM core: claim-token deposits and withdrawals, fee-bearing
 * swaps and spot prices over unsigned integer math.
 */

export * from "./constants";
export * from "./errors";
export * from "./math";
export * from "./ledger";
export * from "./clock";
export * from "./config";
export * from "./logger";
export * from "./events";
export * from "./pool";
