/**
 * Property-Based Fuzz Tests
 *
 * Uses fast-check to generate random inputs and verify the pool invariants.
 */
import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  ConstantProductPool,
  InMemoryLedger,
  MAX_UINT256,
  calcDepositAmounts,
  getAmountIn,
  getAmountOut,
  isPoolError,
  isqrt,
  type LiquidityResult,
} from "./index";

// ============================================================================
// Arbitrary Generators
// ============================================================================

// Pool reserves from dust to 1e12 whole 18-decimal tokens
const reserveArb = fc.bigInt(1_000n, 10n ** 30n);

// Swap inputs up to the same magnitude
const amountArb = fc.bigInt(1n, 10n ** 30n);

// Fees from zero to 10%
const feeArb = fc.bigInt(0n, 1000n);

const FUNDING = 10n ** 40n;
const DEADLINE = 10n ** 12n;

function fundedPool(feeBps = 30n) {
  const ledger = new InMemoryLedger();
  const pool = new ConstantProductPool({
    assetA: "TKA",
    assetB: "TKB",
    ledger,
    config: { feeBps },
    env: { AMM_LOG_LEVEL: "silent" },
  });
  for (const user of ["alice", "bob"]) {
    for (const asset of ["TKA", "TKB"]) {
      ledger.mint(asset, user, FUNDING);
      ledger.approve(asset, user, pool.address, MAX_UINT256);
    }
  }
  return { ledger, pool };
}

function depositParams(caller: string, amountA: bigint, amountB: bigint) {
  return {
    caller,
    assetA: "TKA",
    assetB: "TKB",
    amountADesired: amountA,
    amountBDesired: amountB,
    amountAMin: 0n,
    amountBMin: 0n,
    to: caller,
    deadline: DEADLINE,
  };
}

// ============================================================================
// Math Property Tests
// ============================================================================

describe("Math Fuzz Tests", () => {
  it("isqrt should return the floor square root", () => {
    fc.assert(
      fc.property(fc.bigInt(0n, 2n ** 200n), (y) => {
        const z = isqrt(y);
        expect(z * z <= y).toBe(true);
        expect((z + 1n) * (z + 1n) > y).toBe(true);
      })
    );
  });

  it("isqrt should be monotonic", () => {
    fc.assert(
      fc.property(fc.bigInt(0n, 2n ** 128n), fc.bigInt(0n, 2n ** 128n), (a, b) => {
        const [lo, hi] = a <= b ? [a, b] : [b, a];
        expect(isqrt(lo) <= isqrt(hi)).toBe(true);
      })
    );
  });

  it("getAmountOut at 30 bps should equal the 997/1000 formula", () => {
    fc.assert(
      fc.property(amountArb, reserveArb, reserveArb, (amountIn, reserveIn, reserveOut) => {
        const amountInWithFee = amountIn * 997n;
        const expected = (amountInWithFee * reserveOut) / (reserveIn * 1000n + amountInWithFee);
        expect(getAmountOut(amountIn, reserveIn, reserveOut, 30n)).toBe(expected);
      })
    );
  });

  it("swaps should never shrink the reserve product, and grow it with a fee", () => {
    fc.assert(
      fc.property(amountArb, reserveArb, reserveArb, feeArb, (amountIn, reserveIn, reserveOut, fee) => {
        const amountOut = getAmountOut(amountIn, reserveIn, reserveOut, fee);
        expect(amountOut < reserveOut).toBe(true);

        const kBefore = reserveIn * reserveOut;
        const kAfter = (reserveIn + amountIn) * (reserveOut - amountOut);
        if (fee > 0n) {
          expect(kAfter > kBefore).toBe(true);
        } else {
          expect(kAfter >= kBefore).toBe(true);
        }
      })
    );
  });

  it("getAmountIn should always be enough for the requested output", () => {
    fc.assert(
      fc.property(reserveArb, reserveArb, feeArb, fc.bigInt(1n, 10n ** 6n), (reserveIn, reserveOut, fee, divisor) => {
        const amountOut = reserveOut / (divisor + 1n);
        fc.pre(amountOut > 0n);

        const amountIn = getAmountIn(amountOut, reserveIn, reserveOut, fee);
        expect(getAmountOut(amountIn, reserveIn, reserveOut, fee) >= amountOut).toBe(true);
      })
    );
  });

  it("deposit amounts should never exceed what was offered", () => {
    fc.assert(
      fc.property(amountArb, amountArb, reserveArb, reserveArb, (desiredA, desiredB, reserveA, reserveB) => {
        try {
          const { amountA, amountB } = calcDepositAmounts(desiredA, desiredB, 0n, 0n, reserveA, reserveB);
          expect(amountA <= desiredA).toBe(true);
          expect(amountB <= desiredB).toBe(true);
        } catch (err) {
          if (!isPoolError(err, "InsufficientLiquidity")) throw err;
        }
      })
    );
  });
});

// ============================================================================
// Pool Property Tests
// ============================================================================

describe("Pool Fuzz Tests", () => {
  it("a deposit then full withdrawal should never return more than was deposited", () => {
    fc.assert(
      fc.property(reserveArb, reserveArb, amountArb, amountArb, (seedA, seedB, offerA, offerB) => {
        const { pool } = fundedPool();
        pool.addLiquidity(depositParams("alice", seedA, seedB));

        let deposited: LiquidityResult;
        try {
          deposited = pool.addLiquidity(depositParams("bob", offerA, offerB));
        } catch (err) {
          if (isPoolError(err, "InsufficientLiquidityMinted")) return;
          throw err;
        }

        let withdrawn: LiquidityResult;
        try {
          withdrawn = pool.removeLiquidity({
            caller: "bob",
            assetA: "TKA",
            assetB: "TKB",
            liquidity: deposited.liquidity,
            amountAMin: 0n,
            amountBMin: 0n,
            to: "bob",
            deadline: DEADLINE,
          });
        } catch (err) {
          // A share too small to release both assets
          if (isPoolError(err, "InsufficientLiquidity")) return;
          throw err;
        }
        expect(withdrawn.amountA <= deposited.amountA).toBe(true);
        expect(withdrawn.amountB <= deposited.amountB).toBe(true);
      })
    );
  });

  it("reserves should track ledger balances and claims should sum to supply", () => {
    fc.assert(
      fc.property(
        reserveArb,
        reserveArb,
        fc.array(fc.tuple(fc.boolean(), amountArb), { maxLength: 8 }),
        (seedA, seedB, swaps) => {
          const { ledger, pool } = fundedPool();
          pool.addLiquidity(depositParams("alice", seedA, seedB));

          for (const [aToB, amountIn] of swaps) {
            const before = pool.getReserves();
            try {
              pool.swapExactTokensForTokens({
                caller: "bob",
                amountIn,
                amountOutMin: 0n,
                path: aToB ? ["TKA", "TKB"] : ["TKB", "TKA"],
                to: "bob",
                deadline: DEADLINE,
              });
            } catch (err) {
              if (isPoolError(err, "InsufficientLiquidity")) continue;
              throw err;
            }
            const after = pool.getReserves();
            expect(after.reserveA * after.reserveB > before.reserveA * before.reserveB).toBe(true);
          }

          const { reserveA, reserveB } = pool.getReserves();
          expect(ledger.balanceOf("TKA", pool.address)).toBe(reserveA);
          expect(ledger.balanceOf("TKB", pool.address)).toBe(reserveB);
          expect(pool.balanceOf("alice") + pool.balanceOf("bob")).toBe(pool.totalSupply());
        }
      ),
      { numRuns: 50 }
    );
  });
});
