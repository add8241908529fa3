/**
 * Constant Product AMM Math
 *
 * x * y = k
 *
 * Key formulas:
 * - amountInAfterFee = floor(amountIn * (10000 - feeBps) / 10000)
 * - amountOut = floor(amountInAfterFee * reserveOut / (reserveIn + amountInAfterFee))
 * - Fee applied BEFORE swap calculation
 */

import type { CycleResult, ReservePool } from '../../types.js';
import { ArbError, ErrorClass } from '../../errors.js';

// Fee calculation constants
const FEE_DENOMINATOR = 10000n;

function assertFeeBps(feeBps: bigint): void {
    if (feeBps < 0n || feeBps >= FEE_DENOMINATOR) {
        throw new ArbError(ErrorClass.InvalidFee, `Fee ${feeBps} bps outside [0, 10000)`);
    }
}

/**
 * Get output amount WITH fees applied to input.
 * Returns 0 for degenerate input or reserves.
 */
export function getAmountOut(
    amountIn: bigint,
    reserveIn: bigint,
    reserveOut: bigint,
    feeBps: bigint,
): bigint {
    assertFeeBps(feeBps);
    if (amountIn <= 0n || reserveIn <= 0n || reserveOut <= 0n) {
        return 0n;
    }

    const amountInAfterFee = (amountIn * (FEE_DENOMINATOR - feeBps)) / FEE_DENOMINATOR;
    if (amountInAfterFee <= 0n) return 0n;

    return (amountInAfterFee * reserveOut) / (reserveIn + amountInAfterFee);
}

/** token1 per token0 from raw reserves (no decimals adjustment) */
export function spotPrice(pool: ReservePool): number {
    if (pool.reserve0 <= 0n) return 0;
    return Number(pool.reserve1) / Number(pool.reserve0);
}

function reservesFor(pool: ReservePool, zeroForOne: boolean): { reserveIn: bigint; reserveOut: bigint } {
    return zeroForOne
        ? { reserveIn: pool.reserve0, reserveOut: pool.reserve1 }
        : { reserveIn: pool.reserve1, reserveOut: pool.reserve0 };
}

/**
 * Two-leg cycle: start token -> other token on `buy`, then back on `sell`.
 *
 * token0 start: token0 -> token1 (buy), token1 -> token0 (sell)
 * token1 start: token1 -> token0 (buy), token0 -> token1 (sell)
 */
export function simulateCycle(
    amountIn: bigint,
    buy: ReservePool,
    sell: ReservePool,
    startToken: CycleResult['startToken'],
): CycleResult {
    const firstZeroForOne = startToken === 'token0';
    const route = { startToken, buyPool: buy.id, sellPool: sell.id, amountIn };

    const first = reservesFor(buy, firstZeroForOne);
    const amountMid = getAmountOut(amountIn, first.reserveIn, first.reserveOut, BigInt(buy.feeBps));
    if (amountMid <= 0n) {
        return { ...route, amountMid: 0n, amountOut: 0n, profit: 0n };
    }

    const second = reservesFor(sell, !firstZeroForOne);
    const amountOut = getAmountOut(amountMid, second.reserveIn, second.reserveOut, BigInt(sell.feeBps));
    if (amountOut <= 0n) {
        return { ...route, amountMid, amountOut: 0n, profit: 0n };
    }

    return { ...route, amountMid, amountOut, profit: amountOut - amountIn };
}
