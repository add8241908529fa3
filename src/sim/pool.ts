/**
 * Concentrated-liquidity pool simulator (exact input, tick crossing).
 *
 * Walks the sparse initialized-tick list of a snapshot:
 * - zeroForOne: next tick is the greatest initialized tick <= current tick,
 *   crossing it applies -liquidityNet and moves tick to t - 1
 * - oneForZero: next tick is the smallest initialized tick > current tick,
 *   crossing it applies +liquidityNet and moves tick to t
 *
 * Running past the known window, the crossing budget or the active liquidity
 * marks the result incomplete; amountOut is then a lower bound.
 */

import type { PoolState, SwapDiagnostics, SwapSimulation, TickLiquidity } from '../types.js';
import { StopReason } from '../types.js';
import { ArbError, ErrorClass } from '../errors.js';
import { MAX_UINT128 } from './math/fullMath.js';
import {
    MAX_SQRT_RATIO,
    MAX_TICK,
    MIN_SQRT_RATIO,
    MIN_TICK,
    assertTick,
    sqrtRatioAtTick,
    tickAtSqrtRatio,
} from './math/tickMath.js';
import { computeSwapStep, FEE_DENOMINATOR } from './math/swapStep.js';

export const DEFAULT_MAX_TICK_CROSSINGS = 80;

export function validatePoolState(pool: PoolState): void {
    if (pool.sqrtPriceX96 < MIN_SQRT_RATIO || pool.sqrtPriceX96 >= MAX_SQRT_RATIO) {
        throw new ArbError(ErrorClass.InvalidPoolState, `Pool ${pool.id}: sqrtPriceX96 ${pool.sqrtPriceX96} out of range`);
    }
    if (pool.liquidity <= 0n || pool.liquidity > MAX_UINT128) {
        throw new ArbError(ErrorClass.InvalidPoolState, `Pool ${pool.id}: liquidity ${pool.liquidity} out of range`);
    }
    if (!Number.isInteger(pool.fee) || pool.fee < 0 || BigInt(pool.fee) >= FEE_DENOMINATOR) {
        throw new ArbError(ErrorClass.InvalidFee, `Pool ${pool.id}: fee ${pool.fee} ppm out of range`);
    }
    try {
        assertTick(pool.tick);
    } catch (e) {
        throw new ArbError(ErrorClass.InvalidPoolState, `Pool ${pool.id}: ${e instanceof Error ? e.message : String(e)}`);
    }

    let previous: number | undefined;
    for (const t of pool.ticks) {
        if (!Number.isInteger(t.tick) || t.tick < MIN_TICK || t.tick > MAX_TICK) {
            throw new ArbError(ErrorClass.InvalidPoolState, `Pool ${pool.id}: initialized tick ${t.tick} out of range`);
        }
        if (previous !== undefined && t.tick <= previous) {
            throw new ArbError(ErrorClass.InvalidPoolState, `Pool ${pool.id}: ticks not strictly ascending at ${t.tick}`);
        }
        previous = t.tick;
    }
}

export class PoolSimulator {
    readonly pool: PoolState;
    private readonly feePpm: bigint;

    constructor(pool: PoolState) {
        validatePoolState(pool);
        this.pool = pool;
        this.feePpm = BigInt(pool.fee);
    }

    /**
     * Binary search over the sorted tick list.
     * zeroForOne: greatest t <= tick. Otherwise: smallest t > tick.
     */
    nextInitializedTick(tick: number, zeroForOne: boolean): TickLiquidity | undefined {
        const ticks = this.pool.ticks;
        let lo = 0;
        let hi = ticks.length;

        // first index whose tick is > `tick`
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            const entry = ticks[mid];
            if (entry !== undefined && entry.tick <= tick) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }

        return zeroForOne ? ticks[lo - 1] : ticks[lo];
    }

    simulateSwapExactIn(
        amountIn: bigint,
        zeroForOne: boolean,
        maxTickCrossings: number = DEFAULT_MAX_TICK_CROSSINGS,
    ): SwapSimulation {
        if (amountIn < 0n) {
            throw new ArbError(ErrorClass.MathOverflow, `Negative amountIn ${amountIn}`);
        }

        let sqrtPriceX96 = this.pool.sqrtPriceX96;
        let tick = this.pool.tick;
        let liquidity = this.pool.liquidity;
        let amountRemaining = amountIn;
        let amountOut = 0n;
        let feePaid = 0n;
        let crossed = 0;
        let stopReason: StopReason = amountIn === 0n ? StopReason.ZeroInput : StopReason.Filled;

        while (amountRemaining > 0n) {
            if (crossed > maxTickCrossings) {
                stopReason = StopReason.MaxCrossings;
                break;
            }
            if (liquidity <= 0n) {
                stopReason = StopReason.LiquidityExhausted;
                break;
            }

            const next = this.nextInitializedTick(tick, zeroForOne);
            if (next === undefined) {
                stopReason = StopReason.NoInitializedTick;
                break;
            }

            const sqrtPriceTargetX96 = sqrtRatioAtTick(next.tick);
            if (zeroForOne ? sqrtPriceTargetX96 >= sqrtPriceX96 : sqrtPriceTargetX96 <= sqrtPriceX96) {
                stopReason = StopReason.TargetPassed;
                break;
            }

            const step = computeSwapStep(
                sqrtPriceX96,
                sqrtPriceTargetX96,
                liquidity,
                amountRemaining,
                this.feePpm,
                zeroForOne,
            );

            amountRemaining -= step.amountIn + step.feeAmount;
            amountOut += step.amountOut;
            feePaid += step.feeAmount;
            sqrtPriceX96 = step.sqrtPriceNextX96;

            if (sqrtPriceX96 !== sqrtPriceTargetX96) {
                // Stopped inside the range: input exhausted
                tick = tickAtSqrtRatio(sqrtPriceX96);
                break;
            }

            if (zeroForOne) {
                liquidity -= next.liquidityNet;
                tick = next.tick - 1;
            } else {
                liquidity += next.liquidityNet;
                tick = next.tick;
            }
            crossed++;
        }

        const diagnostics: SwapDiagnostics = {
            finalSqrtPriceX96: sqrtPriceX96,
            finalTick: tick,
            finalLiquidity: liquidity,
            ticksCrossed: crossed,
            amountInConsumed: amountIn - amountRemaining,
            amountInLeft: amountRemaining,
            feePaid,
            incomplete: stopReason !== StopReason.Filled && stopReason !== StopReason.ZeroInput,
            stopReason,
        };

        return { amountOut, diagnostics };
    }
}

/** Stateless wrapper around PoolSimulator */
export function simulateSwapExactIn(
    pool: PoolState,
    amountIn: bigint,
    zeroForOne: boolean,
    maxTickCrossings: number = DEFAULT_MAX_TICK_CROSSINGS,
): SwapSimulation {
    return new PoolSimulator(pool).simulateSwapExactIn(amountIn, zeroForOne, maxTickCrossings);
}
