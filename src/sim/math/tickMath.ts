/**
 * Tick Math (Q64.96)
 *
 * tick <-> sqrt price conversion matching the on-chain TickMath library bit for bit.
 *
 * Key formulas:
 * - sqrtPriceX96 = sqrt(1.0001^tick) * 2^96
 * - human price (token1 per token0) = sqrtPriceX96^2 / 2^192 * 10^(dec0 - dec1)
 *
 * The exact path (sqrtRatioAtTick) never touches floating point. Decimal.js is
 * used only for human-readable prices.
 */

import { Decimal } from 'decimal.js';
import { ArbError, ErrorClass } from '../../errors.js';

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

/** sqrtRatioAtTick(MIN_TICK) */
export const MIN_SQRT_RATIO = 4295128739n;
/** sqrtRatioAtTick(MAX_TICK) */
export const MAX_SQRT_RATIO = 1461446703485210103287273052203988822378723970342n;

export const Q96 = 1n << 96n;
export const Q128 = 1n << 128n;
export const Q192 = 1n << 192n;
const Q256 = 1n << 256n;
const LOW_32_MASK = (1n << 32n) - 1n;

// 80 significant digits keeps (sqrtP^2 / 2^192) exact enough for any decimals delta
const HighPrecision = Decimal.clone({ precision: 80 });

/**
 * 1 / sqrt(1.0001)^(2^i) in Q128, for bit i of |tick|.
 */
const TICK_MULTIPLIERS: readonly bigint[] = [
    0xfffcb933bd6fad37aa2d162d1a594001n,
    0xfff97272373d413259a46990580e213an,
    0xfff2e50f5f656932ef12357cf3c7fdccn,
    0xffe5caca7e10e4e61c3624eaa0941cd0n,
    0xffcb9843d60f6159c9db58835c926644n,
    0xff973b41fa98c081472e6896dfb254c0n,
    0xff2ea16466c96a3843ec78b326b52861n,
    0xfe5dee046a99a2a811c461f1969c3053n,
    0xfcbe86c7900a88aedcffc83b479aa3a4n,
    0xf987a7253ac413176f2b074cf7815e54n,
    0xf3392b0822b70005940c7a398e4b70f3n,
    0xe7159475a2c29b7443b29c7fa6e889d9n,
    0xd097f3bdfd2022b8845ad8f792aa5825n,
    0xa9f746462d870fdf8a65dc1f90e061e5n,
    0x70d869a156d2a1b890bb3df62baf32f7n,
    0x31be135f97d08fd981231505542fcfa6n,
    0x9aa508b5b7a84e1c677de54f3e99bc9n,
    0x5d6af8dedb81196699c329225ee604n,
    0x2216e584f5fa1ea926041bedfe98n,
    0x48a170391f7dc42444e8fa2n,
];

export function assertTick(tick: number): void {
    if (!Number.isInteger(tick) || tick < MIN_TICK || tick > MAX_TICK) {
        throw new ArbError(
            ErrorClass.TickOutOfRange,
            `Tick ${tick} out of bounds [${MIN_TICK}, ${MAX_TICK}]`,
        );
    }
}

/**
 * Convert tick to sqrt price in Q96 format.
 *
 * Binary decomposition over |tick| with the 20 Q128 multipliers, reciprocal
 * for positive ticks, then Q128 -> Q96 rounding up.
 */
export function sqrtRatioAtTick(tick: number): bigint {
    assertTick(tick);

    const absTick = Math.abs(tick);
    let ratio = Q128;

    for (let bit = 0; bit < TICK_MULTIPLIERS.length; bit++) {
        if ((absTick & (1 << bit)) !== 0) {
            const multiplier = TICK_MULTIPLIERS[bit];
            if (multiplier === undefined) break;
            ratio = (ratio * multiplier) >> 128n;
        }
    }

    if (tick > 0) {
        ratio = (Q256 - 1n) / ratio;
    }

    // Q128 -> Q96, rounding up so tickAtSqrtRatio(sqrtRatioAtTick(t)) === t
    return (ratio >> 32n) + ((ratio & LOW_32_MASK) === 0n ? 0n : 1n);
}

/**
 * Greatest tick whose sqrt ratio is <= sqrtPriceX96.
 *
 * Pure BigInt binary search on sqrtRatioAtTick, so no float ever leaks into
 * tick placement.
 */
export function tickAtSqrtRatio(sqrtPriceX96: bigint): number {
    if (sqrtPriceX96 < MIN_SQRT_RATIO || sqrtPriceX96 >= MAX_SQRT_RATIO) {
        throw new ArbError(
            ErrorClass.InvalidSqrtPrice,
            `Sqrt price ${sqrtPriceX96} out of bounds [${MIN_SQRT_RATIO}, ${MAX_SQRT_RATIO})`,
        );
    }

    let low = MIN_TICK;
    let high = MAX_TICK;

    while (low < high) {
        // ceiling midpoint avoids an infinite loop when high = low + 1
        const mid = low + Math.floor((high - low + 1) / 2);
        if (sqrtRatioAtTick(mid) <= sqrtPriceX96) {
            low = mid;
        } else {
            high = mid - 1;
        }
    }

    return low;
}

/**
 * Human price (token1 per token0) from a Q96 sqrt price.
 * High-precision decimal; use spotPriceFromSqrt for display/ranking.
 */
export function priceFromSqrt(sqrtPriceX96: bigint, decimals0: number, decimals1: number): Decimal {
    if (sqrtPriceX96 <= 0n) {
        throw new ArbError(ErrorClass.InvalidSqrtPrice, `Sqrt price must be positive, got ${sqrtPriceX96}`);
    }
    const sqrt = new HighPrecision(sqrtPriceX96.toString());
    const raw = sqrt.mul(sqrt).div(new HighPrecision(Q192.toString()));
    return raw.mul(new HighPrecision(10).pow(decimals0 - decimals1));
}

export function spotPriceFromSqrt(sqrtPriceX96: bigint, decimals0: number, decimals1: number): number {
    return priceFromSqrt(sqrtPriceX96, decimals0, decimals1).toNumber();
}

/** price = 1.0001^tick * 10^(dec0 - dec1); display only */
export function priceAtTick(tick: number, decimals0: number, decimals1: number): Decimal {
    assertTick(tick);
    return new HighPrecision('1.0001').pow(tick).mul(new HighPrecision(10).pow(decimals0 - decimals1));
}
