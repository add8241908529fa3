/**
 * Sqrt Price Math (Q64.96)
 *
 * Amount deltas between two sqrt prices and the next sqrt price after an
 * exact input. Rounding follows the on-chain SqrtPriceMath library:
 * anything the pool is owed rounds up, anything it pays out rounds down.
 *
 * Key formulas:
 * - Δx = L * (√P_upper - √P_lower) / (√P_upper * √P_lower)
 * - Δy = L * (√P_upper - √P_lower)
 * - token0 in:  √P' = L * √P / (L + Δx * √P)
 * - token1 in:  √P' = √P + Δy / L
 */

import { ArbError, ErrorClass } from '../../errors.js';
import { MAX_UINT160, MAX_UINT256, divRoundUp, mulDiv, mulDivRoundUp } from './fullMath.js';
import { Q96 } from './tickMath.js';

const RESOLUTION = 96n;

function assertSqrtPrice(sqrtPriceX96: bigint): void {
    if (sqrtPriceX96 <= 0n || sqrtPriceX96 > MAX_UINT160) {
        throw new ArbError(ErrorClass.InvalidSqrtPrice, `Sqrt price ${sqrtPriceX96} outside (0, 2^160)`);
    }
}

function assertLiquidity(liquidity: bigint): void {
    if (liquidity <= 0n) {
        throw new ArbError(ErrorClass.InvalidPoolState, `Liquidity must be positive, got ${liquidity}`);
    }
}

/**
 * Amount of token0 between two sqrt prices.
 * Δx = L * 2^96 * (√B - √A) / √B / √A
 */
export function getAmount0Delta(
    sqrtRatioAX96: bigint,
    sqrtRatioBX96: bigint,
    liquidity: bigint,
    roundUp: boolean,
): bigint {
    if (sqrtRatioAX96 > sqrtRatioBX96) {
        [sqrtRatioAX96, sqrtRatioBX96] = [sqrtRatioBX96, sqrtRatioAX96];
    }
    assertSqrtPrice(sqrtRatioAX96);
    if (liquidity < 0n) {
        throw new ArbError(ErrorClass.InvalidPoolState, `Liquidity must be non-negative, got ${liquidity}`);
    }

    const numerator1 = liquidity << RESOLUTION;
    const numerator2 = sqrtRatioBX96 - sqrtRatioAX96;

    if (roundUp) {
        return divRoundUp(mulDivRoundUp(numerator1, numerator2, sqrtRatioBX96), sqrtRatioAX96);
    }
    return mulDiv(numerator1, numerator2, sqrtRatioBX96) / sqrtRatioAX96;
}

/**
 * Amount of token1 between two sqrt prices.
 * Δy = L * (√B - √A) / 2^96
 */
export function getAmount1Delta(
    sqrtRatioAX96: bigint,
    sqrtRatioBX96: bigint,
    liquidity: bigint,
    roundUp: boolean,
): bigint {
    if (sqrtRatioAX96 > sqrtRatioBX96) {
        [sqrtRatioAX96, sqrtRatioBX96] = [sqrtRatioBX96, sqrtRatioAX96];
    }
    if (liquidity < 0n) {
        throw new ArbError(ErrorClass.InvalidPoolState, `Liquidity must be non-negative, got ${liquidity}`);
    }

    const priceDelta = sqrtRatioBX96 - sqrtRatioAX96;
    return roundUp ? mulDivRoundUp(liquidity, priceDelta, Q96) : mulDiv(liquidity, priceDelta, Q96);
}

/**
 * Next sqrt price after adding token0 (price moves down).
 * Rounds up so the price never drops further than the real pool would let it.
 */
export function getNextSqrtPriceFromAmount0RoundingUp(
    sqrtPriceX96: bigint,
    liquidity: bigint,
    amount: bigint,
): bigint {
    assertSqrtPrice(sqrtPriceX96);
    assertLiquidity(liquidity);
    if (amount === 0n) return sqrtPriceX96;

    const numerator = liquidity << RESOLUTION;
    const product = amount * sqrtPriceX96;
    const denominator = numerator + product;
    if (denominator <= MAX_UINT256) {
        return mulDivRoundUp(numerator, sqrtPriceX96, denominator);
    }
    // uint256 overflow path of the on-chain library: L / (L/√P + Δx)
    return divRoundUp(numerator, numerator / sqrtPriceX96 + amount);
}

/**
 * Next sqrt price after adding token1 (price moves up).
 * Rounds down so the price never rises further than the real pool would let it.
 */
export function getNextSqrtPriceFromAmount1RoundingDown(
    sqrtPriceX96: bigint,
    liquidity: bigint,
    amount: bigint,
): bigint {
    assertSqrtPrice(sqrtPriceX96);
    assertLiquidity(liquidity);

    const next = sqrtPriceX96 + mulDiv(amount, Q96, liquidity);
    if (next > MAX_UINT160) {
        throw new ArbError(ErrorClass.MathOverflow, `Next sqrt price ${next} exceeds uint160`);
    }
    return next;
}

/**
 * Next sqrt price for an exact input of either token
 */
export function getNextSqrtPriceFromInput(
    sqrtPriceX96: bigint,
    liquidity: bigint,
    amountIn: bigint,
    zeroForOne: boolean,
): bigint {
    return zeroForOne
        ? getNextSqrtPriceFromAmount0RoundingUp(sqrtPriceX96, liquidity, amountIn)
        : getNextSqrtPriceFromAmount1RoundingDown(sqrtPriceX96, liquidity, amountIn);
}
