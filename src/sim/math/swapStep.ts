/**
 * Single swap step inside one constant-liquidity range (exact input).
 *
 * Fee is deducted before the swap. When the step reaches the target price the
 * fee is charged on the consumed input (rounded up); when it stops short, the
 * whole leftover of amountRemaining becomes the fee, so rounding slack lands
 * in the fee bucket and never in the output.
 */

import type { SwapStepResult } from '../../types.js';
import { ArbError, ErrorClass } from '../../errors.js';
import { mulDiv, mulDivRoundUp } from './fullMath.js';
import { getAmount0Delta, getAmount1Delta, getNextSqrtPriceFromInput } from './sqrtPriceMath.js';

export const FEE_DENOMINATOR = 1_000_000n;

function assertFee(feePpm: bigint): void {
    if (feePpm < 0n || feePpm >= FEE_DENOMINATOR) {
        throw new ArbError(ErrorClass.InvalidFee, `Fee ${feePpm} ppm outside [0, 1000000)`);
    }
}

/** amountRemaining * (1e6 - fee) / 1e6, rounded down */
export function amountAfterFee(amountRemaining: bigint, feePpm: bigint): bigint {
    assertFee(feePpm);
    return mulDiv(amountRemaining, FEE_DENOMINATOR - feePpm, FEE_DENOMINATOR);
}

export function computeSwapStep(
    sqrtPriceCurrentX96: bigint,
    sqrtPriceTargetX96: bigint,
    liquidity: bigint,
    amountRemaining: bigint,
    feePpm: bigint,
    zeroForOne: boolean,
): SwapStepResult {
    assertFee(feePpm);
    if (sqrtPriceCurrentX96 <= 0n || sqrtPriceTargetX96 <= 0n) {
        throw new ArbError(ErrorClass.InvalidSqrtPrice, 'Sqrt prices must be positive');
    }
    if (liquidity <= 0n) {
        throw new ArbError(ErrorClass.InvalidPoolState, `Liquidity must be positive, got ${liquidity}`);
    }
    if (amountRemaining < 0n) {
        throw new ArbError(ErrorClass.MathOverflow, `Negative amountRemaining ${amountRemaining}`);
    }

    if (amountRemaining === 0n) {
        return { sqrtPriceNextX96: sqrtPriceCurrentX96, amountIn: 0n, amountOut: 0n, feeAmount: 0n };
    }

    const remainingLessFee = amountAfterFee(amountRemaining, feePpm);

    // Max input the range can absorb before hitting the target (pool's claim: round up)
    const amountInMax = zeroForOne
        ? getAmount0Delta(sqrtPriceTargetX96, sqrtPriceCurrentX96, liquidity, true)
        : getAmount1Delta(sqrtPriceCurrentX96, sqrtPriceTargetX96, liquidity, true);

    if (remainingLessFee >= amountInMax) {
        // Reaches the target
        const amountOut = zeroForOne
            ? getAmount1Delta(sqrtPriceTargetX96, sqrtPriceCurrentX96, liquidity, false)
            : getAmount0Delta(sqrtPriceCurrentX96, sqrtPriceTargetX96, liquidity, false);

        return {
            sqrtPriceNextX96: sqrtPriceTargetX96,
            amountIn: amountInMax,
            amountOut,
            feeAmount: mulDivRoundUp(amountInMax, feePpm, FEE_DENOMINATOR - feePpm),
        };
    }

    // Stops inside the range
    const sqrtPriceNextX96 = getNextSqrtPriceFromInput(
        sqrtPriceCurrentX96,
        liquidity,
        remainingLessFee,
        zeroForOne,
    );
    const amountOut = zeroForOne
        ? getAmount1Delta(sqrtPriceNextX96, sqrtPriceCurrentX96, liquidity, false)
        : getAmount0Delta(sqrtPriceCurrentX96, sqrtPriceNextX96, liquidity, false);

    return {
        sqrtPriceNextX96,
        amountIn: remainingLessFee,
        amountOut,
        feeAmount: amountRemaining - remainingLessFee,
    };
}
