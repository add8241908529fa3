/**
 * Fixed-point multiply/divide over unsigned 256-bit integers.
 *
 * BigInt products never lose precision, so the 512-bit intermediate of the
 * on-chain implementation is implicit. What BigInt does NOT give us is the
 * uint256 bound: operands and quotients are checked explicitly and an
 * out-of-range value throws instead of wrapping.
 */

import { ArbError, ErrorClass } from '../../errors.js';

export const MAX_UINT256 = (1n << 256n) - 1n;
export const MAX_UINT160 = (1n << 160n) - 1n;
export const MAX_UINT128 = (1n << 128n) - 1n;

export function assertUint256(value: bigint, label = 'value'): bigint {
    if (value < 0n || value > MAX_UINT256) {
        throw new ArbError(ErrorClass.MathOverflow, `${label} ${value} outside uint256`);
    }
    return value;
}

/** floor(a * b / denominator) */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
    assertUint256(a, 'a');
    assertUint256(b, 'b');
    assertUint256(denominator, 'denominator');
    if (denominator === 0n) {
        throw new ArbError(ErrorClass.DivisionByZero, 'mulDiv denominator is zero');
    }
    return assertUint256((a * b) / denominator, 'mulDiv result');
}

/** ceil(a * b / denominator) */
export function mulDivRoundUp(a: bigint, b: bigint, denominator: bigint): bigint {
    const result = mulDiv(a, b, denominator);
    if ((a * b) % denominator === 0n) return result;
    return assertUint256(result + 1n, 'mulDivRoundUp result');
}

/** ceil(a / b) */
export function divRoundUp(a: bigint, b: bigint): bigint {
    return mulDivRoundUp(a, 1n, b);
}

export function checkedAdd(a: bigint, b: bigint): bigint {
    return assertUint256(assertUint256(a, 'a') + assertUint256(b, 'b'), 'sum');
}

export function checkedSub(a: bigint, b: bigint): bigint {
    return assertUint256(assertUint256(a, 'a') - assertUint256(b, 'b'), 'difference');
}
