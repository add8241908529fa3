import test from 'node:test';
import assert from 'node:assert/strict';

import {
    getAmount0Delta,
    getAmount1Delta,
    getNextSqrtPriceFromAmount0RoundingUp,
    getNextSqrtPriceFromAmount1RoundingDown,
    getNextSqrtPriceFromInput,
} from './sqrtPriceMath.js';
import { Q96, sqrtRatioAtTick } from './tickMath.js';
import { MAX_UINT160 } from './fullMath.js';
import { ErrorClass, isArbError } from '../../errors.js';

const L = 10n ** 18n;
const SQRT_M10 = sqrtRatioAtTick(-10);

test('amount deltas round up for the pool and down for the trader', () => {
    assert.equal(getAmount0Delta(SQRT_M10, Q96, L, true), 500100010000501n);
    assert.equal(getAmount0Delta(SQRT_M10, Q96, L, false), 500100010000500n);
    assert.equal(getAmount1Delta(SQRT_M10, Q96, L, true), 499850034993002n);
    assert.equal(getAmount1Delta(SQRT_M10, Q96, L, false), 499850034993001n);
});

test('amount deltas ignore argument order', () => {
    assert.equal(getAmount0Delta(Q96, SQRT_M10, L, true), getAmount0Delta(SQRT_M10, Q96, L, true));
    assert.equal(getAmount1Delta(Q96, SQRT_M10, L, false), getAmount1Delta(SQRT_M10, Q96, L, false));
});

test('zero price range moves no tokens', () => {
    assert.equal(getAmount0Delta(Q96, Q96, L, true), 0n);
    assert.equal(getAmount1Delta(Q96, Q96, L, true), 0n);
});

test('next sqrt price from token0 and token1 input', () => {
    // L * Q96 / (L + L) = Q96 / 2
    assert.equal(getNextSqrtPriceFromAmount0RoundingUp(Q96, L, L), Q96 / 2n);
    // Q96 + L * Q96 / L = 2 * Q96
    assert.equal(getNextSqrtPriceFromAmount1RoundingDown(Q96, L, L), Q96 * 2n);
    assert.equal(getNextSqrtPriceFromInput(Q96, L, L, true), Q96 / 2n);
    assert.equal(getNextSqrtPriceFromInput(Q96, L, L, false), Q96 * 2n);
    assert.equal(getNextSqrtPriceFromAmount0RoundingUp(Q96, L, 0n), Q96);
});

test('token0 input beyond uint256 takes the fallback formula', () => {
    const huge = 1n << 200n;
    const next = getNextSqrtPriceFromAmount0RoundingUp(Q96, L, huge);
    // ceil((L << 96) / ((L << 96) / Q96 + huge))
    const numerator = L << 96n;
    const denominator = numerator / Q96 + huge;
    const expected = numerator / denominator + (numerator % denominator === 0n ? 0n : 1n);
    assert.equal(next, expected);
    assert.ok(next < Q96);
});

test('invalid inputs throw', () => {
    assert.throws(
        () => getNextSqrtPriceFromAmount1RoundingDown(MAX_UINT160, L, L),
        (e) => isArbError(e, ErrorClass.MathOverflow),
    );
    assert.throws(() => getNextSqrtPriceFromAmount0RoundingUp(Q96, 0n, 1n), (e) => isArbError(e, ErrorClass.InvalidPoolState));
    assert.throws(() => getAmount0Delta(0n, Q96, L, true), (e) => isArbError(e, ErrorClass.InvalidSqrtPrice));
    assert.throws(() => getAmount1Delta(SQRT_M10, Q96, -1n, true), (e) => isArbError(e, ErrorClass.InvalidPoolState));
});
