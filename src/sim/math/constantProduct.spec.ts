import test from 'node:test';
import assert from 'node:assert/strict';

import { getAmountOut, simulateCycle, spotPrice } from './constantProduct.js';
import type { ReservePool } from '../../types.js';
import { ErrorClass, isArbError } from '../../errors.js';

function makeReservePool(overrides: Partial<ReservePool> = {}): ReservePool {
    const base: ReservePool = {
        id: 'cp',
        token0: { address: '0xa', symbol: 'TKA', decimals: 0 },
        token1: { address: '0xb', symbol: 'TKB', decimals: 0 },
        reserve0: 1_000_000n,
        reserve1: 1_000_000n,
        feeBps: 30,
    };
    return { ...base, ...overrides };
}

test('constantProduct: getAmountOut applies the fee before the curve', () => {
    // afterFee = 1000 * 9970 / 10000 = 997; out = 997 * 1e6 / (1e6 + 997) = 996
    assert.equal(getAmountOut(1000n, 1_000_000n, 1_000_000n, 30n), 996n);
    // no fee: 1000 * 1e6 / 1_001_000 = 999
    assert.equal(getAmountOut(1000n, 1_000_000n, 1_000_000n, 0n), 999n);
});

test('constantProduct: degenerate inputs give zero output', () => {
    assert.equal(getAmountOut(0n, 1_000n, 1_000n, 30n), 0n);
    assert.equal(getAmountOut(100n, 0n, 1_000n, 30n), 0n);
    assert.equal(getAmountOut(100n, 1_000n, 0n, 30n), 0n);
    // 1 * 9970 / 10000 = 0 after fee
    assert.equal(getAmountOut(1n, 1_000n, 1_000n, 30n), 0n);
});

test('constantProduct: fee outside [0, 10000) throws', () => {
    assert.throws(() => getAmountOut(1n, 1n, 1n, 10_000n), (e) => isArbError(e, ErrorClass.InvalidFee));
    assert.throws(() => getAmountOut(1n, 1n, 1n, -1n), (e) => isArbError(e, ErrorClass.InvalidFee));
});

test('constantProduct: output never drains the reserve and k does not shrink', () => {
    const reserveIn = 1_000_000n;
    const reserveOut = 2_000_000n;
    const amountIn = 10_000_000n;
    const out = getAmountOut(amountIn, reserveIn, reserveOut, 30n);

    assert.ok(out < reserveOut);
    assert.ok((reserveIn + amountIn) * (reserveOut - out) >= reserveIn * reserveOut);
});

test('constantProduct: spotPrice is raw reserve1 / reserve0', () => {
    assert.equal(spotPrice(makeReservePool({ reserve0: 2_000n, reserve1: 1_000n })), 0.5);
    assert.equal(spotPrice(makeReservePool({ reserve0: 0n })), 0);
});

test('constantProduct: round trip through identical pools loses the fees', () => {
    const pool = makeReservePool();
    const cycle = simulateCycle(1000n, pool, pool, 'token0');

    // leg 1: 996 (see above); leg 2: 996 * 9970 / 10000 = 993, 993 * 1_000_000 / 1_000_993 = 992
    assert.equal(cycle.amountMid, 996n);
    assert.equal(cycle.amountOut, 992n);
    assert.equal(cycle.profit, -8n);
    assert.equal(cycle.buyPool, 'cp');
    assert.equal(cycle.startToken, 'token0');
});

test('constantProduct: cycle with a dead first leg reports zero profit', () => {
    const pool = makeReservePool();
    const cycle = simulateCycle(1n, pool, pool, 'token1');
    assert.deepEqual(cycle, {
        startToken: 'token1',
        buyPool: 'cp',
        sellPool: 'cp',
        amountIn: 1n,
        amountMid: 0n,
        amountOut: 0n,
        profit: 0n,
    });
});
