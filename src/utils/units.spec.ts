import test from 'node:test';
import assert from 'node:assert/strict';

import { feePpmToBps, fromRaw, fromRawNumber, toRaw, weiToEth } from './units.js';
import { ErrorClass, isArbError } from '../errors.js';

test('units: toRaw scales by decimals without float drift', () => {
    assert.equal(toRaw(10_000, 6), 10_000_000_000n);
    assert.equal(toRaw(0.1, 18), 100_000_000_000_000_000n);
    assert.equal(toRaw('1.5', 0), 2n);
    assert.equal(toRaw('2.5', 0), 2n);
    assert.equal(toRaw('123.456789', 3), 123_457n);
});

test('units: fromRaw is exact', () => {
    assert.equal(fromRaw(1_234_567n, 6).toString(), '1.234567');
    assert.equal(fromRawNumber(5n * 10n ** 17n, 18), 0.5);
    assert.equal(weiToEth(10n ** 18n), 1);
});

test('units: fee ppm to bps', () => {
    assert.equal(feePpmToBps(3000), 30);
    assert.equal(feePpmToBps(500), 5);
    assert.equal(feePpmToBps(100), 1);
});

test('units: bad input throws InvalidConfig', () => {
    assert.throws(() => toRaw(1, -1), (e) => isArbError(e, ErrorClass.InvalidConfig));
    assert.throws(() => toRaw(1, 1.5), (e) => isArbError(e, ErrorClass.InvalidConfig));
    assert.throws(() => toRaw(Number.NaN, 6), (e) => isArbError(e, ErrorClass.InvalidConfig));
    assert.throws(() => toRaw('abc', 6), (e) => isArbError(e, ErrorClass.InvalidConfig));
});
