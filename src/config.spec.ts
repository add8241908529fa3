import test from 'node:test';
import assert from 'node:assert/strict';

import { loadConfig } from './config.js';
import { ErrorClass, isArbError } from './errors.js';
import { ArbMode } from './types.js';

test('config: defaults with an empty environment', () => {
    const config = loadConfig({});

    assert.equal(config.mode, ArbMode.Screen);
    assert.equal(config.gas.gasPriceWei, 30_000_000_000n);
    assert.equal(config.gas.gasUnits, 320_000n);
    assert.deepEqual(config.gas.numeraireSymbols, ['WETH', 'ETH']);
    assert.equal(config.tradeSizeToken0, 10_000);
    assert.equal(config.maxTickCrossings, 80);
    assert.equal(config.maxPairs, 500);
    assert.equal(config.maxReported, 25);
    assert.equal(config.scanSteps, 18);
    assert.equal(config.maxFractionOfReserve, 0.003);
    assert.equal(config.feeBps, undefined);
    assert.equal(config.onlyProfitable, false);
    assert.equal(config.widenWindow, false);
    assert.deepEqual(config.window, { wordsEachSide: 8, maxTicks: 1200 });
});

test('config: environment overrides', () => {
    const config = loadConfig({
        ARB_MODE: ' Constant-Product ',
        GAS_PRICE_WEI: '1000000000',
        ARB_GAS_UNITS: '200000',
        NUMERAIRE_SYMBOLS: 'wmatic, matic,',
        ARB_TRADE_SIZE_TOKEN0: '2.5',
        ARB_MAX_TICK_CROSS: '0',
        ARB_FEE_BPS: '25',
        ARB_ONLY_PROFITABLE: 'yes',
        ARB_WIDEN_WINDOW: 'TRUE',
        ARB_WORDS_EACH_SIDE: '4',
        ARB_MAX_TICKS: '',
    });

    assert.equal(config.mode, ArbMode.ConstantProduct);
    assert.equal(config.gas.gasPriceWei, 1_000_000_000n);
    assert.equal(config.gas.gasUnits, 200_000n);
    assert.deepEqual(config.gas.numeraireSymbols, ['WMATIC', 'MATIC']);
    assert.equal(config.tradeSizeToken0, 2.5);
    assert.equal(config.maxTickCrossings, 0);
    assert.equal(config.feeBps, 25);
    assert.equal(config.onlyProfitable, true);
    assert.equal(config.widenWindow, true);
    assert.deepEqual(config.window, { wordsEachSide: 4, maxTicks: 1200 });
});

test('config: invalid values name the variable', () => {
    const cases: Array<[Record<string, string>, string]> = [
        [{ ARB_MODE: 'deep' }, 'ARB_MODE=deep: expected screen|exact|constant-product'],
        [{ GAS_PRICE_WEI: '1e9' }, 'GAS_PRICE_WEI=1e9: expected a non-negative integer'],
        [{ ARB_MAX_PAIRS: '0' }, 'ARB_MAX_PAIRS=0: expected an integer >= 1'],
        [{ ARB_SCAN_STEPS: '2.5' }, 'ARB_SCAN_STEPS=2.5: expected an integer >= 1'],
        [{ ARB_TRADE_SIZE_TOKEN0: '-1' }, 'ARB_TRADE_SIZE_TOKEN0=-1: expected a positive number'],
        [{ ARB_FEE_BPS: '10000' }, 'ARB_FEE_BPS=10000: expected a value below 10000'],
    ];

    for (const [env, message] of cases) {
        assert.throws(
            () => loadConfig(env),
            (e) => isArbError(e, ErrorClass.InvalidConfig) && e.message === message,
            message,
        );
    }
});
