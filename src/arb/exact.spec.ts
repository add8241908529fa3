import test from 'node:test';
import assert from 'node:assert/strict';

import {
    NonExecutableReason,
    evaluateExactPair,
    evaluateExactPairFromSource,
    exactOpportunities,
    ranOffKnownTicks,
    widenExactPair,
} from './exact.js';
import { defaultGasConfig } from './gas.js';
import { sqrtRatioAtTick } from '../sim/math/tickMath.js';
import { applyTickWindow, widenTickWindow, type PoolSource } from '../snapshot/source.js';
import { metrics } from '../instrument/metrics.js';
import { ArbError, ErrorClass } from '../errors.js';
import { ArbMode, StopReason, type PoolState, type ReservePool, type TickWindow } from '../types.js';

const L = 10n ** 24n;

function makePool(id: string, tick: number, overrides: Partial<PoolState> = {}): PoolState {
    return {
        id,
        token0: { address: '0xa', symbol: 'TKA', decimals: 18 },
        token1: { address: '0xb', symbol: 'TKB', decimals: 18 },
        fee: 500,
        tickSpacing: 1,
        sqrtPriceX96: sqrtRatioAtTick(tick),
        tick,
        liquidity: L,
        ticks: [
            { tick: -6000, liquidityNet: L },
            { tick: 6000, liquidityNet: -L },
        ],
        ...overrides,
    };
}

function approx(actual: number | null, expected: number, eps = 1e-6): void {
    assert.ok(actual !== null, 'expected a number, got null');
    assert.ok(Math.abs(actual - expected) < eps, `${actual} != ${expected}`);
}

const options = { gas: defaultGasConfig(), tradeSizeToken0: 10 };

test('exact: lower-price pool is the buy leg and feeds the sell leg', () => {
    const result = evaluateExactPair(makePool('high', 100), makePool('low', 0), options);
    assert.ok(result.ok);
    const opp = result.value;
    assert.ok(opp.executable);

    assert.equal(opp.buyPool, 'low');
    assert.equal(opp.sellPool, 'high');
    assert.equal(opp.buyLeg.zeroForOne, true);
    assert.equal(opp.buyLeg.amountIn, 10n ** 19n);
    assert.equal(opp.buyLeg.amountOut, 9_994_900_100_973_490_769n);
    assert.equal(opp.sellLeg.zeroForOne, false);
    assert.equal(opp.sellLeg.amountIn, opp.buyLeg.amountOut);
    assert.equal(opp.sellLeg.amountOut, 9_890_408_092_188_478_386n);
    assert.equal(opp.profitToken0Raw, -109_591_907_811_521_614n);

    assert.equal(opp.amount0In, 10);
    assert.equal(opp.feeBps, 10);
    approx(opp.spotSpreadBps, 100.49662092876569);
    approx(opp.grossSpreadBps, -109.59190781152161);
    assert.equal(opp.netSpreadBps, opp.grossSpreadBps);
    assert.equal(opp.profitAfterGasToken0, null);
    assert.equal(opp.profitableAfterGas, null);
});

test('exact: identical pools never show a profit', () => {
    const result = evaluateExactPair(makePool('a', 0), makePool('b', 0), options);
    assert.ok(result.ok);
    assert.ok(result.value.executable);
    assert.equal(result.value.profitToken0Raw, -10_197_146_235_007_003n);
    assert.ok(result.value.profitToken0Raw <= 0n);
});

test('exact: gas is charged when token0 is the numeraire', () => {
    const weth = { address: '0xa', symbol: 'WETH', decimals: 18 };
    const result = evaluateExactPair(
        makePool('a', 0, { token0: weth }),
        makePool('b', 100, { token0: weth }),
        options,
    );
    assert.ok(result.ok && result.value.executable);
    const opp = result.value;

    approx(opp.gas.gasCostToken0, 0.0096);
    approx(opp.gas.gasBps, 9.6);
    approx(opp.netSpreadBps, opp.grossSpreadBps - 9.6);
    approx(opp.profitAfterGasToken0, opp.profitToken0 - 0.0096);
    assert.equal(opp.profitableAfterGas, false);
});

test('exact: a leg that runs off the tick list is non-executable, not an error', () => {
    const noTicksBelow = makePool('low', 0, { ticks: [{ tick: 6000, liquidityNet: -L }] });
    const buyFails = evaluateExactPair(noTicksBelow, makePool('high', 100), options);
    assert.ok(buyFails.ok);
    assert.equal(buyFails.value.executable, false);
    assert.ok(!buyFails.value.executable);
    assert.equal(buyFails.value.reason, NonExecutableReason.BuyLeg);
    assert.equal(buyFails.value.buyLeg.diagnostics.stopReason, StopReason.NoInitializedTick);
    assert.equal(buyFails.value.sellLeg, undefined);

    const noTicksAbove = makePool('high', 100, { ticks: [{ tick: -6000, liquidityNet: L }] });
    const sellFails = evaluateExactPair(makePool('low', 0), noTicksAbove, options);
    assert.ok(sellFails.ok && !sellFails.value.executable);
    assert.equal(sellFails.value.reason, NonExecutableReason.SellLeg);
    assert.equal(sellFails.value.sellLeg?.diagnostics.incomplete, true);
});

test('exact: token mismatch comes back as an error', () => {
    const other = makePool('b', 0, { token1: { address: '0xc', symbol: 'TKC', decimals: 18 } });
    const result = evaluateExactPair(makePool('a', 0), other, options);

    assert.equal(result.ok, false);
    assert.ok(!result.ok);
    assert.equal(result.error.class, ErrorClass.TokenMismatch);
});

test('exact: invalid trade size comes back as an error', () => {
    const result = evaluateExactPair(makePool('a', 0), makePool('b', 100), { ...options, tradeSizeToken0: 0 });
    assert.ok(!result.ok);
    assert.equal(result.error.class, ErrorClass.InvalidConfig);
});

test('exactOpportunities: executable results first, failures as warnings', () => {
    metrics.reset();
    const report = exactOpportunities(
        [
            makePool('low', 0),
            makePool('high', 100),
            makePool('bad', 50, { fee: 1_000_000 }),
            makePool('dead', 20, { ticks: [] }),
        ],
        options,
    );

    assert.equal(report.mode, ArbMode.Exact);
    assert.equal(report.pairsEvaluated, 6);
    // 'bad' fails whenever its simulator is built; 'dead' legs end incomplete
    assert.deepEqual(
        report.warnings.map((w) => w.slice(0, w.indexOf(' failed: INVALID_FEE'))),
        ['exact pair low/bad', 'exact pair high/bad'],
    );
    assert.equal(report.opportunities.length, 4);
    assert.deepEqual(report.opportunities.map((o) => o.executable), [true, false, false, false]);
    assert.equal(report.best?.buyPool, 'low');
    assert.equal(report.best?.sellPool, 'high');

    const m = metrics.snapshot();
    assert.equal(m.simsIncomplete, 3n);
});

function poolWithUnreadableTicks(id: string, tick: number): PoolState {
    return {
        ...makePool(id, tick),
        get ticks(): PoolState['ticks'] {
            throw new TypeError('tick list unavailable');
        },
    };
}

test('exactOpportunities: an unexpected throw skips only its own pair', () => {
    metrics.reset();
    const report = exactOpportunities(
        [makePool('low', 0), makePool('high', 100), poolWithUnreadableTicks('broken', 50)],
        options,
    );

    assert.equal(report.pairsEvaluated, 3);
    assert.deepEqual(report.warnings, [
        'exact pair low/broken failed: tick list unavailable',
        'exact pair high/broken failed: tick list unavailable',
    ]);
    assert.deepEqual(report.opportunities.map((o) => `${o.buyPool}>${o.sellPool}`), ['low>high']);
    assert.equal(metrics.snapshot().pairsSkipped, 2n);
});

test('exactOpportunities: pair budget skips the rest with one warning', () => {
    const report = exactOpportunities(
        [makePool('p0', 0), makePool('p1', 10), makePool('p2', 20)],
        { ...options, maxPairs: 2 },
    );

    assert.equal(report.pairsEvaluated, 2);
    assert.deepEqual(report.warnings, ['pair budget 2 reached; 1 pairs skipped']);
    assert.equal(report.assumptions.maxPairs, 2);
});

// ============================================================================
// WINDOW WIDENING
// ============================================================================

class MemorySource implements PoolSource {
    widerCalls = 0;

    constructor(private readonly pools: Map<string, PoolState>) {}

    private full(id: string): PoolState {
        const pool = this.pools.get(id);
        if (!pool) throw new Error(`unknown pool ${id}`);
        return pool;
    }

    async fetchPoolState(id: string, window: TickWindow): Promise<PoolState> {
        return applyTickWindow(this.full(id), window);
    }

    async fetchWiderWindow(id: string, current: TickWindow): Promise<PoolState> {
        this.widerCalls++;
        return applyTickWindow(this.full(id), widenTickWindow(current));
    }

    async fetchReservePool(id: string): Promise<ReservePool> {
        throw new Error(`no reserve pool ${id}`);
    }
}

// ticks at +-6000 sit in bitmap words -24 and 23: outside 20 words, inside 40
const NARROW: TickWindow = { wordsEachSide: 20, maxTicks: 10 };

function memorySource(): MemorySource {
    return new MemorySource(new Map([
        ['low', makePool('low', 0)],
        ['high', makePool('high', 100)],
    ]));
}

test('exact from source: narrow window without widening stays non-executable', async () => {
    const source = memorySource();
    const result = await evaluateExactPairFromSource(source, 'low', 'high', { ...options, window: NARROW });

    assert.ok(result.ok && !result.value.executable);
    assert.equal(result.value.reason, NonExecutableReason.BuyLeg);
    assert.equal(source.widerCalls, 0);
});

test('exact from source: widening re-fetches once and completes the legs', async () => {
    const source = memorySource();
    const result = await evaluateExactPairFromSource(source, 'low', 'high', {
        ...options,
        window: NARROW,
        widenWindow: true,
    });

    assert.ok(result.ok && result.value.executable);
    assert.equal(result.value.sellLeg.amountOut, 9_890_408_092_188_478_386n);
    assert.equal(source.widerCalls, 2);
});

class TimeoutOnWiderSource extends MemorySource {
    async fetchWiderWindow(id: string): Promise<PoolState> {
        throw new ArbError(ErrorClass.SourceFailure, `rpc timeout for ${id}`);
    }
}

test('exact from source: a rejected wider fetch resolves to an error result', async () => {
    const source = new TimeoutOnWiderSource(new Map([
        ['low', makePool('low', 0)],
        ['high', makePool('high', 100)],
    ]));
    const result = await evaluateExactPairFromSource(source, 'low', 'high', {
        ...options,
        window: NARROW,
        widenWindow: true,
    });

    assert.ok(!result.ok);
    assert.equal(result.error.class, ErrorClass.SourceFailure);
    assert.equal(result.error.message, 'rpc timeout for low');
});

test('exact from source: a failed pool fetch resolves to an error result', async () => {
    const result = await evaluateExactPairFromSource(memorySource(), 'low', 'missing', options);

    assert.ok(!result.ok);
    assert.equal(result.error.class, ErrorClass.SourceFailure);
    assert.equal(result.error.message, 'fetch low/missing: unknown pool missing');
});

test('widenExactPair: re-runs a pair that ran off its ticks', async () => {
    const source = memorySource();
    const narrow = await evaluateExactPairFromSource(source, 'low', 'high', { ...options, window: NARROW });
    assert.ok(narrow.ok);
    assert.equal(ranOffKnownTicks(narrow.value), true);

    const widened = await widenExactPair(source, narrow.value, { ...options, window: NARROW });
    assert.ok(widened.ok && widened.value.executable);
    assert.equal(ranOffKnownTicks(widened.value), false);
    assert.equal(source.widerCalls, 2);
});

test('exact from source: executable pairs are not re-fetched', async () => {
    const source = memorySource();
    const result = await evaluateExactPairFromSource(source, 'low', 'high', {
        ...options,
        window: { wordsEachSide: 40, maxTicks: 10 },
        widenWindow: true,
    });

    assert.ok(result.ok && result.value.executable);
    assert.equal(source.widerCalls, 0);
});
