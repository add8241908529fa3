/**
 * Exact two-leg arbitrage over concentrated-liquidity pools.
 *
 * buy  = pool with the lower spot price (token1 per token0)
 * sell = pool with the higher spot price
 * leg 1: token0 -> token1 on buy  (zeroForOne)
 * leg 2: token1 -> token0 on sell (oneForZero), fed with leg-1 output
 *
 * Profit is accounted in token0. Fees are already inside the simulated
 * amounts, so gross return bps is the net-of-fee figure; gas comes off on top.
 * An incomplete or empty leg yields executable: false, never an exception.
 */

import type {
    ArbitrageReport,
    ExactExecutable,
    ExactLeg,
    ExactNonExecutable,
    ExactOpportunity,
    GasConfig,
    PoolState,
    Result,
    TickWindow,
} from '../types.js';
import { ArbMode, StopReason, err, ok } from '../types.js';
import { ArbError, ErrorClass, describeError } from '../errors.js';
import { metrics } from '../instrument/metrics.js';
import { DEFAULT_MAX_TICK_CROSSINGS, PoolSimulator } from '../sim/pool.js';
import { spotPriceFromSqrt } from '../sim/math/tickMath.js';
import type { PoolSource } from '../snapshot/source.js';
import { DEFAULT_TICK_WINDOW } from '../snapshot/source.js';
import { logger } from '../utils/logger.js';
import { feePpmToBps, fromRawNumber, toRaw } from '../utils/units.js';
import { estimateGas } from './gas.js';
import { groupByPair } from './pairIndex.js';
import { DEFAULT_MAX_REPORTED, DEFAULT_TRADE_SIZE_TOKEN0 } from './screen.js';

export const DEFAULT_MAX_PAIRS = 500;

export const NonExecutableReason = {
    BuyLeg: 'buy leg incomplete or zero output',
    SellLeg: 'sell leg incomplete or zero output',
} as const;

export interface ExactOptions {
    gas: GasConfig;
    tradeSizeToken0?: number;
    maxTickCrossings?: number;
    /** Pair budget per run; pairs beyond it are skipped with one warning */
    maxPairs?: number;
    maxReported?: number;
}

export interface ExactSourceOptions extends ExactOptions {
    window?: TickWindow;
    /** Retry an incomplete pair once through PoolSource.fetchWiderWindow */
    widenWindow?: boolean;
}

function assertSamePair(a: PoolState, b: PoolState): void {
    const same = a.token0.address.toLowerCase() === b.token0.address.toLowerCase()
        && a.token1.address.toLowerCase() === b.token1.address.toLowerCase();
    if (!same) {
        throw new ArbError(
            ErrorClass.TokenMismatch,
            `token mismatch: ${a.id} (${a.token0.address}/${a.token1.address}) vs ${b.id} (${b.token0.address}/${b.token1.address})`,
        );
    }
}

function runLeg(pool: PoolState, amountIn: bigint, zeroForOne: boolean, maxTickCrossings: number): ExactLeg {
    const sim = new PoolSimulator(pool).simulateSwapExactIn(amountIn, zeroForOne, maxTickCrossings);
    metrics.incrSimExecuted();
    if (sim.diagnostics.incomplete) metrics.incrSimIncomplete();
    return { pool: pool.id, zeroForOne, amountIn, amountOut: sim.amountOut, diagnostics: sim.diagnostics };
}

function legFailed(leg: ExactLeg): boolean {
    return leg.amountOut <= 0n || leg.diagnostics.incomplete;
}

function evaluate(poolA: PoolState, poolB: PoolState, options: ExactOptions): ExactOpportunity {
    assertSamePair(poolA, poolB);

    const priceA = spotPriceFromSqrt(poolA.sqrtPriceX96, poolA.token0.decimals, poolA.token1.decimals);
    const priceB = spotPriceFromSqrt(poolB.sqrtPriceX96, poolB.token0.decimals, poolB.token1.decimals);
    const aIsBuy = priceA <= priceB;
    const buy = aIsBuy ? poolA : poolB;
    const sell = aIsBuy ? poolB : poolA;
    const lowSpot = Math.min(priceA, priceB);
    const highSpot = Math.max(priceA, priceB);

    const tradeSizeToken0 = options.tradeSizeToken0 ?? DEFAULT_TRADE_SIZE_TOKEN0;
    const maxTickCrossings = options.maxTickCrossings ?? DEFAULT_MAX_TICK_CROSSINGS;
    const { decimals: decimals0, symbol: symbol0 } = buy.token0;
    const { decimals: decimals1, symbol: symbol1 } = buy.token1;

    const amount0InRaw = toRaw(tradeSizeToken0, decimals0);
    if (amount0InRaw <= 0n) {
        throw new ArbError(ErrorClass.InvalidConfig, `invalid trade size ${tradeSizeToken0}`);
    }

    const base = {
        strategy: 'exact' as const,
        pairToken0: buy.token0.address,
        pairToken1: buy.token1.address,
        symbol0,
        symbol1,
        buyPool: buy.id,
        sellPool: sell.id,
        buyFee: buy.fee,
        sellFee: sell.fee,
        spotBuyPrice: lowSpot,
        spotSellPrice: highSpot,
        tradeSizeToken0,
    };

    const buyLeg = runLeg(buy, amount0InRaw, true, maxTickCrossings);
    if (legFailed(buyLeg)) {
        const result: ExactNonExecutable = { ...base, buyLeg, executable: false, reason: NonExecutableReason.BuyLeg };
        return result;
    }

    const sellLeg = runLeg(sell, buyLeg.amountOut, false, maxTickCrossings);
    if (legFailed(sellLeg)) {
        const result: ExactNonExecutable = {
            ...base,
            buyLeg,
            sellLeg,
            executable: false,
            reason: NonExecutableReason.SellLeg,
        };
        return result;
    }

    const amount0In = fromRawNumber(amount0InRaw, decimals0);
    const amount1Out = fromRawNumber(buyLeg.amountOut, decimals1);
    const amount0Out = fromRawNumber(sellLeg.amountOut, decimals0);

    const profitToken0Raw = sellLeg.amountOut - amount0InRaw;
    const profitToken0 = fromRawNumber(profitToken0Raw, decimals0);
    const grossSpreadBps = (profitToken0 / amount0In) * 10_000;

    const gas = estimateGas(options.gas, symbol0, symbol1, lowSpot, amount0In);
    const netSpreadBps = gas.gasBps === null ? grossSpreadBps : grossSpreadBps - gas.gasBps;
    const profitAfterGasToken0 = gas.gasCostToken0 === null ? null : profitToken0 - gas.gasCostToken0;

    const result: ExactExecutable = {
        ...base,
        executable: true,
        buyLeg,
        sellLeg,
        spotSpreadBps: ((highSpot - lowSpot) / lowSpot) * 10_000,
        feeBps: feePpmToBps(buy.fee) + feePpmToBps(sell.fee),
        amount0In,
        amount1Out,
        amount0Out,
        effectiveBuyPrice: amount0In > 0 ? amount1Out / amount0In : null,
        // token0 per token1 on the sell leg, inverted to token1 per token0
        effectiveSellPrice: amount0Out > 0 && amount1Out > 0 ? amount1Out / amount0Out : null,
        profitToken0,
        profitToken0Raw,
        grossSpreadBps,
        netSpreadBpsWithoutGas: grossSpreadBps,
        netSpreadBps,
        gas,
        profitAfterGasToken0,
        profitableAfterGas: profitAfterGasToken0 === null ? null : profitAfterGasToken0 > 0,
    };
    return result;
}

/**
 * Simulate buy-low / sell-high across two pools of the same pair.
 * Token mismatch, invalid pool state or math failures come back as err().
 * Anything else is a defect and propagates.
 */
export function evaluateExactPair(
    poolA: PoolState,
    poolB: PoolState,
    options: ExactOptions,
): Result<ExactOpportunity, ArbError> {
    try {
        return ok(evaluate(poolA, poolB, options));
    } catch (e) {
        if (e instanceof ArbError) return err(e);
        throw e;
    }
}

/** True when a non-executable result stopped because a leg ran past the known ticks */
export function ranOffKnownTicks(opp: ExactOpportunity): boolean {
    if (opp.executable) return false;
    const failedLeg = opp.sellLeg ?? opp.buyLeg;
    return failedLeg.diagnostics.stopReason === StopReason.NoInitializedTick;
}

async function fetchPair(
    fetch: (id: string, window: TickWindow) => Promise<PoolState>,
    idA: string,
    idB: string,
    window: TickWindow,
): Promise<Result<[PoolState, PoolState], ArbError>> {
    try {
        return ok(await Promise.all([fetch(idA, window), fetch(idB, window)]));
    } catch (e) {
        if (e instanceof ArbError) return err(e);
        return err(new ArbError(ErrorClass.SourceFailure, `fetch ${idA}/${idB}: ${describeError(e)}`));
    }
}

/**
 * Re-run a pair that ran off its ticks on pools fetched with a wider window.
 * Sources without fetchWiderWindow leave the result as it was.
 */
export async function widenExactPair(
    source: PoolSource,
    opp: ExactOpportunity,
    options: ExactSourceOptions,
): Promise<Result<ExactOpportunity, ArbError>> {
    if (!source.fetchWiderWindow) return ok(opp);

    logger.debug(`[exact] widening tick window for ${opp.buyPool}/${opp.sellPool}`);
    const wider = await fetchPair(
        source.fetchWiderWindow.bind(source),
        opp.buyPool,
        opp.sellPool,
        options.window ?? DEFAULT_TICK_WINDOW,
    );
    if (!wider.ok) return wider;
    return evaluateExactPair(wider.value[0], wider.value[1], options);
}

/**
 * Fetch both pools through a PoolSource and evaluate. With widenWindow, a
 * pair whose leg ran off the known ticks is fetched once more with a wider
 * window before being reported non-executable. Source failures resolve to err().
 */
export async function evaluateExactPairFromSource(
    source: PoolSource,
    idA: string,
    idB: string,
    options: ExactSourceOptions,
): Promise<Result<ExactOpportunity, ArbError>> {
    const pools = await fetchPair(source.fetchPoolState.bind(source), idA, idB, options.window ?? DEFAULT_TICK_WINDOW);
    if (!pools.ok) return pools;

    const first = evaluateExactPair(pools.value[0], pools.value[1], options);
    if (!first.ok || !options.widenWindow || !ranOffKnownTicks(first.value)) return first;
    return widenExactPair(source, first.value, options);
}

function byNetSpreadDesc(a: ExactOpportunity, b: ExactOpportunity): number {
    if (a.executable && b.executable) return b.netSpreadBps - a.netSpreadBps;
    if (a.executable) return -1;
    if (b.executable) return 1;
    return 0;
}

/**
 * Evaluate every pool pair within each (token0, token1) group.
 * Per-pair failures, thrown or returned, become warnings and count as
 * skipped pairs; the batch always completes.
 */
export function exactOpportunities(
    pools: readonly PoolState[],
    options: ExactOptions,
): ArbitrageReport<ExactOpportunity> {
    const maxPairs = options.maxPairs ?? DEFAULT_MAX_PAIRS;
    const maxReported = options.maxReported ?? DEFAULT_MAX_REPORTED;
    const { groups, skipped } = groupByPair(pools);
    const warnings: string[] = [...skipped];
    metrics.addPoolsSkipped(skipped.length);
    const opportunities: ExactOpportunity[] = [];

    let pairsEvaluated = 0;
    let pairsOverBudget = 0;

    for (const group of groups) {
        for (let i = 0; i < group.pools.length; i++) {
            for (let j = i + 1; j < group.pools.length; j++) {
                const a = group.pools[i];
                const b = group.pools[j];
                if (!a || !b) continue;

                if (pairsEvaluated >= maxPairs) {
                    pairsOverBudget++;
                    continue;
                }
                pairsEvaluated++;

                let failure: unknown = null;
                try {
                    const result = evaluateExactPair(a, b, options);
                    if (result.ok) opportunities.push(result.value);
                    else failure = result.error;
                } catch (e) {
                    failure = e;
                }
                if (failure !== null) {
                    warnings.push(`exact pair ${a.id}/${b.id} failed: ${describeError(failure)}`);
                    metrics.addPairsSkipped(1);
                }
            }
        }
    }

    if (pairsOverBudget > 0) {
        warnings.push(`pair budget ${maxPairs} reached; ${pairsOverBudget} pairs skipped`);
        metrics.addPairsSkipped(pairsOverBudget);
    }

    opportunities.sort(byNetSpreadDesc);
    const reported = opportunities.slice(0, maxReported);
    const best = reported.find((o) => o.executable) ?? null;

    for (const w of warnings) logger.debug('[exact]', w);

    return {
        mode: ArbMode.Exact,
        poolCount: pools.length,
        pairsEvaluated,
        opportunities: reported,
        best,
        warnings,
        assumptions: {
            tradeSizeToken0: options.tradeSizeToken0 ?? DEFAULT_TRADE_SIZE_TOKEN0,
            maxTickCrossings: options.maxTickCrossings ?? DEFAULT_MAX_TICK_CROSSINGS,
            maxPairs,
            gasUnits: options.gas.gasUnits.toString(),
            gasPriceWei: options.gas.gasPriceWei.toString(),
            note: 'token0 -> token1 on buy pool, then token1 -> token0 on sell pool; tick-level steps',
        },
    };
}
