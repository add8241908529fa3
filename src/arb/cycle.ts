/**
 * Constant-product (x*y=k) two-pool cycle search.
 *
 * No closed-form optimum: trade sizes are scanned on a geometric grid
 *   ceiling = floor(shallowerReserveIn * maxFractionOfReserve)
 *   floor   = max(1, ceiling / 10000)
 *   amount_i = floor(floor * exp(ln(ceiling / floor) * i / (steps - 1)))
 * and the most profitable point wins. The ceiling keeps sizes to a small share
 * of the reserves; whole-reserve trades are never considered.
 */

import type {
    ArbitrageReport,
    ConstantProductOpportunity,
    CycleResult,
    GasConfig,
    ReservePool,
} from '../types.js';
import { ArbMode } from '../types.js';
import { describeError } from '../errors.js';
import { metrics } from '../instrument/metrics.js';
import { simulateCycle } from '../sim/math/constantProduct.js';
import { logger } from '../utils/logger.js';
import { fromRaw, fromRawNumber, toRaw } from '../utils/units.js';
import { estimateGas } from './gas.js';
import { groupByPair } from './pairIndex.js';
import { DEFAULT_MAX_REPORTED } from './screen.js';

export const DEFAULT_SCAN_STEPS = 18;
export const MIN_SCAN_STEPS = 6;
export const DEFAULT_MAX_FRACTION_OF_RESERVE = 0.003;

export interface ScanOptions {
    startToken: CycleResult['startToken'];
    steps?: number;
    maxFractionOfReserve?: number;
}

export interface ConstantProductOptions {
    gas: GasConfig;
    steps?: number;
    maxFractionOfReserve?: number;
    /** Overrides every pool's own feeBps */
    feeBps?: number;
    onlyProfitable?: boolean;
    maxReported?: number;
}

export interface PairCycles {
    token0: CycleResult | null;
    token1: CycleResult | null;
}

function startReserve(pool: ReservePool, startToken: CycleResult['startToken']): bigint {
    return startToken === 'token0' ? pool.reserve0 : pool.reserve1;
}

/** Geometric grid between floor and ceiling, both ends included */
export function geometricAmounts(ceiling: bigint, steps: number): bigint[] {
    if (ceiling <= 0n) return [];
    const n = Math.max(MIN_SCAN_STEPS, Math.floor(steps));
    const floor = ceiling / 10_000n > 1n ? ceiling / 10_000n : 1n;
    const ratio = Math.log(Number(ceiling) / Number(floor));

    const amounts: bigint[] = [];
    for (let i = 0; i < n; i++) {
        if (i === n - 1) {
            amounts.push(ceiling);
            continue;
        }
        const amount = BigInt(Math.floor(Number(floor) * Math.exp((ratio * i) / (n - 1))));
        if (amount > 0n) amounts.push(amount);
    }
    return amounts;
}

/**
 * Best profitable trade size for one ordered pool pair and start token.
 * Returns null when no scanned size is profitable.
 */
export function scanBestCycle(buy: ReservePool, sell: ReservePool, options: ScanOptions): CycleResult | null {
    const fraction = options.maxFractionOfReserve ?? DEFAULT_MAX_FRACTION_OF_RESERVE;
    const steps = options.steps ?? DEFAULT_SCAN_STEPS;

    const buyReserve = startReserve(buy, options.startToken);
    const sellReserve = startReserve(sell, options.startToken);
    const shallower = buyReserve < sellReserve ? buyReserve : sellReserve;
    if (shallower <= 0n || !(fraction > 0)) return null;

    const ceiling = BigInt(fromRaw(shallower, 0).mul(fraction).floor().toFixed(0));

    let best: CycleResult | null = null;
    for (const amountIn of geometricAmounts(ceiling, steps)) {
        const result = simulateCycle(amountIn, buy, sell, options.startToken);
        if (result.profit > (best?.profit ?? 0n)) {
            best = result;
        }
    }
    return best;
}

function better(a: CycleResult | null, b: CycleResult | null): CycleResult | null {
    if (!a) return b;
    if (!b) return a;
    return b.profit > a.profit ? b : a;
}

/** Both orderings, both start tokens */
export function bestCycleForPair(
    a: ReservePool,
    b: ReservePool,
    options: Omit<ScanOptions, 'startToken'> = {},
): PairCycles {
    let token0: CycleResult | null = null;
    let token1: CycleResult | null = null;

    for (const [buy, sell] of [[a, b], [b, a]] as const) {
        token0 = better(token0, scanBestCycle(buy, sell, { ...options, startToken: 'token0' }));
        token1 = better(token1, scanBestCycle(buy, sell, { ...options, startToken: 'token1' }));
    }
    return { token0, token1 };
}

/** token1 per token0 in human units */
function humanSpotPrice(pool: ReservePool): number {
    if (pool.reserve0 <= 0n) return 0;
    return fromRaw(pool.reserve1, pool.token1.decimals).div(fromRaw(pool.reserve0, pool.token0.decimals)).toNumber();
}

function rankValue(opp: ConstantProductOpportunity): bigint {
    return opp.profitAfterGasToken0Raw ?? opp.bestToken0Cycle?.profit ?? 0n;
}

function evaluateGroup(
    pools: ReservePool[],
    options: ConstantProductOptions,
): { opportunity: ConstantProductOpportunity | null; pairs: number; warning?: string } {
    const priced = pools
        .map((pool) => ({ pool, price: humanSpotPrice(pool) }))
        .sort((x, y) => x.price - y.price);
    const low = priced[0];
    const high = priced[priced.length - 1];
    if (!low || !high) return { opportunity: null, pairs: 0 };
    if (!(low.price > 0)) {
        return { opportunity: null, pairs: 0, warning: `spot price unavailable for ${low.pool.id}` };
    }

    const scan = { steps: options.steps, maxFractionOfReserve: options.maxFractionOfReserve };
    let bestToken0Cycle: CycleResult | null = null;
    let bestToken1Cycle: CycleResult | null = null;
    let pairs = 0;

    for (let i = 0; i < pools.length; i++) {
        for (let j = i + 1; j < pools.length; j++) {
            const a = pools[i];
            const b = pools[j];
            if (!a || !b) continue;
            pairs++;
            const cycles = bestCycleForPair(a, b, scan);
            bestToken0Cycle = better(bestToken0Cycle, cycles.token0);
            bestToken1Cycle = better(bestToken1Cycle, cycles.token1);
        }
    }

    const { token0, token1 } = low.pool;
    const buyPool = pools.find((p) => p.id === bestToken0Cycle?.buyPool) ?? low.pool;
    const sellPool = pools.find((p) => p.id === bestToken0Cycle?.sellPool) ?? high.pool;
    const tradeSizeToken0 = bestToken0Cycle ? fromRawNumber(bestToken0Cycle.amountIn, token0.decimals) : 0;
    const gas = estimateGas(options.gas, token0.symbol, token1.symbol, low.price, tradeSizeToken0);

    let profitAfterGasToken0Raw: bigint | null = null;
    if (gas.gasCostToken0 !== null) {
        const profit = bestToken0Cycle?.profit ?? 0n;
        profitAfterGasToken0Raw = profit - toRaw(gas.gasCostToken0, token0.decimals);
    }

    const executable = profitAfterGasToken0Raw !== null
        ? profitAfterGasToken0Raw > 0n
        : bestToken0Cycle !== null;

    return {
        pairs,
        opportunity: {
            strategy: 'constant-product',
            pairToken0: token0.address,
            pairToken1: token1.address,
            symbol0: token0.symbol,
            symbol1: token1.symbol,
            buyPool: buyPool.id,
            sellPool: sellPool.id,
            lowPricePool: low.pool.id,
            highPricePool: high.pool.id,
            lowPrice: low.price,
            highPrice: high.price,
            grossSpreadBps: ((high.price - low.price) / low.price) * 10_000,
            feeBps: buyPool.feeBps + sellPool.feeBps,
            gas,
            bestToken0Cycle,
            bestToken1Cycle,
            profitAfterGasToken0Raw,
            executable,
        },
    };
}

export function constantProductOpportunities(
    pools: readonly ReservePool[],
    options: ConstantProductOptions,
): ArbitrageReport<ConstantProductOpportunity> {
    const warnings: string[] = [];
    const usable: ReservePool[] = [];

    for (const pool of pools) {
        if (pool.reserve0 <= 0n || pool.reserve1 <= 0n) {
            warnings.push(`pool has empty reserves: ${pool.id}`);
            continue;
        }
        usable.push(options.feeBps === undefined ? pool : { ...pool, feeBps: options.feeBps });
    }

    const { groups, skipped } = groupByPair(usable);
    warnings.push(...skipped);
    metrics.addPoolsSkipped(pools.length - usable.length + skipped.length);

    let opportunities: ConstantProductOpportunity[] = [];
    let pairsEvaluated = 0;

    for (const group of groups) {
        try {
            const { opportunity, pairs, warning } = evaluateGroup(group.pools, options);
            pairsEvaluated += pairs;
            if (opportunity) opportunities.push(opportunity);
            if (warning) warnings.push(`pair ${group.key} skipped: ${warning}`);
        } catch (e) {
            warnings.push(`pair ${group.key} failed: ${describeError(e)}`);
        }
    }

    opportunities.sort((x, y) => {
        const byProfit = rankValue(y) - rankValue(x);
        if (byProfit !== 0n) return byProfit > 0n ? 1 : -1;
        return y.grossSpreadBps - x.grossSpreadBps;
    });

    if (options.onlyProfitable) {
        opportunities = opportunities.filter((o) => o.executable);
    }

    const reported = opportunities.slice(0, options.maxReported ?? DEFAULT_MAX_REPORTED);
    for (const w of warnings) logger.debug('[constant-product]', w);

    return {
        mode: ArbMode.ConstantProduct,
        poolCount: pools.length,
        pairsEvaluated,
        opportunities: reported,
        best: reported[0] ?? null,
        warnings,
        assumptions: {
            steps: Math.max(MIN_SCAN_STEPS, options.steps ?? DEFAULT_SCAN_STEPS),
            maxFractionOfReserve: options.maxFractionOfReserve ?? DEFAULT_MAX_FRACTION_OF_RESERVE,
            feeBps: options.feeBps ?? 'per pool',
            onlyProfitable: options.onlyProfitable ?? false,
            gasUnits: options.gas.gasUnits.toString(),
            gasPriceWei: options.gas.gasPriceWei.toString(),
            note: 'geometric trade-size scan; bounded heuristic, not a closed-form optimum',
        },
    };
}
