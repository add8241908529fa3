/**
 * Spot-price screen over concentrated-liquidity pools.
 *
 * Cheap pre-filter: compares spot prices only and ignores slippage.
 *
 *   gross_bps = (priceHigh - priceLow) / priceLow * 10000
 *   fee_bps   = (feeLow + feeHigh) / 100          (fees in ppm)
 *   net_bps   = gross_bps - fee_bps - gas_bps     (gas_bps only with a numeraire side)
 */

import type { ArbitrageReport, GasConfig, PoolState, ScreenOpportunity } from '../types.js';
import { ArbMode } from '../types.js';
import { describeError } from '../errors.js';
import { metrics } from '../instrument/metrics.js';
import { spotPriceFromSqrt } from '../sim/math/tickMath.js';
import { feePpmToBps } from '../utils/units.js';
import { logger } from '../utils/logger.js';
import { estimateGas } from './gas.js';
import { groupByPair } from './pairIndex.js';

export const DEFAULT_TRADE_SIZE_TOKEN0 = 10_000;
export const DEFAULT_MAX_REPORTED = 25;

export interface ScreenOptions {
    gas: GasConfig;
    tradeSizeToken0?: number;
    maxReported?: number;
}

interface PricedPool {
    pool: PoolState;
    price: number;
}

function pricePool(pool: PoolState, warnings: string[]): PricedPool | null {
    let price: number;
    try {
        price = spotPriceFromSqrt(pool.sqrtPriceX96, pool.token0.decimals, pool.token1.decimals);
    } catch (e) {
        warnings.push(`pool price unavailable: ${pool.id} (${describeError(e)})`);
        return null;
    }
    if (!Number.isFinite(price) || price <= 0) {
        warnings.push(`pool missing price_token1_per_token0: ${pool.id}`);
        return null;
    }
    return { pool, price };
}

function screenPair(
    low: PricedPool,
    high: PricedPool,
    tradeSizeToken0: number,
    gas: GasConfig,
): ScreenOpportunity | null {
    const grossSpreadBps = ((high.price - low.price) / low.price) * 10_000;
    if (!(grossSpreadBps > 0)) return null;

    const feeBps = feePpmToBps(low.pool.fee) + feePpmToBps(high.pool.fee);
    // low-side price is good enough for the gas conversion
    const gasEstimate = estimateGas(gas, low.pool.token0.symbol, low.pool.token1.symbol, low.price, tradeSizeToken0);

    const netSpreadBpsWithoutGas = grossSpreadBps - feeBps;
    const netSpreadBps = gasEstimate.gasBps === null
        ? netSpreadBpsWithoutGas
        : netSpreadBpsWithoutGas - gasEstimate.gasBps;

    return {
        strategy: 'screen',
        pairToken0: low.pool.token0.address,
        pairToken1: low.pool.token1.address,
        symbol0: low.pool.token0.symbol,
        symbol1: low.pool.token1.symbol,
        buyPool: low.pool.id,
        sellPool: high.pool.id,
        buyFee: low.pool.fee,
        sellFee: high.pool.fee,
        buyLiquidity: low.pool.liquidity,
        sellLiquidity: high.pool.liquidity,
        buyPrice: low.price,
        sellPrice: high.price,
        tradeSizeToken0,
        grossSpreadBps,
        feeBps,
        netSpreadBpsWithoutGas,
        netSpreadBps,
        gas: gasEstimate,
        executable: netSpreadBps > 0,
    };
}

export function screenOpportunities(
    pools: readonly PoolState[],
    options: ScreenOptions,
): ArbitrageReport<ScreenOpportunity> {
    const tradeSizeToken0 = options.tradeSizeToken0 ?? DEFAULT_TRADE_SIZE_TOKEN0;
    const maxReported = options.maxReported ?? DEFAULT_MAX_REPORTED;
    const warnings: string[] = [];

    const priced: PoolState[] = [];
    const prices = new Map<string, number>();
    for (const pool of pools) {
        const p = pricePool(pool, warnings);
        if (!p) continue;
        priced.push(pool);
        prices.set(pool.id, p.price);
    }

    const { groups, skipped } = groupByPair(priced);
    warnings.push(...skipped);
    metrics.addPoolsSkipped(warnings.length);

    const opportunities: ScreenOpportunity[] = [];
    let pairsEvaluated = 0;

    for (const group of groups) {
        const sorted: PricedPool[] = group.pools
            .map((pool) => ({ pool, price: prices.get(pool.id) ?? 0 }))
            .sort((a, b) => a.price - b.price);

        for (let i = 0; i < sorted.length; i++) {
            for (let j = i + 1; j < sorted.length; j++) {
                const low = sorted[i];
                const high = sorted[j];
                if (!low || !high) continue;
                pairsEvaluated++;
                const opp = screenPair(low, high, tradeSizeToken0, options.gas);
                if (opp) opportunities.push(opp);
            }
        }
    }

    opportunities.sort((a, b) => b.netSpreadBps - a.netSpreadBps);
    const reported = opportunities.slice(0, maxReported);

    for (const w of warnings) logger.debug('[screen]', w);

    return {
        mode: ArbMode.Screen,
        poolCount: pools.length,
        pairsEvaluated,
        opportunities: reported,
        best: reported[0] ?? null,
        warnings,
        assumptions: {
            tradeSizeToken0,
            gasUnits: options.gas.gasUnits.toString(),
            gasPriceWei: options.gas.gasPriceWei.toString(),
            note: 'spot screen; no tick-level simulation, slippage ignored',
        },
    };
}
