/**
 * Arbitrage Engine
 *
 * Dispatches a search request to the strategy selected by `mode`.
 * Each mode has its own pool type and options; nothing is inferred from
 * argument shapes at runtime.
 */

import type {
    ArbitrageReport,
    ConstantProductOpportunity,
    ExactOpportunity,
    PoolState,
    ReservePool,
    ScreenOpportunity,
} from '../types.js';
import { ArbMode } from '../types.js';
import { metrics } from '../instrument/metrics.js';
import { logger } from '../utils/logger.js';
import { constantProductOpportunities, type ConstantProductOptions } from './cycle.js';
import { exactOpportunities, type ExactOptions } from './exact.js';
import { screenOpportunities, type ScreenOptions } from './screen.js';

export type ArbitrageRequest =
    | { mode: typeof ArbMode.Screen; pools: readonly PoolState[]; options: ScreenOptions }
    | { mode: typeof ArbMode.Exact; pools: readonly PoolState[]; options: ExactOptions }
    | { mode: typeof ArbMode.ConstantProduct; pools: readonly ReservePool[]; options: ConstantProductOptions };

export type ArbitrageOutcome =
    | { mode: typeof ArbMode.Screen; report: ArbitrageReport<ScreenOpportunity>; elapsedMs: number }
    | { mode: typeof ArbMode.Exact; report: ArbitrageReport<ExactOpportunity>; elapsedMs: number }
    | {
        mode: typeof ArbMode.ConstantProduct;
        report: ArbitrageReport<ConstantProductOpportunity>;
        elapsedMs: number;
    };

function elapsedMsSince(startNs: bigint): number {
    return Number(process.hrtime.bigint() - startNs) / 1e6;
}

function record(mode: ArbitrageRequest['mode'], report: ArbitrageReport, startNs: bigint): number {
    const elapsedMs = elapsedMsSince(startNs);
    metrics.addPairsEvaluated(report.pairsEvaluated);
    metrics.recordRun(mode, elapsedMs);
    logger.debug(
        `[engine] ${mode}: ${report.poolCount} pools, ${report.pairsEvaluated} pairs, `
        + `${report.opportunities.length} reported, ${report.warnings.length} warnings in ${elapsedMs.toFixed(2)}ms`,
    );
    return elapsedMs;
}

export function runArbitrage(request: ArbitrageRequest): ArbitrageOutcome {
    const startNs = process.hrtime.bigint();

    switch (request.mode) {
        case ArbMode.Screen: {
            const report = screenOpportunities(request.pools, request.options);
            return { mode: request.mode, report, elapsedMs: record(request.mode, report, startNs) };
        }
        case ArbMode.Exact: {
            const report = exactOpportunities(request.pools, request.options);
            return { mode: request.mode, report, elapsedMs: record(request.mode, report, startNs) };
        }
        case ArbMode.ConstantProduct: {
            const report = constantProductOpportunities(request.pools, request.options);
            return { mode: request.mode, report, elapsedMs: record(request.mode, report, startNs) };
        }
    }
}
