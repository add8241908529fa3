/**
 * SNAPSHOT SCAN
 *
 * Runs one arbitrage search over a recorded pool snapshot and prints the
 * ranked opportunities.
 *
 * Run:  npm run scan -- [snapshot.json] [--out report.json]
 * Mode: ARB_MODE=screen|exact|constant-product (see src/config.ts for the rest)
 */

import 'dotenv/config';
import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { ArbitrageOpportunity, ArbitrageReport, ExactOpportunity } from '../types.js';
import { ArbMode } from '../types.js';
import { describeError } from '../errors.js';
import { loadConfig, type ArbConfig } from '../config.js';
import { runArbitrage, type ArbitrageOutcome } from '../arb/engine.js';
import { exactOpportunities, ranOffKnownTicks, widenExactPair } from '../arb/exact.js';
import { metrics } from '../instrument/metrics.js';
import { JsonFileSource, TokenMetaCache } from '../snapshot/source.js';
import { encodeOpportunity, toJsonValue } from '../snapshot/codec.js';
import { logger, logOpportunity } from '../utils/logger.js';

const DEFAULT_SNAPSHOT = fileURLToPath(new URL('../../fixtures/snapshot.example.json', import.meta.url));

// ============================================================================
// ARGS
// ============================================================================

interface ScanArgs {
    snapshotPath: string;
    outPath: string | null;
}

function parseArgs(argv: readonly string[]): ScanArgs {
    let snapshotPath = DEFAULT_SNAPSHOT;
    let outPath: string | null = null;
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--out') {
            outPath = argv[++i] ?? null;
        } else if (arg !== undefined) {
            snapshotPath = arg;
        }
    }
    return { snapshotPath, outPath };
}

// ============================================================================
// EXACT MODE WITH WINDOW WIDENING
// ============================================================================

/** Batch exact search, then one wider fetch for each pair that ran off its ticks */
async function exactThroughSource(
    source: JsonFileSource,
    config: ArbConfig,
): Promise<ArbitrageReport<ExactOpportunity>> {
    const ids = await source.listPoolIds();
    const pools = await Promise.all(ids.map((id) => source.fetchPoolState(id, config.window)));
    const options = {
        gas: config.gas,
        tradeSizeToken0: config.tradeSizeToken0,
        maxTickCrossings: config.maxTickCrossings,
        maxPairs: config.maxPairs,
        maxReported: config.maxReported,
        window: config.window,
    };

    // first pass keeps the budget, ordering and warnings of the batch search
    const report = exactOpportunities(pools, options);
    const refined: ExactOpportunity[] = [];
    let widened = 0;
    for (const opp of report.opportunities) {
        if (!ranOffKnownTicks(opp)) {
            refined.push(opp);
            continue;
        }
        widened++;
        const result = await widenExactPair(source, opp, options);
        if (result.ok) {
            refined.push(result.value);
        } else {
            report.warnings.push(`exact pair ${opp.buyPool}/${opp.sellPool} failed: ${describeError(result.error)}`);
        }
    }

    refined.sort((a, b) => {
        if (a.executable && b.executable) return b.netSpreadBps - a.netSpreadBps;
        return Number(b.executable) - Number(a.executable);
    });
    logger.debug(`[scan] ${widened} exact pairs re-run on a wider tick window`);
    return { ...report, opportunities: refined, best: refined.find((o) => o.executable) ?? null };
}

async function runScan(source: JsonFileSource, config: ArbConfig): Promise<ArbitrageOutcome> {
    switch (config.mode) {
        case ArbMode.Screen: {
            const ids = await source.listPoolIds();
            const pools = await Promise.all(ids.map((id) => source.fetchPoolState(id, config.window)));
            return runArbitrage({
                mode: ArbMode.Screen,
                pools,
                options: { gas: config.gas, tradeSizeToken0: config.tradeSizeToken0, maxReported: config.maxReported },
            });
        }
        case ArbMode.Exact: {
            if (config.widenWindow) {
                const startNs = process.hrtime.bigint();
                const report = await exactThroughSource(source, config);
                return { mode: ArbMode.Exact, report, elapsedMs: Number(process.hrtime.bigint() - startNs) / 1e6 };
            }
            const ids = await source.listPoolIds();
            const pools = await Promise.all(ids.map((id) => source.fetchPoolState(id, config.window)));
            return runArbitrage({
                mode: ArbMode.Exact,
                pools,
                options: {
                    gas: config.gas,
                    tradeSizeToken0: config.tradeSizeToken0,
                    maxTickCrossings: config.maxTickCrossings,
                    maxPairs: config.maxPairs,
                    maxReported: config.maxReported,
                },
            });
        }
        case ArbMode.ConstantProduct: {
            const ids = await source.listReservePoolIds();
            const pools = await Promise.all(ids.map((id) => source.fetchReservePool(id)));
            return runArbitrage({
                mode: ArbMode.ConstantProduct,
                pools,
                options: {
                    gas: config.gas,
                    steps: config.scanSteps,
                    maxFractionOfReserve: config.maxFractionOfReserve,
                    feeBps: config.feeBps,
                    onlyProfitable: config.onlyProfitable,
                    maxReported: config.maxReported,
                },
            });
        }
    }
}

// ============================================================================
// MAIN
// ============================================================================

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));
    const config = loadConfig();
    const tokens = new TokenMetaCache();
    const source = new JsonFileSource(args.snapshotPath, tokens);

    const snapshot = await source.load();
    for (const w of snapshot.warnings) logger.warn(w);
    logger.info(
        `Snapshot ${args.snapshotPath}: ${snapshot.pools.length} concentrated, `
        + `${snapshot.reservePools.length} reserve pools, ${tokens.size} tokens`,
    );

    const outcome = await runScan(source, config);
    const { report } = outcome;
    const opportunities: readonly ArbitrageOpportunity[] = report.opportunities;

    logger.info(
        `Mode ${outcome.mode}: ${report.pairsEvaluated} pairs, ${opportunities.length} reported `
        + `in ${outcome.elapsedMs.toFixed(2)}ms`,
    );
    for (const opp of opportunities) logOpportunity(opp);
    for (const w of report.warnings) logger.warn(w);
    if (!report.best) logger.info('No executable opportunity');

    const m = metrics.snapshot();
    logger.info(`Sims: ${m.simsExecuted} executed, ${m.simsIncomplete} incomplete (${metrics.simCompletionRate()}% complete)`);

    if (args.outPath) {
        const body = {
            mode: report.mode,
            poolCount: report.poolCount,
            pairsEvaluated: report.pairsEvaluated,
            best: report.best ? encodeOpportunity(report.best) : null,
            opportunities: opportunities.map((o) => encodeOpportunity(o)),
            warnings: report.warnings,
            assumptions: toJsonValue(report.assumptions),
        };
        await fs.writeFile(args.outPath, JSON.stringify(body, null, 2) + '\n');
        logger.info(`Report written to ${args.outPath}`);
    }
}

main().catch((e: unknown) => {
    logger.error(describeError(e));
    process.exitCode = 1;
});
