/**
 * Metrics Collection
 *
 * Process-local counters for simulation and search runs.
 */

import type { ArbMode } from '../types.js';

export interface MetricsSnapshot {
    simsExecuted: bigint;
    simsIncomplete: bigint;
    pairsEvaluated: bigint;
    pairsSkipped: bigint;
    poolsSkipped: bigint;
    runs: Record<ArbMode, bigint>;
    lastRunMs: number;
}

/**
 * Global metrics instance
 */
class MetricsCollector {
    // Simulation
    simsExecuted = 0n;
    simsIncomplete = 0n;

    // Search
    pairsEvaluated = 0n;
    pairsSkipped = 0n;
    poolsSkipped = 0n;

    private runs: Record<ArbMode, bigint> = { 'screen': 0n, 'exact': 0n, 'constant-product': 0n };
    private lastRunMs = 0;

    // --- Increment methods ---

    incrSimExecuted(): void { this.simsExecuted++; }
    incrSimIncomplete(): void { this.simsIncomplete++; }

    addPairsEvaluated(n: number): void { this.pairsEvaluated += BigInt(n); }
    addPairsSkipped(n: number): void { this.pairsSkipped += BigInt(n); }
    addPoolsSkipped(n: number): void { this.poolsSkipped += BigInt(n); }

    recordRun(mode: ArbMode, elapsedMs: number): void {
        this.runs[mode]++;
        this.lastRunMs = elapsedMs;
    }

    // --- Computed metrics ---

    simCompletionRate(): number {
        if (this.simsExecuted === 0n) return 100;
        const complete = this.simsExecuted - this.simsIncomplete;
        return Number((complete * 10000n) / this.simsExecuted) / 100;
    }

    // --- Snapshot ---

    snapshot(): MetricsSnapshot {
        return {
            simsExecuted: this.simsExecuted,
            simsIncomplete: this.simsIncomplete,
            pairsEvaluated: this.pairsEvaluated,
            pairsSkipped: this.pairsSkipped,
            poolsSkipped: this.poolsSkipped,
            runs: { ...this.runs },
            lastRunMs: this.lastRunMs,
        };
    }

    reset(): void {
        this.simsExecuted = 0n;
        this.simsIncomplete = 0n;
        this.pairsEvaluated = 0n;
        this.pairsSkipped = 0n;
        this.poolsSkipped = 0n;
        this.runs = { 'screen': 0n, 'exact': 0n, 'constant-product': 0n };
        this.lastRunMs = 0;
    }
}

export const metrics = new MetricsCollector();
