/**
 * Liquidity profile around the current tick.
 *
 * Active liquidity is constant between two initialized ticks and jumps by
 * liquidityNet when one is crossed (+ going up, - going down). The profile
 * is the list of those constant segments, used for gap detection and to
 * explain slippage.
 */

import type { LiquiditySegment, TickLiquidity } from '../types.js';
import { priceAtTick } from './math/tickMath.js';

export const DEFAULT_MAX_SEGMENTS = 300;
export const DEFAULT_GAP_PERCENTILE = 0.1;

// Significant digits kept in segment price strings
const PRICE_DIGITS = 12;

export interface ProfileInput {
    currentTick: number;
    tickSpacing: number;
    currentLiquidity: bigint;
    ticks: readonly TickLiquidity[];
    decimals0: number;
    decimals1: number;
    maxSegments?: number;
}

export interface GapOptions {
    /** Explicit threshold; overrides percentile */
    minLiquidity?: bigint;
    percentile?: number;
}

function formatPrice(tick: number, decimals0: number, decimals1: number): string {
    return priceAtTick(tick, decimals0, decimals1).toSignificantDigits(PRICE_DIGITS).toString();
}

function segment(
    tickLower: number,
    tickUpper: number,
    liquidity: bigint,
    decimals0: number,
    decimals1: number,
): LiquiditySegment {
    return {
        tickLower,
        tickUpper,
        liquidity,
        priceLower: formatPrice(tickLower, decimals0, decimals1),
        priceUpper: formatPrice(tickUpper, decimals0, decimals1),
    };
}

/**
 * Walk up from the current tick, then down, one segment per boundary pair.
 * Both walks share the maxSegments budget (upward walk first).
 */
export function buildProfile(input: ProfileInput): LiquiditySegment[] {
    const { currentTick, tickSpacing, currentLiquidity, decimals0, decimals1 } = input;
    const maxSegments = input.maxSegments ?? DEFAULT_MAX_SEGMENTS;

    if (tickSpacing <= 0 || input.ticks.length === 0) return [];

    const sorted = [...input.ticks].sort((a, b) => a.tick - b.tick);

    // first boundary strictly above the current tick
    let idx = sorted.findIndex((t) => t.tick > currentTick);
    if (idx === -1) idx = sorted.length;

    const segments: LiquiditySegment[] = [];

    // Upward: [last, t) at upLiquidity, then += liquidityNet
    let upLiquidity = currentLiquidity;
    let last = currentTick;
    for (const boundary of sorted.slice(idx)) {
        if (segments.length >= maxSegments) break;
        if (boundary.tick <= last) continue;
        segments.push(segment(last, boundary.tick, upLiquidity, decimals0, decimals1));
        upLiquidity += boundary.liquidityNet;
        last = boundary.tick;
    }

    // Downward: [t, last) at downLiquidity, then -= liquidityNet
    let downLiquidity = currentLiquidity;
    last = currentTick;
    for (const boundary of sorted.slice(0, idx).reverse()) {
        if (segments.length >= maxSegments) break;
        if (boundary.tick >= last) continue;
        segments.push(segment(boundary.tick, last, downLiquidity, decimals0, decimals1));
        downLiquidity -= boundary.liquidityNet;
        last = boundary.tick;
    }

    return segments.sort((a, b) => a.tickLower - b.tickLower);
}

/**
 * Segments whose liquidity is at or below the threshold.
 * Threshold = minLiquidity, or the percentile-th smallest segment liquidity.
 */
export function detectGaps(profile: readonly LiquiditySegment[], options: GapOptions = {}): LiquiditySegment[] {
    if (profile.length === 0) return [];

    let threshold = options.minLiquidity;
    if (threshold === undefined) {
        const percentile = options.percentile ?? DEFAULT_GAP_PERCENTILE;
        const sorted = profile.map((s) => s.liquidity).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
        const k = Math.max(0, Math.min(sorted.length - 1, Math.floor(sorted.length * percentile)));
        threshold = sorted[k] ?? 0n;
    }

    const limit = threshold;
    return profile.filter((s) => s.liquidity <= limit);
}
