// src/snapshot/source.ts
// Data-fetch seam: where pool snapshots come from.
//
// Chain/indexer access lives outside the simulation core. The core only needs
// something that satisfies PoolSource; JsonFileSource serves recorded snapshots.

import { promises as fs } from 'node:fs';
import type { PoolState, ReservePool, TickWindow, TokenInfo } from '../types.js';
import { ArbError, ErrorClass } from '../errors.js';
import { decodeSnapshot, type DecodedSnapshot, type TokenLookup } from './codec.js';

export const DEFAULT_TICK_WINDOW: TickWindow = { wordsEachSide: 8, maxTicks: 1200 };

export interface PoolSource {
    fetchPoolState(id: string, window: TickWindow): Promise<PoolState>;
    fetchReservePool(id: string): Promise<ReservePool>;
    /** Re-fetch with a larger tick window; used when a simulated leg ran off the known ticks */
    fetchWiderWindow?(id: string, current: TickWindow): Promise<PoolState>;
}

/**
 * Caller-owned token metadata cache (symbol/decimals by lower-cased address).
 * Passed into sources instead of living as module state.
 */
export class TokenMetaCache implements TokenLookup {
    private readonly tokens = new Map<string, TokenInfo>();

    get(address: string): TokenInfo | undefined {
        return this.tokens.get(address.toLowerCase());
    }

    set(token: TokenInfo): void {
        const address = token.address.toLowerCase();
        this.tokens.set(address, { ...token, address });
    }

    has(address: string): boolean {
        return this.tokens.has(address.toLowerCase());
    }

    get size(): number {
        return this.tokens.size;
    }

    clear(): void {
        this.tokens.clear();
    }
}

/** Doubles both window bounds */
export function widenTickWindow(window: TickWindow): TickWindow {
    return { wordsEachSide: window.wordsEachSide * 2, maxTicks: window.maxTicks * 2 };
}

/**
 * Restrict a pool's tick list to what a bitmap scan of `window` would return:
 * ticks whose bitmap word (compressed tick >> 8) lies within wordsEachSide of
 * the current word, then at most maxTicks of them nearest the current tick.
 */
export function applyTickWindow(pool: PoolState, window: TickWindow): PoolState {
    const spacing = Math.max(1, pool.tickSpacing);
    const wordOf = (tick: number): number => Math.floor(tick / spacing) >> 8;
    const currentWord = wordOf(pool.tick);

    let ticks = pool.ticks.filter((t) => Math.abs(wordOf(t.tick) - currentWord) <= window.wordsEachSide);

    if (ticks.length > window.maxTicks) {
        ticks = [...ticks]
            .sort((a, b) => Math.abs(a.tick - pool.tick) - Math.abs(b.tick - pool.tick) || a.tick - b.tick)
            .slice(0, Math.max(0, window.maxTicks))
            .sort((a, b) => a.tick - b.tick);
    }

    return { ...pool, ticks };
}

/**
 * Pool source backed by a snapshot JSON file (see codec.ts for the shape).
 * The file is read once, on first use.
 */
export class JsonFileSource implements PoolSource {
    private loaded: Promise<DecodedSnapshot> | null = null;

    constructor(
        private readonly filePath: string,
        private readonly tokens: TokenMetaCache,
    ) {}

    load(): Promise<DecodedSnapshot> {
        if (!this.loaded) {
            this.loaded = this.read();
        }
        return this.loaded;
    }

    private async read(): Promise<DecodedSnapshot> {
        const text = await fs.readFile(this.filePath, 'utf8');
        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (e) {
            throw new ArbError(
                ErrorClass.InvalidSnapshot,
                `${this.filePath}: ${e instanceof Error ? e.message : String(e)}`,
            );
        }
        return decodeSnapshot(raw, this.tokens);
    }

    async listPoolIds(): Promise<string[]> {
        const snapshot = await this.load();
        return snapshot.pools.map((p) => p.id);
    }

    async listReservePoolIds(): Promise<string[]> {
        const snapshot = await this.load();
        return snapshot.reservePools.map((p) => p.id);
    }

    async fetchPoolState(id: string, window: TickWindow): Promise<PoolState> {
        const snapshot = await this.load();
        const pool = snapshot.pools.find((p) => p.id === id);
        if (!pool) {
            throw new ArbError(ErrorClass.InvalidSnapshot, `Unknown pool ${id}`);
        }
        return applyTickWindow(pool, window);
    }

    async fetchWiderWindow(id: string, current: TickWindow): Promise<PoolState> {
        return this.fetchPoolState(id, widenTickWindow(current));
    }

    async fetchReservePool(id: string): Promise<ReservePool> {
        const snapshot = await this.load();
        const pool = snapshot.reservePools.find((p) => p.id === id);
        if (!pool) {
            throw new ArbError(ErrorClass.InvalidSnapshot, `Unknown reserve pool ${id}`);
        }
        return pool;
    }
}
