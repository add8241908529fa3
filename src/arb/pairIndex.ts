import type { TokenInfo } from '../types.js';

/** Anything that trades token0 against token1 */
export interface PairMember {
    id: string;
    token0: TokenInfo;
    token1: TokenInfo;
}

export interface PairGroup<P extends PairMember> {
    key: string;
    token0: TokenInfo;
    token1: TokenInfo;
    pools: P[];
}

function normalizeAddress(address: string): string {
    return address.trim().toLowerCase();
}

/**
 * Pool token order matters (prices are token1 per token0), so the key keeps
 * (token0, token1) as given instead of sorting the two addresses.
 */
export function pairKey(token0: string, token1: string): string {
    return `${normalizeAddress(token0)}|${normalizeAddress(token1)}`;
}

function hasTokenIdentity(pool: PairMember): boolean {
    return normalizeAddress(pool.token0.address) !== '' && normalizeAddress(pool.token1.address) !== '';
}

/**
 * Pair -> pools lookup; a pool whose tokens change moves to its new pair.
 */
export class PairIndex<P extends PairMember> {
    private readonly pairs = new Map<string, Map<string, P>>();
    private readonly pools = new Map<string, string>();

    /** Returns false when the pool has no token identity (not indexed) */
    upsertPool(pool: P): boolean {
        if (!hasTokenIdentity(pool)) {
            this.removePool(pool.id);
            return false;
        }

        const key = pairKey(pool.token0.address, pool.token1.address);
        const existing = this.pools.get(pool.id);
        if (existing !== undefined && existing !== key) {
            this.removePool(pool.id);
        }

        let members = this.pairs.get(key);
        if (!members) {
            members = new Map<string, P>();
            this.pairs.set(key, members);
        }
        members.set(pool.id, pool);
        this.pools.set(pool.id, key);
        return true;
    }

    removePool(poolId: string): void {
        const key = this.pools.get(poolId);
        if (key === undefined) return;

        const members = this.pairs.get(key);
        if (members) {
            members.delete(poolId);
            if (members.size === 0) this.pairs.delete(key);
        }
        this.pools.delete(poolId);
    }

    /** Pairs with at least `minPools` pools, in insertion order */
    groups(minPools = 2): PairGroup<P>[] {
        const out: PairGroup<P>[] = [];
        for (const [key, members] of this.pairs) {
            if (members.size < minPools) continue;
            const pools = [...members.values()];
            const first = pools[0];
            if (!first) continue;
            out.push({ key, token0: first.token0, token1: first.token1, pools });
        }
        return out;
    }
}

/**
 * Group pools by (token0, token1). Pools without token identity are reported
 * in `skipped` instead.
 */
export function groupByPair<P extends PairMember>(
    pools: readonly P[],
    minPools = 2,
): { groups: PairGroup<P>[]; skipped: string[] } {
    const index = new PairIndex<P>();
    const skipped: string[] = [];

    for (const pool of pools) {
        if (!index.upsertPool(pool)) {
            skipped.push(`pool missing token0/token1: ${pool.id}`);
        }
    }

    return { groups: index.groups(minPools), skipped };
}
