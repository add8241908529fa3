/**
 * Snapshot codec.
 *
 * JSON has no bigint, so every wide integer (sqrt price, liquidity,
 * liquidityNet, reserves) travels as a decimal string. Decoding validates
 * with zod; encoding is lossless (bigints back to strings).
 *
 * Snapshot file shape:
 *   {
 *     "tokens": [{ "address", "symbol", "decimals" }],
 *     "concentratedPools": [{ "id", "token0", "token1", "fee", "tickSpacing",
 *                             "sqrtPriceX96", "tick", "liquidity", "ticks": [{ "tick", "liquidityNet" }] }],
 *     "reservePools": [{ "id", "token0", "token1", "reserve0", "reserve1", "feeBps" }]
 *   }
 * Pool token fields are either an address listed under "tokens" or an inline token object.
 */

import { z } from 'zod';
import type { ArbitrageOpportunity, PoolState, ReservePool, TokenInfo } from '../types.js';
import { ArbError, ErrorClass, describeError } from '../errors.js';

// ============================================================================
// SCHEMAS
// ============================================================================

const IntegerString = z
    .union([
        z.string().regex(/^-?\d+$/, 'Expected an integer string'),
        z.number().int().refine(Number.isSafeInteger, 'Integer exceeds 2^53; pass it as a decimal string'),
    ])
    .transform((v) => BigInt(v));

const UnsignedIntegerString = IntegerString.refine((v) => v >= 0n, 'Expected a non-negative integer');

const AddressSchema = z
    .string()
    .trim()
    .min(1, 'Empty address')
    .transform((s) => s.toLowerCase());

export const TokenSchema = z.object({
    address: AddressSchema,
    symbol: z.string().default(''),
    decimals: z.number().int().min(0).max(77),
});

const TokenRefSchema = z.union([AddressSchema, TokenSchema]);

const TickSchema = z.object({
    tick: z.number().int(),
    liquidityNet: IntegerString,
});

export const PoolStateSchema = z.object({
    id: z.string().min(1),
    token0: TokenRefSchema,
    token1: TokenRefSchema,
    fee: z.number().int().min(0).max(999_999),
    tickSpacing: z.number().int(),
    sqrtPriceX96: UnsignedIntegerString,
    tick: z.number().int(),
    liquidity: UnsignedIntegerString,
    ticks: z.array(TickSchema).default([]),
});

export const ReservePoolSchema = z.object({
    id: z.string().min(1),
    token0: TokenRefSchema,
    token1: TokenRefSchema,
    reserve0: UnsignedIntegerString,
    reserve1: UnsignedIntegerString,
    feeBps: z.number().int().min(0).max(9_999).default(30),
});

const SnapshotSchema = z.object({
    tokens: z.array(TokenSchema).default([]),
    concentratedPools: z.array(z.unknown()).default([]),
    reservePools: z.array(z.unknown()).default([]),
});

type TokenRef = z.infer<typeof TokenRefSchema>;

/** Where decoded pools look up (and register) token metadata */
export interface TokenLookup {
    get(address: string): TokenInfo | undefined;
    set(token: TokenInfo): void;
}

export interface DecodedSnapshot {
    pools: PoolState[];
    reservePools: ReservePool[];
    warnings: string[];
}

// ============================================================================
// DECODE
// ============================================================================

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.output<T> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
        throw new ArbError(ErrorClass.InvalidSnapshot, `Invalid ${what}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

function resolveToken(ref: TokenRef, tokens: TokenLookup, poolId: string): TokenInfo {
    if (typeof ref !== 'string') {
        tokens.set(ref);
        return ref;
    }
    const known = tokens.get(ref);
    if (!known) {
        throw new ArbError(ErrorClass.InvalidSnapshot, `Pool ${poolId}: unknown token ${ref}`);
    }
    return known;
}

export function decodePoolState(raw: unknown, tokens: TokenLookup): PoolState {
    const p = parseOrThrow(PoolStateSchema, raw, 'pool state');
    return {
        id: p.id,
        token0: resolveToken(p.token0, tokens, p.id),
        token1: resolveToken(p.token1, tokens, p.id),
        fee: p.fee,
        tickSpacing: p.tickSpacing,
        sqrtPriceX96: p.sqrtPriceX96,
        tick: p.tick,
        liquidity: p.liquidity,
        ticks: [...p.ticks].sort((a, b) => a.tick - b.tick),
    };
}

export function decodeReservePool(raw: unknown, tokens: TokenLookup): ReservePool {
    const p = parseOrThrow(ReservePoolSchema, raw, 'reserve pool');
    return {
        id: p.id,
        token0: resolveToken(p.token0, tokens, p.id),
        token1: resolveToken(p.token1, tokens, p.id),
        reserve0: p.reserve0,
        reserve1: p.reserve1,
        feeBps: p.feeBps,
    };
}

/**
 * Decode a whole snapshot. A malformed top level throws; a malformed pool is
 * skipped and reported in `warnings`.
 */
export function decodeSnapshot(raw: unknown, tokens: TokenLookup): DecodedSnapshot {
    const snapshot = parseOrThrow(SnapshotSchema, raw, 'snapshot');
    const warnings: string[] = [];

    for (const token of snapshot.tokens) tokens.set(token);

    const pools: PoolState[] = [];
    snapshot.concentratedPools.forEach((entry, i) => {
        try {
            pools.push(decodePoolState(entry, tokens));
        } catch (e) {
            warnings.push(`concentratedPools[${i}] skipped: ${describeError(e)}`);
        }
    });

    const reservePools: ReservePool[] = [];
    snapshot.reservePools.forEach((entry, i) => {
        try {
            reservePools.push(decodeReservePool(entry, tokens));
        } catch (e) {
            warnings.push(`reservePools[${i}] skipped: ${describeError(e)}`);
        }
    });

    return { pools, reservePools, warnings };
}

// ============================================================================
// ENCODE
// ============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** bigint -> decimal string, non-finite number -> null, undefined fields dropped */
export function toJsonValue(value: unknown): JsonValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' || typeof value === 'boolean') return value;
    if (Array.isArray(value)) return value.map((v) => toJsonValue(v));
    if (typeof value === 'object') {
        const out: { [key: string]: JsonValue } = {};
        for (const [key, v] of Object.entries(value)) {
            if (v === undefined) continue;
            out[key] = toJsonValue(v);
        }
        return out;
    }
    return String(value);
}

export function encodeOpportunity(opp: ArbitrageOpportunity): JsonValue {
    return toJsonValue(opp);
}

/** Inverse of decodePoolState (tokens inlined) */
export function encodePoolState(pool: PoolState): JsonValue {
    return toJsonValue(pool);
}

export function encodeReservePool(pool: ReservePool): JsonValue {
    return toJsonValue(pool);
}
