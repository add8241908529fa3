// src/config.ts
// Run configuration from environment variables (load dotenv before calling)

import type { GasConfig, TickWindow } from './types.js';
import { ArbMode } from './types.js';
import { ArbError, ErrorClass } from './errors.js';
import { DEFAULT_GAS_PRICE_WEI, DEFAULT_GAS_UNITS, DEFAULT_NUMERAIRE_SYMBOLS } from './arb/gas.js';
import { DEFAULT_MAX_REPORTED, DEFAULT_TRADE_SIZE_TOKEN0 } from './arb/screen.js';
import { DEFAULT_MAX_PAIRS } from './arb/exact.js';
import { DEFAULT_MAX_FRACTION_OF_RESERVE, DEFAULT_SCAN_STEPS } from './arb/cycle.js';
import { DEFAULT_MAX_TICK_CROSSINGS } from './sim/pool.js';
import { DEFAULT_TICK_WINDOW } from './snapshot/source.js';

export interface ArbConfig {
    mode: ArbMode;
    gas: GasConfig;
    tradeSizeToken0: number;
    maxTickCrossings: number;
    maxPairs: number;
    maxReported: number;
    scanSteps: number;
    maxFractionOfReserve: number;
    /** Fee override for constant-product pools; undefined keeps each pool's own */
    feeBps: number | undefined;
    onlyProfitable: boolean;
    widenWindow: boolean;
    window: TickWindow;
}

type Env = Record<string, string | undefined>;

function raw(env: Env, name: string): string | undefined {
    const value = env[name]?.trim();
    return value === undefined || value === '' ? undefined : value;
}

function invalid(name: string, value: string, expected: string): ArbError {
    return new ArbError(ErrorClass.InvalidConfig, `${name}=${value}: expected ${expected}`);
}

function readInt(env: Env, name: string, fallback: number, min = 0): number {
    const value = raw(env, name);
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) throw invalid(name, value, `an integer >= ${min}`);
    return parsed;
}

function readFloat(env: Env, name: string, fallback: number): number {
    const value = raw(env, name);
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) throw invalid(name, value, 'a positive number');
    return parsed;
}

function readBigInt(env: Env, name: string, fallback: bigint): bigint {
    const value = raw(env, name);
    if (value === undefined) return fallback;
    if (!/^\d+$/.test(value)) throw invalid(name, value, 'a non-negative integer');
    return BigInt(value);
}

function readFlag(env: Env, name: string): boolean {
    const value = raw(env, name)?.toLowerCase();
    return value === '1' || value === 'true' || value === 'yes';
}

function readMode(env: Env): ArbMode {
    const value = raw(env, 'ARB_MODE')?.toLowerCase() ?? ArbMode.Screen;
    const modes = Object.values(ArbMode);
    for (const mode of modes) {
        if (mode === value) return mode;
    }
    throw invalid('ARB_MODE', value, modes.join('|'));
}

export function loadConfig(env: Env = process.env): ArbConfig {
    const numeraire = raw(env, 'NUMERAIRE_SYMBOLS');
    const feeBps = raw(env, 'ARB_FEE_BPS') === undefined ? undefined : readInt(env, 'ARB_FEE_BPS', 0);
    if (feeBps !== undefined && feeBps >= 10_000) {
        throw invalid('ARB_FEE_BPS', String(feeBps), 'a value below 10000');
    }

    return {
        mode: readMode(env),
        gas: {
            gasPriceWei: readBigInt(env, 'GAS_PRICE_WEI', DEFAULT_GAS_PRICE_WEI),
            gasUnits: readBigInt(env, 'ARB_GAS_UNITS', DEFAULT_GAS_UNITS),
            numeraireSymbols: numeraire === undefined
                ? DEFAULT_NUMERAIRE_SYMBOLS
                : numeraire.split(',').map((s) => s.trim().toUpperCase()).filter((s) => s !== ''),
        },
        tradeSizeToken0: readFloat(env, 'ARB_TRADE_SIZE_TOKEN0', DEFAULT_TRADE_SIZE_TOKEN0),
        maxTickCrossings: readInt(env, 'ARB_MAX_TICK_CROSS', DEFAULT_MAX_TICK_CROSSINGS),
        maxPairs: readInt(env, 'ARB_MAX_PAIRS', DEFAULT_MAX_PAIRS, 1),
        maxReported: readInt(env, 'ARB_MAX_REPORTED', DEFAULT_MAX_REPORTED, 1),
        scanSteps: readInt(env, 'ARB_SCAN_STEPS', DEFAULT_SCAN_STEPS, 1),
        maxFractionOfReserve: readFloat(env, 'ARB_MAX_FRAC_RESERVE', DEFAULT_MAX_FRACTION_OF_RESERVE),
        feeBps,
        onlyProfitable: readFlag(env, 'ARB_ONLY_PROFITABLE'),
        widenWindow: readFlag(env, 'ARB_WIDEN_WINDOW'),
        window: {
            wordsEachSide: readInt(env, 'ARB_WORDS_EACH_SIDE', DEFAULT_TICK_WINDOW.wordsEachSide, 1),
            maxTicks: readInt(env, 'ARB_MAX_TICKS', DEFAULT_TICK_WINDOW.maxTicks, 1),
        },
    };
}
