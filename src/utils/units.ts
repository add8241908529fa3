// src/utils/units.ts
// Human <-> raw token amount conversion (decimal.js, no float drift)

import { Decimal } from 'decimal.js';
import { ArbError, ErrorClass } from '../errors.js';

const Units = Decimal.clone({ precision: 80, rounding: Decimal.ROUND_HALF_EVEN });

function assertDecimals(decimals: number): void {
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 77) {
        throw new ArbError(ErrorClass.InvalidConfig, `Invalid token decimals ${decimals}`);
    }
}

/** 10000 USDC (6) -> 10000000000n; rounds half to even */
export function toRaw(amount: number | string, decimals: number): bigint {
    assertDecimals(decimals);
    let value: Decimal;
    try {
        value = new Units(amount);
    } catch (e) {
        throw new ArbError(ErrorClass.InvalidConfig, `Amount ${amount}: ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!value.isFinite()) {
        throw new ArbError(ErrorClass.InvalidConfig, `Amount ${amount} is not finite`);
    }
    return BigInt(value.mul(new Units(10).pow(decimals)).toDecimalPlaces(0).toFixed(0));
}

export function fromRaw(raw: bigint, decimals: number): Decimal {
    assertDecimals(decimals);
    return new Units(raw.toString()).div(new Units(10).pow(decimals));
}

export function fromRawNumber(raw: bigint, decimals: number): number {
    return fromRaw(raw, decimals).toNumber();
}

/** Fee in ppm (3000) -> bps (30) */
export function feePpmToBps(feePpm: number): number {
    return feePpm / 100;
}

/** Wei -> ETH as a float */
export function weiToEth(wei: bigint): number {
    return fromRawNumber(wei, 18);
}
