/**
 * Gas cost conversion.
 *
 * Gas is paid in the native coin. It can only be expressed in token0 when one
 * side of the pair is the numeraire (WETH/ETH by default):
 * - token0 is numeraire: gasToken0 = gasEth
 * - token1 is numeraire: gasToken0 = gasEth / price (price = token1 per token0)
 * Otherwise gas stays unconverted and bps figures exclude it.
 */

import type { GasConfig, GasEstimate } from '../types.js';
import { weiToEth } from '../utils/units.js';

export const DEFAULT_GAS_UNITS = 320_000n;
export const DEFAULT_GAS_PRICE_WEI = 30_000_000_000n;
export const DEFAULT_NUMERAIRE_SYMBOLS: readonly string[] = ['WETH', 'ETH'];

export function defaultGasConfig(): GasConfig {
    return {
        gasPriceWei: DEFAULT_GAS_PRICE_WEI,
        gasUnits: DEFAULT_GAS_UNITS,
        numeraireSymbols: DEFAULT_NUMERAIRE_SYMBOLS,
    };
}

export function gasCostWei(gas: GasConfig): bigint {
    return gas.gasPriceWei * gas.gasUnits;
}

export function isNumeraire(symbol: string | undefined, gas: GasConfig): boolean {
    if (!symbol) return false;
    return gas.numeraireSymbols.includes(symbol.trim().toUpperCase());
}

export function gasCostInToken0(
    gas: GasConfig,
    symbol0: string,
    symbol1: string,
    priceToken1PerToken0: number,
): { gasCostToken0: number | null; note: string } {
    const gasEth = weiToEth(gasCostWei(gas));

    if (isNumeraire(symbol0, gas)) {
        return { gasCostToken0: gasEth, note: 'token0 is numeraire' };
    }
    if (isNumeraire(symbol1, gas)) {
        if (!(priceToken1PerToken0 > 0)) {
            return { gasCostToken0: null, note: 'missing price for conversion' };
        }
        return { gasCostToken0: gasEth / priceToken1PerToken0, note: 'token1 is numeraire' };
    }
    return { gasCostToken0: null, note: 'no numeraire side; gas not converted to token0' };
}

/** Gas cost plus its bps share of a token0 trade size */
export function estimateGas(
    gas: GasConfig,
    symbol0: string,
    symbol1: string,
    priceToken1PerToken0: number,
    tradeSizeToken0: number,
): GasEstimate {
    const { gasCostToken0, note } = gasCostInToken0(gas, symbol0, symbol1, priceToken1PerToken0);
    const gasBps = gasCostToken0 !== null && tradeSizeToken0 > 0
        ? (gasCostToken0 / tradeSizeToken0) * 10_000
        : null;

    return { gasCostWei: gasCostWei(gas), gasCostToken0, gasBps, note };
}
