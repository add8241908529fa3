/**
 * Core type definitions for the arbitrage simulation core.
 * These interfaces define the seams between the math, the simulator
 * and the search modules, and the contract with the data-fetch layer.
 */

// ============================================================================
// TOKENS & POOLS
// ============================================================================

export interface TokenInfo {
    /** Lower-cased hex address */
    address: string;
    symbol: string;
    decimals: number;
}

/** Initialized tick with its signed liquidity delta (applied when crossing upward) */
export interface TickLiquidity {
    tick: number;
    liquidityNet: bigint;
}

/**
 * Concentrated-liquidity pool snapshot.
 * Read-only for the whole evaluation; the simulator copies
 * (sqrtPriceX96, tick, liquidity) before stepping.
 */
export interface PoolState {
    id: string;
    token0: TokenInfo;
    token1: TokenInfo;
    /** Fee in parts-per-million (500 = 0.05%) */
    fee: number;
    tickSpacing: number;
    sqrtPriceX96: bigint;
    tick: number;
    liquidity: bigint;
    /** Sorted ascending by tick, unique */
    ticks: readonly TickLiquidity[];
}

/** Constant-product (x*y=k) pool snapshot */
export interface ReservePool {
    id: string;
    token0: TokenInfo;
    token1: TokenInfo;
    reserve0: bigint;
    reserve1: bigint;
    feeBps: number;
}

/** Bounded tick window the data-fetch layer scans around the current price */
export interface TickWindow {
    wordsEachSide: number;
    maxTicks: number;
}

// ============================================================================
// SIMULATION TYPES
// ============================================================================

export interface SwapStepResult {
    sqrtPriceNextX96: bigint;
    amountIn: bigint;
    amountOut: bigint;
    feeAmount: bigint;
}

export const StopReason = {
    Filled: 'filled',
    ZeroInput: 'zero-input',
    NoInitializedTick: 'no-initialized-tick',
    TargetPassed: 'target-passed',
    MaxCrossings: 'max-crossings',
    LiquidityExhausted: 'liquidity-exhausted',
} as const;

export type StopReason = (typeof StopReason)[keyof typeof StopReason];

/**
 * `incomplete === true` means the swap could not be resolved inside the
 * known tick window / crossing budget: amountOut is a lower bound, not exact.
 */
export interface SwapDiagnostics {
    finalSqrtPriceX96: bigint;
    finalTick: number;
    finalLiquidity: bigint;
    ticksCrossed: number;
    amountInConsumed: bigint;
    amountInLeft: bigint;
    feePaid: bigint;
    incomplete: boolean;
    stopReason: StopReason;
}

export interface SwapSimulation {
    amountOut: bigint;
    diagnostics: SwapDiagnostics;
}

export interface LiquiditySegment {
    tickLower: number;
    tickUpper: number;
    liquidity: bigint;
    /** token1 per token0, decimal string */
    priceLower: string;
    priceUpper: string;
}

// ============================================================================
// ARBITRAGE TYPES
// ============================================================================

export const ArbMode = {
    Screen: 'screen',
    Exact: 'exact',
    ConstantProduct: 'constant-product',
} as const;

export type ArbMode = (typeof ArbMode)[keyof typeof ArbMode];

/** Gas assumption supplied by the caller */
export interface GasConfig {
    gasPriceWei: bigint;
    gasUnits: bigint;
    /** Upper-cased symbols treated as the native numeraire (e.g. WETH) */
    numeraireSymbols: readonly string[];
}

export interface GasEstimate {
    gasCostWei: bigint;
    /** Gas converted to token0 human units; null when no numeraire side */
    gasCostToken0: number | null;
    gasBps: number | null;
    note: string;
}

interface OpportunityBase {
    pairToken0: string;
    pairToken1: string;
    symbol0: string;
    symbol1: string;
    buyPool: string;
    sellPool: string;
}

export interface ScreenOpportunity extends OpportunityBase {
    strategy: 'screen';
    buyFee: number;
    sellFee: number;
    buyLiquidity: bigint;
    sellLiquidity: bigint;
    buyPrice: number;
    sellPrice: number;
    tradeSizeToken0: number;
    grossSpreadBps: number;
    feeBps: number;
    netSpreadBpsWithoutGas: number;
    netSpreadBps: number;
    gas: GasEstimate;
    executable: boolean;
}

export interface ExactLeg {
    pool: string;
    zeroForOne: boolean;
    amountIn: bigint;
    amountOut: bigint;
    diagnostics: SwapDiagnostics;
}

interface ExactBase extends OpportunityBase {
    strategy: 'exact';
    buyFee: number;
    sellFee: number;
    spotBuyPrice: number;
    spotSellPrice: number;
    tradeSizeToken0: number;
    buyLeg: ExactLeg;
}

export interface ExactNonExecutable extends ExactBase {
    executable: false;
    reason: string;
    sellLeg?: ExactLeg;
}

export interface ExactExecutable extends ExactBase {
    executable: true;
    sellLeg: ExactLeg;
    spotSpreadBps: number;
    feeBps: number;
    amount0In: number;
    amount1Out: number;
    amount0Out: number;
    effectiveBuyPrice: number | null;
    effectiveSellPrice: number | null;
    profitToken0: number;
    profitToken0Raw: bigint;
    grossSpreadBps: number;
    netSpreadBpsWithoutGas: number;
    netSpreadBps: number;
    gas: GasEstimate;
    profitAfterGasToken0: number | null;
    profitableAfterGas: boolean | null;
}

export type ExactOpportunity = ExactExecutable | ExactNonExecutable;

export interface CycleResult {
    /** Token the cycle starts and ends in */
    startToken: 'token0' | 'token1';
    /** Pool of the first leg */
    buyPool: string;
    /** Pool of the second leg */
    sellPool: string;
    amountIn: bigint;
    amountMid: bigint;
    amountOut: bigint;
    profit: bigint;
}

export interface ConstantProductOpportunity extends OpportunityBase {
    strategy: 'constant-product';
    lowPricePool: string;
    highPricePool: string;
    lowPrice: number;
    highPrice: number;
    grossSpreadBps: number;
    /** Fees of both legs of the reported cycle, summed */
    feeBps: number;
    gas: GasEstimate;
    bestToken0Cycle: CycleResult | null;
    bestToken1Cycle: CycleResult | null;
    /** Token0 profit minus gas, raw units; null when gas is not convertible */
    profitAfterGasToken0Raw: bigint | null;
    executable: boolean;
}

export type ArbitrageOpportunity = ScreenOpportunity | ExactOpportunity | ConstantProductOpportunity;

export interface ArbitrageReport<T extends ArbitrageOpportunity = ArbitrageOpportunity> {
    mode: ArbMode;
    poolCount: number;
    pairsEvaluated: number;
    opportunities: T[];
    best: T | null;
    warnings: string[];
    assumptions: Record<string, string | number | boolean>;
}

// ============================================================================
// RESULT TYPE
// ============================================================================

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}
