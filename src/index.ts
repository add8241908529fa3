// Public API

export * from './types.js';
export { ArbError, ErrorClass, isArbError, describeError } from './errors.js';

export {
    MAX_UINT128,
    MAX_UINT160,
    MAX_UINT256,
    checkedAdd,
    checkedSub,
    divRoundUp,
    mulDiv,
    mulDivRoundUp,
} from './sim/math/fullMath.js';
export {
    MAX_SQRT_RATIO,
    MAX_TICK,
    MIN_SQRT_RATIO,
    MIN_TICK,
    Q96,
    priceAtTick,
    priceFromSqrt,
    spotPriceFromSqrt,
    sqrtRatioAtTick,
    tickAtSqrtRatio,
} from './sim/math/tickMath.js';
export {
    getAmount0Delta,
    getAmount1Delta,
    getNextSqrtPriceFromAmount0RoundingUp,
    getNextSqrtPriceFromAmount1RoundingDown,
    getNextSqrtPriceFromInput,
} from './sim/math/sqrtPriceMath.js';
export { amountAfterFee, computeSwapStep } from './sim/math/swapStep.js';
export { getAmountOut, simulateCycle, spotPrice } from './sim/math/constantProduct.js';

export { DEFAULT_MAX_TICK_CROSSINGS, PoolSimulator, simulateSwapExactIn, validatePoolState } from './sim/pool.js';
export { buildProfile, detectGaps, type GapOptions, type ProfileInput } from './sim/liquidityProfile.js';

export { PairIndex, groupByPair, pairKey, type PairGroup, type PairMember } from './arb/pairIndex.js';
export { defaultGasConfig, estimateGas, gasCostInToken0, gasCostWei } from './arb/gas.js';
export { screenOpportunities, type ScreenOptions } from './arb/screen.js';
export {
    evaluateExactPair,
    evaluateExactPairFromSource,
    exactOpportunities,
    ranOffKnownTicks,
    widenExactPair,
    type ExactOptions,
    type ExactSourceOptions,
} from './arb/exact.js';
export {
    bestCycleForPair,
    constantProductOpportunities,
    geometricAmounts,
    scanBestCycle,
    type ConstantProductOptions,
} from './arb/cycle.js';
export { runArbitrage, type ArbitrageOutcome, type ArbitrageRequest } from './arb/engine.js';

export {
    decodePoolState,
    decodeReservePool,
    decodeSnapshot,
    encodeOpportunity,
    encodePoolState,
    encodeReservePool,
    type JsonValue,
    type TokenLookup,
} from './snapshot/codec.js';
export {
    DEFAULT_TICK_WINDOW,
    JsonFileSource,
    TokenMetaCache,
    applyTickWindow,
    widenTickWindow,
    type PoolSource,
} from './snapshot/source.js';

export { loadConfig, type ArbConfig } from './config.js';
export { metrics } from './instrument/metrics.js';
export { formatOpportunity, logOpportunity, logger } from './utils/logger.js';
export { feePpmToBps, fromRaw, toRaw } from './utils/units.js';
