// src/utils/logger.ts
// Console logger and one-line opportunity summaries

import type { ArbitrageOpportunity } from '../types.js';

function shortId(id: string): string {
    return id.length > 12 ? `${id.slice(0, 10)}...` : id;
}

function bps(value: number): string {
    return `${value.toFixed(2)}bps`;
}

export function formatOpportunity(opp: ArbitrageOpportunity): string {
    const parts: string[] = [`[${opp.strategy}]`, `${opp.symbol0}/${opp.symbol1}`];

    parts.push(`buy=${shortId(opp.buyPool)}`);
    parts.push(`sell=${shortId(opp.sellPool)}`);

    switch (opp.strategy) {
        case 'screen':
            parts.push(`gross=${bps(opp.grossSpreadBps)}`);
            parts.push(`net=${bps(opp.netSpreadBps)}`);
            break;
        case 'exact':
            if (opp.executable) {
                parts.push(`net=${bps(opp.netSpreadBps)}`);
                parts.push(`profit=${opp.profitToken0.toFixed(6)} ${opp.symbol0}`);
            } else {
                parts.push(`reason=${opp.reason}`);
            }
            break;
        case 'constant-product':
            parts.push(`spread=${bps(opp.grossSpreadBps)}`);
            if (opp.bestToken0Cycle) {
                parts.push(`in=${opp.bestToken0Cycle.amountIn}`);
                parts.push(`profit=${opp.bestToken0Cycle.profit}`);
            }
            break;
    }

    // non-executable exact results carry no gas estimate
    if ('gas' in opp && opp.gas.gasCostToken0 !== null) {
        parts.push(`gas=${opp.gas.gasCostToken0.toFixed(6)} ${opp.symbol0}`);
    }

    return parts.join(' | ');
}

export function logOpportunity(opp: ArbitrageOpportunity): void {
    console.log(formatOpportunity(opp));
}

export const logger = {
    info: (...args: unknown[]) => console.log('[INFO]', ...args),
    warn: (...args: unknown[]) => console.warn('[WARN]', ...args),
    error: (...args: unknown[]) => console.error('[ERROR]', ...args),
    debug: (...args: unknown[]) => {
        if (process.env.DEBUG === '1') {
            console.log('[DEBUG]', ...args);
        }
    },
};

export default logger;
