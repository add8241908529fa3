/**
 * Error taxonomy for the simulation core.
 *
 * Math-level errors abort the single computation that raised them.
 * Search modules catch them at the pair boundary and turn them into warnings.
 * An incomplete swap is NOT an error: see SwapDiagnostics.incomplete.
 */

export const ErrorClass = {
    TickOutOfRange: 'TICK_OUT_OF_RANGE',
    DivisionByZero: 'DIVISION_BY_ZERO',
    MathOverflow: 'MATH_OVERFLOW',
    InvalidSqrtPrice: 'INVALID_SQRT_PRICE',
    InvalidFee: 'INVALID_FEE',
    InvalidPoolState: 'INVALID_POOL_STATE',
    TokenMismatch: 'TOKEN_MISMATCH',
    InvalidSnapshot: 'INVALID_SNAPSHOT',
    InvalidConfig: 'INVALID_CONFIG',
    SourceFailure: 'SOURCE_FAILURE',
} as const;

export type ErrorClass = (typeof ErrorClass)[keyof typeof ErrorClass];

export class ArbError extends Error {
    readonly class: ErrorClass;

    constructor(errorClass: ErrorClass, message: string) {
        super(message);
        this.name = 'ArbError';
        this.class = errorClass;
    }
}

export function isArbError(e: unknown, errorClass?: ErrorClass): e is ArbError {
    if (!(e instanceof ArbError)) return false;
    return errorClass === undefined || e.class === errorClass;
}

/** Short human message for warnings lists */
export function describeError(e: unknown): string {
    if (e instanceof ArbError) return `${e.class}: ${e.message}`;
    if (e instanceof Error) return e.message;
    return String(e);
}
