/**
 * Failure of one source adapter on one call: bad status, timeout, network
 * failure or an unparseable response body.
 */
export class SourceError extends Error {
    constructor(
        public readonly source: string,
        public readonly diagnostic: string,
        options?: { cause?: unknown }
    ) {
        super(`${source}: ${diagnostic}`, options);
        this.name = 'SourceError';
    }
}

/**
 * One recorded per-source failure, kept for operational logging.
 */
export interface SourceFailure {
    source: string;
    message: string;
}

/**
 * Failure of a whole aggregated call: raised only when no source could answer.
 */
export class AggregationError extends Error {
    constructor(
        message: string,
        public readonly failures: readonly SourceFailure[]
    ) {
        super(message);
        this.name = 'AggregationError';
    }
}

/**
 * Describe any thrown value as a single-line failure message.
 */
export function describeError(error: unknown): string {
    if (error instanceof SourceError) return error.diagnostic;
    if (error instanceof Error) return error.message;
    return String(error);
}
