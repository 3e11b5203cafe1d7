/**
 * Base class for errors raised by paper-reconcile.
 */
export class ReconcileError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'ReconcileError';
    }
}

/**
 * An input file (reference list, session) could not be read as expected.
 */
export class MalformedInputError extends ReconcileError {
    constructor(
        public readonly path: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(`${path}: ${message}`, 'MALFORMED_INPUT', options);
        this.name = 'MalformedInputError';
    }
}

/**
 * Every source call of a run failed to reach its source.
 */
export class AllSourcesUnavailableError extends ReconcileError {
    constructor(public readonly attempted: number) {
        super(
            `No data source could be reached (${attempted} request${attempted === 1 ? '' : 's'} failed). Check your network connection.`,
            'ALL_SOURCES_UNAVAILABLE'
        );
        this.name = 'AllSourcesUnavailableError';
    }
}
