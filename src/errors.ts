/**
 * Pipeline error codes
 *
 * Error code format: PIPELINE.{COMPONENT}.{SPECIFIC_ERROR}
 *
 * An empty raw table is not an error for the aggregation cycle; it is
 * reported as an outcome. NO_DATA exists so that outcome carries a code.
 */
export enum PipelineErrorCodes {
    EXTRACTION_FAILED = 'PIPELINE.EXTRACTION.FAILED',
    ROW_PARSE_SKIPPED = 'PIPELINE.EXTRACTION.ROW_SKIPPED',
    STORE_UNAVAILABLE = 'PIPELINE.STORE.UNAVAILABLE',
    NO_DATA_TO_AGGREGATE = 'PIPELINE.AGGREGATION.NO_DATA',
}

export class PipelineError extends Error {
    constructor(
        readonly code: PipelineErrorCodes,
        message: string,
        readonly details: Record<string, unknown> = {},
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

function describe(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

/** The listing never reached a usable state. Fatal to one extraction run. */
export class ExtractionFailed extends PipelineError {
    static navigation(url: string, cause: unknown): ExtractionFailed {
        return new ExtractionFailed(
            PipelineErrorCodes.EXTRACTION_FAILED,
            `Failed to load listing ${url}: ${describe(cause)}`,
            { url },
            { cause },
        );
    }

    static noResult(url: string): ExtractionFailed {
        return new ExtractionFailed(
            PipelineErrorCodes.EXTRACTION_FAILED,
            `Crawler finished without processing ${url}`,
            { url },
        );
    }
}

/** A single listing row could not be turned into a candidate. Never escalates. */
export class RowParseSkipped extends PipelineError {
    static missingSourceKey(index: number): RowParseSkipped {
        return new RowParseSkipped(
            PipelineErrorCodes.ROW_PARSE_SKIPPED,
            `Row ${index} has no schedule token`,
            { index },
        );
    }

    static shortSourceKey(index: number, sourceKey: string): RowParseSkipped {
        return new RowParseSkipped(
            PipelineErrorCodes.ROW_PARSE_SKIPPED,
            `Row ${index} schedule token "${sourceKey}" is shorter than 8 characters`,
            { index, sourceKey },
        );
    }

    static missingCells(index: number, cellCount: number): RowParseSkipped {
        return new RowParseSkipped(
            PipelineErrorCodes.ROW_PARSE_SKIPPED,
            `Row ${index} has ${cellCount} cells, flight number column is missing`,
            { index, cellCount },
        );
    }
}

/** Datastore unreachable after the retry budget, or the connection dropped mid-operation. */
export class StoreUnavailable extends PipelineError {
    static retriesExhausted(operation: string, attempts: number, cause: unknown): StoreUnavailable {
        return new StoreUnavailable(
            PipelineErrorCodes.STORE_UNAVAILABLE,
            `${operation} failed after ${attempts} attempt(s): ${describe(cause)}`,
            { operation, attempts },
            { cause },
        );
    }

    static connectionLost(operation: string, cause: unknown): StoreUnavailable {
        return new StoreUnavailable(
            PipelineErrorCodes.STORE_UNAVAILABLE,
            `Connection lost during ${operation}: ${describe(cause)}`,
            { operation },
            { cause },
        );
    }
}
