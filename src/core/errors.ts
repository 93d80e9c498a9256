export type ActivityErrorCode = 'MALFORMED_INPUT' | 'COMPUTATION_ERROR';

export class ActivityRecognitionError extends Error {
    readonly code: ActivityErrorCode;

    constructor(code: ActivityErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * A batch that breaks the data model: missing or mistyped fields at the
 * boundary, or non-finite values, out-of-range or decreasing timestamps
 * inside the core.
 */
export class MalformedInputError extends ActivityRecognitionError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('MALFORMED_INPUT', `Malformed acceleration data: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

export class ComputationError extends ActivityRecognitionError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('COMPUTATION_ERROR', message, options);
    }
}

export const describeError = (error: unknown): string => {
    return error instanceof Error ? error.message : String(error);
};
