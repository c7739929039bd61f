export class ClassifierError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

/**
 * The inference endpoint could not be reached or answered with a non-success status.
 */
export class InferenceUnavailableError extends ClassifierError {
    constructor(public readonly endpoint: string, cause?: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause ?? "unknown error");
        super(`Inference Unavailable: ${endpoint}: ${reason}`, { cause });
    }
}
