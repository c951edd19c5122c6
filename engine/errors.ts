/**
 * Heat Risk Engine — Error Types
 */

/**
 * Input is missing a required field or carries a value of the wrong shape.
 * The request is rejected as a whole; no partial result is produced.
 */
export class ValidationError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * Inference was attempted before the model finished training or loading.
 * Retryable once bootstrap completes.
 */
export class ModelNotReadyError extends Error {
    constructor(message = 'Risk model is not ready: bootstrap has not completed') {
        super(message);
        this.name = 'ModelNotReadyError';
    }
}

/**
 * The model artifact could not be saved or loaded.
 * Never thrown: logged and reported, execution continues in memory.
 */
export class PersistenceWarning extends Error {
    readonly operation: 'load' | 'save';

    constructor(operation: 'load' | 'save', message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PersistenceWarning';
        this.operation = operation;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
