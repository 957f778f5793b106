/**
 * Core error hierarchy for the mission coach.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging.
 *
 * Dependency direction: errors.ts → nothing (leaf module)
 * Used by: every layer in the application
 */

/** Base application error with structured metadata. */
export class AppError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

        // Maintains proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/** Raised when configuration is missing or invalid. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

/** Raised when an LLM provider cannot be constructed, reached, or returns an error. */
export class ProviderError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PROVIDER_ERROR', context);
        this.name = 'ProviderError';
    }
}

/** Raised when the orchestration graph is wired incorrectly. */
export class WorkflowError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'WORKFLOW_ERROR', context);
        this.name = 'WorkflowError';
    }
}

/** Raised when a caller-supplied request fails validation. */
export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', context);
        this.name = 'ValidationError';
    }
}

/**
 * Raised by the services layer when the model's reply cannot be read
 * as the structured response the caller expects.
 */
export class ContractError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONTRACT_ERROR', context);
        this.name = 'ContractError';
    }
}

/** Render any thrown value as a single-line message. */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
