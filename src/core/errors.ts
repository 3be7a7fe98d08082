/**
 * @module core/errors
 * @description Error types and error codes shared by the link model, the bandit policies and the experiment driver
 *
 * Configuration problems are raised at construction time; nothing is clamped
 * silently once a run has started.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for lora-arms
 */
export const ErrorCodes = {
    /** Hyperparameter, arm set or experiment configuration is invalid */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** Algorithm name does not match any registered policy */
    UNKNOWN_POLICY: 'UNKNOWN_POLICY',
    /** Argument to a model function is outside its domain */
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    /** Agent stepped after it stopped */
    AGENT_STOPPED: 'AGENT_STOPPED',
    /** Internal error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for lora-arms
 */
export class LoraArmsError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'LoraArmsError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, LoraArmsError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Invalid configuration (empty arm set, negative weight, discount outside (0, 1], ...)
 */
export class ConfigError extends LoraArmsError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_CONFIG, message, details);
        this.name = 'ConfigError';
    }
}

/**
 * Unknown policy / algorithm name
 */
export class UnknownPolicyError extends LoraArmsError {
    readonly policyName: string;

    constructor(policyName: string, available: readonly string[]) {
        super(
            ErrorCodes.UNKNOWN_POLICY,
            `Unknown policy: ${policyName}. Available: ${available.join(', ')}`,
            { policyName, available }
        );
        this.name = 'UnknownPolicyError';
        this.policyName = policyName;
    }
}

/**
 * Validation error (argument outside the domain of a model function)
 */
export class ValidationError extends LoraArmsError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.VALIDATION_ERROR, message, details);
        this.name = 'ValidationError';
    }
}

/**
 * Raised when a device agent is stepped after reaching its stop condition
 */
export class AgentStoppedError extends LoraArmsError {
    constructor(message = 'Device agent is stopped') {
        super(ErrorCodes.AGENT_STOPPED, message);
        this.name = 'AgentStoppedError';
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a LoraArmsError
 */
export function isLoraArmsError(error: unknown): error is LoraArmsError {
    return error instanceof LoraArmsError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isLoraArmsError(error) && error.code === code;
}

/**
 * Wrap any error into a LoraArmsError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): LoraArmsError {
    if (isLoraArmsError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new LoraArmsError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new LoraArmsError(defaultCode, String(error));
}

// ==================== Assertions ====================

/**
 * Throw a ConfigError unless `condition` holds
 */
export function requireConfig(condition: boolean, message: string, details?: unknown): asserts condition {
    if (!condition) {
        throw new ConfigError(message, details);
    }
}
