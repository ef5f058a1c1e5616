/**
 * Centralized Error Handling Utility
 * Error classes for the polyhedron core and consistent error logging
 */

/**
 * Error severity levels
 */
const ErrorSeverity = {
    LOW: 'low',
    MEDIUM: 'medium',
    HIGH: 'high',
    CRITICAL: 'critical'
} as const;

type ErrorSeverityType = typeof ErrorSeverity[keyof typeof ErrorSeverity];

/**
 * Interface for errors with additional metadata
 */
interface ErrorWithMeta extends Error {
    timestamp?: string;
    field?: string | null;
}

/**
 * Error log entry structure
 */
interface ErrorLogEntry {
    timestamp: string;
    context: string;
    severity: ErrorSeverityType;
    name: string;
    message: string;
    stack?: string;
    [key: string]: unknown;
}

/**
 * Custom Error Classes
 */
class InvalidSubdivisionLevelError extends Error {
    public readonly field = 'subdivisions';
    public readonly subdivisions: unknown;
    public readonly details: { field: string; message: string }[];
    public readonly timestamp: string;

    constructor(subdivisions: unknown, details: { field: string; message: string }[] = []) {
        const reason = details.length > 0 ? details.map(d => d.message).join('; ') : 'invalid value';
        super(`Invalid subdivision level ${String(subdivisions)}: ${reason}`);
        this.name = 'InvalidSubdivisionLevelError';
        this.subdivisions = subdivisions;
        this.details = details;
        this.timestamp = new Date().toISOString();
    }
}

class InvalidRadiusError extends Error {
    public readonly field = 'radius';
    public readonly radius: unknown;
    public readonly timestamp: string;

    constructor(radius: unknown, message: string = 'radius must be a positive finite number') {
        super(`Invalid radius ${String(radius)}: ${message}`);
        this.name = 'InvalidRadiusError';
        this.radius = radius;
        this.timestamp = new Date().toISOString();
    }
}

class MalformedWeightsError extends Error {
    public readonly field = 'weights';
    public readonly weights: readonly number[];
    public readonly timestamp: string;

    constructor(message: string, weights: readonly number[]) {
        super(message);
        this.name = 'MalformedWeightsError';
        this.weights = [...weights];
        this.timestamp = new Date().toISOString();
    }
}

class InvalidPackedIndexError extends Error {
    public readonly field = 'index';
    public readonly index: number;
    public readonly timestamp: string;

    constructor(message: string, index: number) {
        super(message);
        this.name = 'InvalidPackedIndexError';
        this.index = index;
        this.timestamp = new Date().toISOString();
    }
}

class ConvergenceError extends Error {
    public readonly iterations: number;
    public readonly timestamp: string;

    constructor(message: string, iterations: number) {
        super(message);
        this.name = 'ConvergenceError';
        this.iterations = iterations;
        this.timestamp = new Date().toISOString();
    }
}

class MeshLayoutError extends Error {
    public readonly field = 'vertices';
    public readonly vertexCount: number;
    public readonly timestamp: string;

    constructor(message: string, vertexCount: number) {
        super(message);
        this.name = 'MeshLayoutError';
        this.vertexCount = vertexCount;
        this.timestamp = new Date().toISOString();
    }
}

/**
 * Normalize anything thrown into an Error
 */
function toError(error: unknown): ErrorWithMeta {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Log error with context
 */
function logError(
    error: ErrorWithMeta,
    context: string = 'Unknown',
    severity: ErrorSeverityType = ErrorSeverity.MEDIUM,
    metadata: Record<string, unknown> = {}
): ErrorLogEntry {
    const errorLog: ErrorLogEntry = {
        timestamp: new Date().toISOString(),
        context,
        severity,
        name: error.name || 'Error',
        message: error.message,
        stack: error.stack,
        ...(error.field ? { field: error.field } : {}),
        ...metadata
    };

    // Log based on severity
    switch (severity) {
        case ErrorSeverity.CRITICAL:
            console.error(`🔴 [CRITICAL ERROR] ${context}:`, errorLog);
            break;
        case ErrorSeverity.HIGH:
            console.error(`❌ [ERROR] ${context}:`, errorLog);
            break;
        case ErrorSeverity.MEDIUM:
            console.warn(`⚠️  [WARNING] ${context}:`, errorLog);
            break;
        case ErrorSeverity.LOW:
            console.log(`ℹ️  [INFO] ${context}:`, errorLog);
            break;
        default:
            console.warn(`⚠️  [WARNING] ${context}:`, errorLog);
    }

    return errorLog;
}

/**
 * Run a synchronous operation, logging and rethrowing anything it throws
 */
function withErrorLogging<T>(
    operation: () => T,
    context: string,
    severity: ErrorSeverityType = ErrorSeverity.HIGH,
    metadata: Record<string, unknown> = {}
): T {
    try {
        return operation();
    } catch (error: unknown) {
        logError(toError(error), context, severity, metadata);
        throw error;
    }
}

export {
    // Error classes
    InvalidSubdivisionLevelError,
    InvalidRadiusError,
    MalformedWeightsError,
    InvalidPackedIndexError,
    ConvergenceError,
    MeshLayoutError,

    // Severity levels
    ErrorSeverity,

    // Utility functions
    logError,
    toError,
    withErrorLogging
};

export type { ErrorSeverityType, ErrorWithMeta, ErrorLogEntry };
