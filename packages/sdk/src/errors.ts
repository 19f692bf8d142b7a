/**
 * Closed error taxonomy shared by the engine and every checker.
 * The classification string is the stable contract tenants see; `detail`
 * carries operator-facing context and is persisted next to it.
 */
export const CLASSIFICATIONS = [
    'AuthenticationError',
    'PermissionError',
    'ServiceLimitError',
    'ServiceError',
    'ConcurrencyConflict',
    'ConfigurationError',
] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

export type ErrorDetail = Record<string, unknown>;

export abstract class ClassifiedError extends Error {
    abstract readonly classification: Classification;

    constructor(
        message: string,
        public readonly detail: ErrorDetail = {},
    ) {
        super(message);
        this.name = new.target.name;
    }

    toJSON(): ErrorDetail {
        return { name: this.name, message: this.message, ...this.detail };
    }
}

/** Credential invalid, expired or missing. */
export class AuthenticationError extends ClassifiedError {
    readonly classification = 'AuthenticationError' as const;
}

/** Credential accepted but not allowed to perform the operation. */
export class PermissionError extends ClassifiedError {
    readonly classification = 'PermissionError' as const;
}

/** Throttling, quota exhaustion or timeout on the remote side. */
export class ServiceLimitError extends ClassifiedError {
    readonly classification = 'ServiceLimitError' as const;
}

export class ServiceError extends ClassifiedError {
    readonly classification = 'ServiceError' as const;
}

export class ConcurrencyConflictError extends ClassifiedError {
    readonly classification = 'ConcurrencyConflict' as const;
}

export class ConfigurationError extends ClassifiedError {
    readonly classification = 'ConfigurationError' as const;
}

const CONSTRUCTORS: Record<Classification, new (message: string, detail?: ErrorDetail) => ClassifiedError> = {
    AuthenticationError,
    PermissionError,
    ServiceLimitError,
    ServiceError,
    ConcurrencyConflict: ConcurrencyConflictError,
    ConfigurationError,
};

export function isClassification(value: unknown): value is Classification {
    return typeof value === 'string' && CLASSIFICATIONS.some((classification) => classification === value);
}

export function createClassifiedError(
    classification: Classification,
    message: string,
    detail?: ErrorDetail,
): ClassifiedError {
    return new CONSTRUCTORS[classification](message, detail);
}

/**
 * Maps any thrown value onto the taxonomy. Anything that is not already
 * classified becomes a ServiceError carrying the thrown name and stack.
 */
export function classify(err: unknown): ClassifiedError {
    if (err instanceof ClassifiedError) return err;

    if (err instanceof Error) {
        return new ServiceError(err.message, { cause: err.name, stack: err.stack });
    }
    return new ServiceError(String(err));
}

/**
 * Errors lose their prototype when they cross a worker-thread boundary, so
 * they travel as a tagged plain object instead.
 */
export interface ClassifiedErrorPayload {
    __classified: true;
    classification: Classification;
    message: string;
    detail: ErrorDetail;
}

export function toClassifiedPayload(err: unknown): ClassifiedErrorPayload {
    const classified = classify(err);
    return {
        __classified: true,
        classification: classified.classification,
        message: classified.message,
        detail: classified.detail,
    };
}

export function isClassifiedPayload(value: unknown): value is ClassifiedErrorPayload {
    return (
        typeof value === 'object' &&
        value !== null &&
        '__classified' in value &&
        'classification' in value &&
        isClassification(value.classification)
    );
}

export function fromClassifiedPayload(payload: ClassifiedErrorPayload): ClassifiedError {
    return createClassifiedError(payload.classification, payload.message, payload.detail);
}
