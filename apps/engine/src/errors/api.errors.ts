import type { ZodIssue } from 'zod';

/** Errors raised by the trigger API. The gRPC layer maps `code` to a status. */
export abstract class ApiError extends Error {
    abstract readonly code: 'NOT_FOUND' | 'INVALID_ARGUMENT' | 'FAILED_PRECONDITION' | 'UNAVAILABLE';

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class NotFoundError extends ApiError {
    readonly code = 'NOT_FOUND' as const;

    constructor(entity: string, id: string) {
        super(`${entity} ${id} not found`);
    }
}

export class ValidationError extends ApiError {
    readonly code = 'INVALID_ARGUMENT' as const;

    constructor(
        message: string,
        public readonly issues: Array<{ path: string; message: string }> = [],
    ) {
        super(issues.length > 0 ? `${message}: ${issues.map((i) => `${i.path || '(root)'} ${i.message}`).join('; ')}` : message);
    }

    static fromZod(message: string, issues: ZodIssue[]): ValidationError {
        return new ValidationError(
            message,
            issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        );
    }
}

export class CredentialInUseError extends ApiError {
    readonly code = 'FAILED_PRECONDITION' as const;

    constructor(
        public readonly credentialId: string,
        public readonly taskIds: string[],
    ) {
        super(`Credential ${credentialId} is still referenced by ${taskIds.length} task definition(s); reassign them first`);
    }
}

export class TaskInactiveError extends ApiError {
    readonly code = 'FAILED_PRECONDITION' as const;

    constructor(taskId: string) {
        super(`Task definition ${taskId} is inactive`);
    }
}

export class EnqueueFailedError extends ApiError {
    readonly code = 'UNAVAILABLE' as const;

    constructor(taskId: string, cause: unknown) {
        super(`Failed to enqueue execution for task ${taskId}: ${cause instanceof Error ? cause.message : String(cause)}`);
    }
}
