import { ExecutionCursor } from '../repositories/types';
import { ValidationError } from '../errors/api.errors';

// Opaque page token for listExecutions: base64url of "<queued_at ISO>|<execution id>".

export function encodeCursor(cursor: ExecutionCursor): string {
    return Buffer.from(`${cursor.queuedAt.toISOString()}|${cursor.id}`, 'utf-8').toString('base64url');
}

export function decodeCursor(token: string): ExecutionCursor {
    const raw = Buffer.from(token, 'base64url').toString('utf-8');
    const separator = raw.indexOf('|');
    const queuedAt = new Date(raw.slice(0, separator));

    if (separator <= 0 || Number.isNaN(queuedAt.getTime()) || raw.length === separator + 1) {
        throw new ValidationError('Invalid page cursor');
    }
    return { queuedAt, id: raw.slice(separator + 1) };
}
