import superjson from 'superjson';

export const MAX_RESULT_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

/**
 * Shape stored in a jsonb column: plain JSON plus superjson's type metadata,
 * so Dates, Maps and Sets in checker output survive the round trip.
 */
export type EncodedPayload = ReturnType<typeof superjson.serialize>;

/** Encodes once and measures the JSON text that gets stored. */
export function encodePayload(value: unknown): EncodedPayload {
    let payload: EncodedPayload;
    let size: number;
    try {
        payload = superjson.serialize(value);
        size = Buffer.byteLength(JSON.stringify(payload));
    } catch (err) {
        throw new SerializationError(`Failed to serialize result: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (size > MAX_RESULT_SIZE) {
        throw new SerializationError(
            `Result payload exceeds maximum limit of 1MB. Current size: ${(size / 1024 / 1024).toFixed(2)}MB`,
        );
    }
    return payload;
}

export function decodePayload<T>(payload: EncodedPayload): T {
    try {
        return superjson.deserialize<T>(payload);
    } catch (err) {
        throw new SerializationError(`Failed to decode result payload: ${err instanceof Error ? err.message : String(err)}`);
    }
}
