import superjson from 'superjson';
import { encodePayload, decodePayload, SerializationError } from '../src/utils/serialization';

// what pg hands back from a jsonb column
const throughJsonColumn = <T>(value: T): T => JSON.parse(JSON.stringify(value));

describe('Serialization Utils', () => {
    test('should encode and decode primitives', () => {
        expect(decodePayload(throughJsonColumn(encodePayload(123)))).toBe(123);
        expect(decodePayload(throughJsonColumn(encodePayload('hello')))).toBe('hello');
        expect(decodePayload(throughJsonColumn(encodePayload(true)))).toBe(true);
        expect(decodePayload(throughJsonColumn(encodePayload(null)))).toBe(null);
    });

    test('should keep complex types through a JSON column', () => {
        const date = new Date('2026-03-01T10:00:00.000Z');
        const map = new Map([['a', 1], ['b', 2]]);
        const set = new Set([1, 2, 3]);
        const error = new Error('test error');

        const input = { date, map, set, error };
        const output = decodePayload<typeof input>(throughJsonColumn(encodePayload(input)));

        expect(output.date).toBeInstanceOf(Date);
        expect(output.date.toISOString()).toBe('2026-03-01T10:00:00.000Z');

        expect(output.map).toBeInstanceOf(Map);
        expect(output.map.get('a')).toBe(1);

        expect(output.set).toBeInstanceOf(Set);
        expect(output.set.has(1)).toBe(true);

        expect(output.error).toBeInstanceOf(Error);
        expect(output.error.message).toBe('test error');
    });

    test('should enforce 1MB size limit', () => {
        const blob = { blob: 'x'.repeat(1024 * 1024) };
        expect(() => encodePayload(blob)).toThrow(SerializationError);
        expect(() => encodePayload(blob)).toThrow(/^Result payload exceeds maximum limit of 1MB/);
    });

    test('accepts a payload exactly at the limit', () => {
        // {"json":"..."} adds 11 bytes around the string
        const payload = encodePayload('x'.repeat(1024 * 1024 - 11));
        expect(Buffer.byteLength(JSON.stringify(payload))).toBe(1024 * 1024);
    });

    test('encodes the value only once', () => {
        const encode = jest.spyOn(superjson, 'serialize');

        encodePayload({ healthy: true });

        expect(encode).toHaveBeenCalledTimes(1);
        encode.mockRestore();
    });
});
