import { CipherError, InvalidEncryptionKeyError, SecretCipher } from '../../src/utils/secret-cipher';

const KEY = Buffer.alloc(32, 1).toString('base64');

describe('SecretCipher', () => {
    it('round-trips plaintext through the envelope', () => {
        const cipher = new SecretCipher(KEY);
        const envelope = cipher.encrypt(Buffer.from('{"token":"test-secret"}'));

        expect(envelope.split('.')).toHaveLength(4);
        expect(envelope.startsWith('v1.')).toBe(true);
        expect(envelope).not.toContain('test-secret');
        expect(cipher.decrypt(envelope).toString('utf-8')).toBe('{"token":"test-secret"}');
    });

    it('uses a fresh iv for every encryption', () => {
        const cipher = new SecretCipher(KEY);
        const plaintext = Buffer.from('same input');
        expect(cipher.encrypt(plaintext)).not.toBe(cipher.encrypt(plaintext));
    });

    it('rejects keys of the wrong length', () => {
        expect(() => new SecretCipher(Buffer.alloc(16).toString('base64'))).toThrow(
            new InvalidEncryptionKeyError('expected 32 bytes of base64, got 16'),
        );
        expect(() => new SecretCipher('')).toThrow('CREDENTIAL_ENCRYPTION_KEY is invalid: not set');
    });

    it('fails authentication under a different key', () => {
        const envelope = new SecretCipher(KEY).encrypt(Buffer.from('payload'));
        const other = new SecretCipher(Buffer.alloc(32, 2).toString('base64'));

        expect(() => other.decrypt(envelope)).toThrow(new CipherError('authentication failed'));
    });

    it('fails authentication when the ciphertext is tampered with', () => {
        const cipher = new SecretCipher(KEY);
        const [version, iv, tag] = cipher.encrypt(Buffer.from('payload')).split('.');
        const forged = [version, iv, tag, Buffer.from('PAYLOAD').toString('base64')].join('.');

        expect(() => cipher.decrypt(forged)).toThrow('authentication failed');
    });

    it('rejects envelopes it does not recognise', () => {
        const cipher = new SecretCipher(KEY);
        expect(() => cipher.decrypt('not-an-envelope')).toThrow('unrecognised envelope format');
        expect(() => cipher.decrypt('v2.a.b.c')).toThrow('unrecognised envelope format');
    });

    it('generates keys it accepts', () => {
        expect(() => new SecretCipher(SecretCipher.generateKey())).not.toThrow();
    });
});
