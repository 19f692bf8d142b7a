import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const VERSION = 'v1';
const IV_BYTES = 12;
const KEY_BYTES = 32;

export class InvalidEncryptionKeyError extends Error {
    constructor(reason: string) {
        super(`CREDENTIAL_ENCRYPTION_KEY is invalid: ${reason}`);
        this.name = 'InvalidEncryptionKeyError';
    }
}

export class CipherError extends Error {
    constructor(reason: string) {
        super(reason);
        this.name = 'CipherError';
    }
}

/**
 * Authenticated symmetric envelope for credential secrets:
 * `v1.<iv>.<auth tag>.<ciphertext>`, each part base64.
 */
export class SecretCipher {
    private readonly key: Buffer;

    constructor(base64Key: string) {
        if (!base64Key) throw new InvalidEncryptionKeyError('not set');

        const key = Buffer.from(base64Key, 'base64');
        if (key.length !== KEY_BYTES) {
            throw new InvalidEncryptionKeyError(`expected ${KEY_BYTES} bytes of base64, got ${key.length}`);
        }
        this.key = key;
    }

    static generateKey(): string {
        return randomBytes(KEY_BYTES).toString('base64');
    }

    encrypt(plaintext: Buffer): string {
        const iv = randomBytes(IV_BYTES);
        const cipher = createCipheriv(ALGORITHM, this.key, iv);
        const data = Buffer.concat([cipher.update(plaintext), cipher.final()]);
        const tag = cipher.getAuthTag();
        return [VERSION, iv.toString('base64'), tag.toString('base64'), data.toString('base64')].join('.');
    }

    /** Caller owns the returned buffer and should zero it once parsed. */
    decrypt(envelope: string): Buffer {
        const parts = envelope.split('.');
        if (parts.length !== 4 || parts[0] !== VERSION) {
            throw new CipherError('unrecognised envelope format');
        }
        const [, iv, tag, data] = parts;

        try {
            const decipher = createDecipheriv(ALGORITHM, this.key, Buffer.from(iv, 'base64'));
            decipher.setAuthTag(Buffer.from(tag, 'base64'));
            return Buffer.concat([decipher.update(Buffer.from(data, 'base64')), decipher.final()]);
        } catch {
            throw new CipherError('authentication failed');
        }
    }
}
