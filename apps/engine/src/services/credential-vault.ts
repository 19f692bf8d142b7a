import { ScopedSecret } from '@vigil/sdk';
import { CredentialStore } from '../repositories/types';
import { CipherError, SecretCipher } from '../utils/secret-cipher';
import { CredentialNotFoundError, DecryptionFailedError } from '../errors/vault.errors';

const TAG = '[vault]';

/**
 * Hands out decrypted credential material for exactly one checker call.
 * Nothing is cached: every resolve reads and decrypts again, and the
 * plaintext buffer is wiped as soon as the fields are extracted.
 */
export class CredentialVault {
    constructor(
        private readonly credentials: CredentialStore,
        private readonly cipher: SecretCipher,
    ) { }

    /** `credentialId` null resolves the tenant's default credential. */
    async resolve(tenantId: string, credentialId: string | null): Promise<ScopedSecret> {
        const credential = credentialId
            ? await this.credentials.findForTenant(tenantId, credentialId)
            : await this.credentials.findDefault(tenantId);

        if (!credential) throw new CredentialNotFoundError(tenantId, credentialId);

        let plaintext: Buffer;
        try {
            plaintext = this.cipher.decrypt(credential.encrypted_secret);
        } catch (err) {
            const reason = err instanceof CipherError ? err.message : 'unexpected cipher failure';
            console.error(`${TAG} decryption failed for credential ${credential.id}: ${reason}`);
            throw new DecryptionFailedError(credential.id, reason);
        }

        try {
            return new ScopedSecret(credential.id, credential.scope, parseFields(credential.id, plaintext));
        } finally {
            plaintext.fill(0);
        }
    }

    /** Resolves, runs `fn`, and releases the material however `fn` settles. */
    async withSecret<T>(
        tenantId: string,
        credentialId: string | null,
        fn: (secret: ScopedSecret) => Promise<T>,
    ): Promise<T> {
        const secret = await this.resolve(tenantId, credentialId);
        try {
            return await fn(secret);
        } finally {
            secret.release();
        }
    }

    /** Serialises and encrypts credential fields for storage. */
    seal(fields: Record<string, string>): string {
        const plaintext = Buffer.from(JSON.stringify(fields), 'utf-8');
        try {
            return this.cipher.encrypt(plaintext);
        } finally {
            plaintext.fill(0);
        }
    }
}

function parseFields(credentialId: string, plaintext: Buffer): Record<string, Uint8Array> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(plaintext.toString('utf-8'));
    } catch {
        throw new DecryptionFailedError(credentialId, 'decrypted payload is not JSON');
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new DecryptionFailedError(credentialId, 'decrypted payload is not an object');
    }

    const fields: Record<string, Uint8Array> = {};
    for (const [name, value] of Object.entries(parsed)) {
        if (typeof value !== 'string') {
            throw new DecryptionFailedError(credentialId, `field "${name}" is not a string`);
        }
        fields[name] = Buffer.from(value, 'utf-8');
    }
    return fields;
}
