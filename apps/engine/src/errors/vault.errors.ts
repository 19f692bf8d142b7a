export class CredentialNotFoundError extends Error {
    constructor(tenantId: string, credentialId: string | null) {
        super(
            credentialId
                ? `Credential ${credentialId} not found for tenant ${tenantId}`
                : `No default credential configured for tenant ${tenantId}`,
        );
        this.name = 'CredentialNotFoundError';
    }
}

// Never carries the ciphertext or the key, only the reason.
export class DecryptionFailedError extends Error {
    constructor(credentialId: string, reason: string) {
        super(`Failed to decrypt credential ${credentialId}: ${reason}`);
        this.name = 'DecryptionFailedError';
    }
}
