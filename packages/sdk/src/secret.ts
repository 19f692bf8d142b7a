export interface SecretScope {
    region?: string;
    [key: string]: unknown;
}

/**
 * What a checker sees of a tenant credential. Field values are readable
 * until the engine releases the material after the checker call.
 */
export interface SecretMaterial {
    readonly credentialId: string;
    readonly scope: SecretScope;
    readonly released: boolean;
    has(field: string): boolean;
    field(field: string): string;
    optionalField(field: string): string | undefined;
}

/** Structured-clone friendly form used to hand a secret to a worker thread. */
export interface TransferableSecret {
    credentialId: string;
    scope: SecretScope;
    fields: Record<string, Uint8Array>;
}

export class SecretReleasedError extends Error {
    constructor(credentialId: string) {
        super(`Secret material for credential ${credentialId} has been released`);
        this.name = 'SecretReleasedError';
    }
}

export class MissingSecretFieldError extends Error {
    constructor(credentialId: string, field: string) {
        super(`Credential ${credentialId} has no "${field}" field`);
        this.name = 'MissingSecretFieldError';
    }
}

/**
 * Decrypted credential fields held in zero-able buffers. `release()` wipes
 * every buffer; any read after that throws.
 */
export class ScopedSecret implements SecretMaterial {
    private readonly fields = new Map<string, Buffer>();
    private isReleased = false;

    constructor(
        readonly credentialId: string,
        readonly scope: SecretScope,
        fields: Record<string, Uint8Array>,
    ) {
        for (const [name, value] of Object.entries(fields)) {
            this.fields.set(name, Buffer.from(value));
        }
    }

    static fromTransferable(secret: TransferableSecret): ScopedSecret {
        return new ScopedSecret(secret.credentialId, secret.scope, secret.fields);
    }

    get released(): boolean {
        return this.isReleased;
    }

    has(field: string): boolean {
        this.assertLive();
        return this.fields.has(field);
    }

    field(field: string): string {
        const value = this.optionalField(field);
        if (value === undefined) throw new MissingSecretFieldError(this.credentialId, field);
        return value;
    }

    optionalField(field: string): string | undefined {
        this.assertLive();
        return this.fields.get(field)?.toString('utf8');
    }

    toTransferable(): TransferableSecret {
        this.assertLive();
        const fields: Record<string, Uint8Array> = {};
        for (const [name, value] of this.fields) {
            fields[name] = Uint8Array.from(value);
        }
        return { credentialId: this.credentialId, scope: this.scope, fields };
    }

    release(): void {
        if (this.isReleased) return;
        for (const value of this.fields.values()) {
            value.fill(0);
        }
        this.fields.clear();
        this.isReleased = true;
    }

    // Keeps the material out of logs and JSON dumps.
    toJSON(): Record<string, unknown> {
        return { credentialId: this.credentialId, scope: this.scope, fields: '[redacted]' };
    }

    private assertLive(): void {
        if (this.isReleased) throw new SecretReleasedError(this.credentialId);
    }
}
