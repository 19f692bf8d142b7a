import { v7 as uuid } from 'uuid';
import { z } from 'zod';
import { CredentialEntity } from '../db/credential.entity';
import { NotFoundError, ValidationError } from '../errors/api.errors';
import { CredentialStore } from '../repositories/types';
import { CredentialVault } from './credential-vault';

const TAG = '[credentials]';

const registerSchema = z.object({
    name: z.string().trim().min(1).max(200),
    fields: z.record(z.string()).refine((fields) => Object.keys(fields).length > 0, 'at least one secret field is required'),
    scope: z.object({ region: z.string().min(1).optional() }).passthrough().default({}),
    isDefault: z.boolean().default(false),
});

export type RegisterCredentialInput = z.input<typeof registerSchema>;

/** Credential metadata as returned to callers; the ciphertext never leaves the store. */
export type CredentialSummary = Omit<CredentialEntity, 'encrypted_secret'>;

function summarize(credential: CredentialEntity): CredentialSummary {
    const { encrypted_secret: _sealed, ...summary } = credential;
    return summary;
}

/**
 * The slice of credential management the engine depends on: sealing new
 * material, and keeping task bindings intact when credentials go away.
 */
export class CredentialService {
    constructor(
        private readonly credentials: CredentialStore,
        private readonly vault: CredentialVault,
    ) { }

    async registerCredential(tenantId: string, input: RegisterCredentialInput): Promise<CredentialSummary> {
        const parsed = registerSchema.safeParse(input);
        if (!parsed.success) throw ValidationError.fromZod('Invalid credential', parsed.error.issues);

        const credential = await this.credentials.create({
            id: uuid(),
            tenant_id: tenantId,
            name: parsed.data.name,
            encrypted_secret: this.vault.seal(parsed.data.fields),
            scope: parsed.data.scope,
            is_default: parsed.data.isDefault,
        });
        console.log(`${TAG} registered credential ${credential.id} for tenant ${tenantId}`);
        return summarize(credential);
    }

    async setDefaultCredential(tenantId: string, credentialId: string): Promise<void> {
        const updated = await this.credentials.setDefault(tenantId, credentialId);
        if (!updated) throw new NotFoundError('Credential', credentialId);
    }

    /** Refuses while any live task still points at the credential. */
    async deleteCredential(tenantId: string, credentialId: string): Promise<void> {
        const deleted = await this.credentials.delete(tenantId, credentialId);
        if (!deleted) throw new NotFoundError('Credential', credentialId);
        console.log(`${TAG} deleted credential ${credentialId} for tenant ${tenantId}`);
    }

    /**
     * Moves every task bound to `fromCredentialId` onto `toCredentialId`
     * (null = the tenant default). Returns the number of tasks moved.
     */
    async reassignCredential(tenantId: string, fromCredentialId: string, toCredentialId: string | null): Promise<number> {
        const from = await this.credentials.findForTenant(tenantId, fromCredentialId);
        if (!from) throw new NotFoundError('Credential', fromCredentialId);

        if (toCredentialId !== null) {
            if (toCredentialId === fromCredentialId) {
                throw new ValidationError('Cannot reassign a credential to itself');
            }
            const to = await this.credentials.findForTenant(tenantId, toCredentialId);
            if (!to) throw new NotFoundError('Credential', toCredentialId);
        }

        const moved = await this.credentials.reassign(tenantId, fromCredentialId, toCredentialId);
        console.log(`${TAG} moved ${moved} task(s) from credential ${fromCredentialId} to ${toCredentialId ?? 'tenant default'}`);
        return moved;
    }
}
