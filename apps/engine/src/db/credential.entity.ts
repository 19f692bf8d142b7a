import type { SecretScope } from '@vigil/sdk';

export interface CredentialEntity {
    id: string;
    tenant_id: string;
    name: string;
    encrypted_secret: string;
    scope: SecretScope;
    is_default: boolean;
    created_at: Date;
}
