import type { ConnectionPool } from '../db';
import { TransactionManager } from '../db/transaction.manager';
import { CredentialEntity } from '../db/credential.entity';
import { CredentialInUseError } from '../errors/api.errors';
import { CredentialStore, NewCredential } from './types';

const FOREIGN_KEY_VIOLATION = '23503';

function isForeignKeyViolation(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === FOREIGN_KEY_VIOLATION;
}

export class CredentialRepository implements CredentialStore {
    private readonly tx: TransactionManager;

    constructor(private readonly pool: ConnectionPool) {
        this.tx = new TransactionManager(pool);
    }

    async create(credential: NewCredential): Promise<CredentialEntity> {
        return this.tx.run(async (client) => {
            if (credential.is_default) {
                await client.query('UPDATE credentials SET is_default = FALSE WHERE tenant_id = $1 AND is_default', [
                    credential.tenant_id,
                ]);
            }
            const res = await client.query<CredentialEntity>(
                `INSERT INTO credentials (id, tenant_id, name, encrypted_secret, scope, is_default)
                 VALUES ($1, $2, $3, $4, $5, $6)
                 RETURNING *`,
                [
                    credential.id,
                    credential.tenant_id,
                    credential.name,
                    credential.encrypted_secret,
                    JSON.stringify(credential.scope),
                    credential.is_default,
                ],
            );
            return res.rows[0];
        });
    }

    async findForTenant(tenantId: string, credentialId: string): Promise<CredentialEntity | null> {
        const res = await this.pool.query<CredentialEntity>(
            'SELECT * FROM credentials WHERE id = $1 AND tenant_id = $2',
            [credentialId, tenantId],
        );
        return res.rows[0] ?? null;
    }

    async findDefault(tenantId: string): Promise<CredentialEntity | null> {
        const res = await this.pool.query<CredentialEntity>(
            'SELECT * FROM credentials WHERE tenant_id = $1 AND is_default',
            [tenantId],
        );
        return res.rows[0] ?? null;
    }

    async setDefault(tenantId: string, credentialId: string): Promise<boolean> {
        return this.tx.run(async (client) => {
            const exists = await client.query('SELECT 1 FROM credentials WHERE id = $1 AND tenant_id = $2 FOR UPDATE', [
                credentialId,
                tenantId,
            ]);
            if (exists.rowCount === 0) return false;

            await client.query('UPDATE credentials SET is_default = FALSE WHERE tenant_id = $1 AND is_default', [tenantId]);
            await client.query('UPDATE credentials SET is_default = TRUE WHERE id = $1', [credentialId]);
            return true;
        });
    }

    async findReferencingTasks(tenantId: string, credentialId: string): Promise<string[]> {
        const res = await this.pool.query<{ id: string }>(
            `SELECT id FROM task_definitions
             WHERE tenant_id = $1 AND credential_id = $2 AND deleted_at IS NULL
             ORDER BY created_at ASC`,
            [tenantId, credentialId],
        );
        return res.rows.map((row) => row.id);
    }

    async delete(tenantId: string, credentialId: string): Promise<boolean> {
        const referencing = await this.findReferencingTasks(tenantId, credentialId);
        if (referencing.length > 0) throw new CredentialInUseError(credentialId, referencing);

        try {
            const res = await this.pool.query('DELETE FROM credentials WHERE id = $1 AND tenant_id = $2', [
                credentialId,
                tenantId,
            ]);
            return (res.rowCount ?? 0) > 0;
        } catch (err) {
            // a task got bound between the check and the delete
            if (isForeignKeyViolation(err)) {
                throw new CredentialInUseError(credentialId, await this.findReferencingTasks(tenantId, credentialId));
            }
            throw err;
        }
    }

    async reassign(tenantId: string, fromCredentialId: string, toCredentialId: string | null): Promise<number> {
        const res = await this.pool.query(
            `UPDATE task_definitions
             SET credential_id = $3, updated_at = NOW()
             WHERE tenant_id = $1 AND credential_id = $2 AND deleted_at IS NULL`,
            [tenantId, fromCredentialId, toCredentialId],
        );
        return res.rowCount ?? 0;
    }
}
