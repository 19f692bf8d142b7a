import * as grpc from '@grpc/grpc-js';
import { ExecutionEntity } from '../db/execution.entity';
import { FREQUENCIES, Frequency, TaskDefinitionEntity } from '../db/task-definition.entity';
import { ApiError, ValidationError } from '../errors/api.errors';
import { CredentialService, CredentialSummary } from '../services/credential.service';
import { TaskService, UpdateTaskDefinitionInput } from '../services/task.service';

const TAG = '[InspectionService]';

// Message shapes as produced by proto-loader with keepCase and defaults.

interface TenantRef {
    tenant_id: string;
}

interface TaskRef extends TenantRef {
    task_id: string;
}

interface ExecutionRef extends TenantRef {
    execution_id: string;
}

interface CredentialRef extends TenantRef {
    credential_id: string;
}

interface TaskDefinitionFields {
    name: string;
    description: string;
    service_category: string;
    operation: string;
    config_json: string;
    frequency: string;
    is_active: boolean;
    credential_id: string;
}

interface CreateTaskDefinitionRequest extends TenantRef {
    task: TaskDefinitionFields | null;
}

interface UpdateTaskDefinitionRequest extends TaskRef {
    task: TaskDefinitionFields | null;
    update_mask: string[];
}

interface ListExecutionsRequest extends TaskRef {
    page_size: number;
    cursor: string;
}

interface RegisterCredentialRequest extends TenantRef {
    name: string;
    fields: Record<string, string>;
    region: string;
    is_default: boolean;
}

interface ReassignCredentialRequest extends TenantRef {
    from_credential_id: string;
    to_credential_id: string;
}

type Empty = Record<string, never>;

export interface TaskDefinitionMessage {
    id: string;
    tenant_id: string;
    fields: TaskDefinitionFields;
    last_triggered_at: string;
    created_at: string;
    updated_at: string;
}

export interface ExecutionMessage {
    id: string;
    task_id: string;
    tenant_id: string;
    trigger: string;
    status: string;
    error_classification: string;
    error_detail_json: string;
    queued_at: string;
    started_at: string;
    finished_at: string;
    stale_at: string;
}

export interface ExecutionResultMessage {
    execution_id: string;
    available: boolean;
    produced_at: string;
    output_json: string;
}

export interface ListExecutionsResponse {
    executions: ExecutionMessage[];
    next_cursor: string;
}

export interface CredentialMessage {
    id: string;
    tenant_id: string;
    name: string;
    region: string;
    is_default: boolean;
    created_at: string;
}

const STATUS_BY_CODE: Record<ApiError['code'], grpc.status> = {
    NOT_FOUND: grpc.status.NOT_FOUND,
    INVALID_ARGUMENT: grpc.status.INVALID_ARGUMENT,
    FAILED_PRECONDITION: grpc.status.FAILED_PRECONDITION,
    UNAVAILABLE: grpc.status.UNAVAILABLE,
};

export function toStatus(err: unknown): Partial<grpc.StatusObject> {
    if (err instanceof ApiError) {
        return { code: STATUS_BY_CODE[err.code], details: err.message };
    }
    console.error(`${TAG} unexpected error:`, err);
    return { code: grpc.status.INTERNAL, details: err instanceof Error ? err.message : 'Unknown error' };
}

function unary<Req, Res>(handler: (request: Req) => Promise<Res>): grpc.handleUnaryCall<Req, Res> {
    return (call, callback) => {
        handler(call.request).then(
            (response) => callback(null, response),
            (err) => callback(toStatus(err)),
        );
    };
}

const iso = (value: Date | null): string => (value ? value.toISOString() : '');

function requireTenant(tenantId: string): string {
    if (!tenantId) throw new ValidationError('tenant_id is required');
    return tenantId;
}

function parseConfig(json: string): Record<string, unknown> {
    if (!json) return {};
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch {
        throw new ValidationError('config_json is not valid JSON');
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ValidationError('config_json must be a JSON object');
    }
    return Object.fromEntries(Object.entries(parsed));
}

function parseFrequency(value: string): Frequency {
    const frequency = FREQUENCIES.find((f) => f === value);
    if (!frequency) throw new ValidationError(`frequency must be one of ${FREQUENCIES.join(', ')}`);
    return frequency;
}

export function toTaskDefinitionMessage(task: TaskDefinitionEntity): TaskDefinitionMessage {
    return {
        id: task.id,
        tenant_id: task.tenant_id,
        fields: {
            name: task.name,
            description: task.description ?? '',
            service_category: task.service_category,
            operation: task.operation,
            config_json: JSON.stringify(task.config),
            frequency: task.frequency,
            is_active: task.is_active,
            credential_id: task.credential_id ?? '',
        },
        last_triggered_at: iso(task.last_triggered_at),
        created_at: iso(task.created_at),
        updated_at: iso(task.updated_at),
    };
}

export function toExecutionMessage(execution: ExecutionEntity): ExecutionMessage {
    return {
        id: execution.id,
        task_id: execution.task_id,
        tenant_id: execution.tenant_id,
        trigger: execution.trigger,
        status: execution.status,
        error_classification: execution.error_classification ?? '',
        error_detail_json: execution.error_detail ? JSON.stringify(execution.error_detail) : '',
        queued_at: iso(execution.queued_at),
        started_at: iso(execution.started_at),
        finished_at: iso(execution.finished_at),
        stale_at: iso(execution.stale_at),
    };
}

function toCredentialMessage(credential: CredentialSummary): CredentialMessage {
    return {
        id: credential.id,
        tenant_id: credential.tenant_id,
        name: credential.name,
        region: credential.scope.region ?? '',
        is_default: credential.is_default,
        created_at: iso(credential.created_at),
    };
}

// update_mask entry -> how it lands on the service input
const MASK_FIELDS = new Map<string, (fields: TaskDefinitionFields, input: UpdateTaskDefinitionInput) => void>([
    ['name', (f, input) => { input.name = f.name; }],
    ['description', (f, input) => { input.description = f.description || null; }],
    ['service_category', (f, input) => { input.serviceCategory = f.service_category; }],
    ['operation', (f, input) => { input.operation = f.operation; }],
    ['config_json', (f, input) => { input.config = parseConfig(f.config_json); }],
    ['frequency', (f, input) => { input.frequency = parseFrequency(f.frequency); }],
    ['is_active', (f, input) => { input.isActive = f.is_active; }],
    ['credential_id', (f, input) => { input.credentialId = f.credential_id || null; }],
]);

/**
 * gRPC face of the trigger API. Handlers translate messages to service
 * calls and ApiErrors to status codes; everything else is INTERNAL.
 */
export class InspectionServiceImpl {
    constructor(
        private readonly tasks: TaskService,
        private readonly credentials: CredentialService,
    ) { }

    handlers(): grpc.UntypedServiceImplementation {
        return {
            createTaskDefinition: unary((req: CreateTaskDefinitionRequest) => this.createTaskDefinition(req)),
            getTaskDefinition: unary((req: TaskRef) => this.getTaskDefinition(req)),
            updateTaskDefinition: unary((req: UpdateTaskDefinitionRequest) => this.updateTaskDefinition(req)),
            deleteTaskDefinition: unary((req: TaskRef) => this.deleteTaskDefinition(req)),
            triggerExecution: unary((req: TaskRef) => this.triggerExecution(req)),
            getExecution: unary((req: ExecutionRef) => this.getExecution(req)),
            getExecutionResult: unary((req: ExecutionRef) => this.getExecutionResult(req)),
            listExecutions: unary((req: ListExecutionsRequest) => this.listExecutions(req)),
            listStaleExecutions: unary((req: TenantRef) => this.listStaleExecutions(req)),
            registerCredential: unary((req: RegisterCredentialRequest) => this.registerCredential(req)),
            setDefaultCredential: unary((req: CredentialRef) => this.setDefaultCredential(req)),
            deleteCredential: unary((req: CredentialRef) => this.deleteCredential(req)),
            reassignCredential: unary((req: ReassignCredentialRequest) => this.reassignCredential(req)),
        };
    }

    async createTaskDefinition(req: CreateTaskDefinitionRequest): Promise<TaskDefinitionMessage> {
        const tenantId = requireTenant(req.tenant_id);
        if (!req.task) throw new ValidationError('task is required');

        const task = await this.tasks.createTaskDefinition(tenantId, {
            name: req.task.name,
            description: req.task.description || null,
            serviceCategory: req.task.service_category,
            operation: req.task.operation,
            config: parseConfig(req.task.config_json),
            frequency: parseFrequency(req.task.frequency),
            isActive: req.task.is_active,
            credentialId: req.task.credential_id || null,
        });
        return toTaskDefinitionMessage(task);
    }

    async getTaskDefinition(req: TaskRef): Promise<TaskDefinitionMessage> {
        return toTaskDefinitionMessage(await this.tasks.getTaskDefinition(requireTenant(req.tenant_id), req.task_id));
    }

    async updateTaskDefinition(req: UpdateTaskDefinitionRequest): Promise<TaskDefinitionMessage> {
        const tenantId = requireTenant(req.tenant_id);
        if (!req.task || req.update_mask.length === 0) {
            throw new ValidationError('task and a non-empty update_mask are required');
        }

        const input: UpdateTaskDefinitionInput = {};
        for (const field of req.update_mask) {
            const apply = MASK_FIELDS.get(field);
            if (!apply) throw new ValidationError(`update_mask names unknown field "${field}"`);
            apply(req.task, input);
        }
        return toTaskDefinitionMessage(await this.tasks.updateTaskDefinition(tenantId, req.task_id, input));
    }

    async deleteTaskDefinition(req: TaskRef): Promise<Empty> {
        await this.tasks.deleteTaskDefinition(requireTenant(req.tenant_id), req.task_id);
        return {};
    }

    async triggerExecution(req: TaskRef): Promise<{ execution_id: string }> {
        const executionId = await this.tasks.triggerExecution(requireTenant(req.tenant_id), req.task_id);
        return { execution_id: executionId };
    }

    async getExecution(req: ExecutionRef): Promise<ExecutionMessage> {
        return toExecutionMessage(await this.tasks.getExecution(requireTenant(req.tenant_id), req.execution_id));
    }

    async getExecutionResult(req: ExecutionRef): Promise<ExecutionResultMessage> {
        const result = await this.tasks.getExecutionResult(requireTenant(req.tenant_id), req.execution_id);
        if (!result) {
            return { execution_id: req.execution_id, available: false, produced_at: '', output_json: '' };
        }
        return {
            execution_id: result.executionId,
            available: true,
            produced_at: iso(result.producedAt),
            output_json: JSON.stringify(result.output),
        };
    }

    async listExecutions(req: ListExecutionsRequest): Promise<ListExecutionsResponse> {
        const page = await this.tasks.listExecutionsPage(requireTenant(req.tenant_id), req.task_id, {
            pageSize: req.page_size > 0 ? req.page_size : undefined,
            cursor: req.cursor || undefined,
        });
        return { executions: page.items.map(toExecutionMessage), next_cursor: page.nextCursor ?? '' };
    }

    async listStaleExecutions(req: TenantRef): Promise<ListExecutionsResponse> {
        const stale = await this.tasks.listStaleExecutions(requireTenant(req.tenant_id));
        return { executions: stale.map(toExecutionMessage), next_cursor: '' };
    }

    async registerCredential(req: RegisterCredentialRequest): Promise<CredentialMessage> {
        const credential = await this.credentials.registerCredential(requireTenant(req.tenant_id), {
            name: req.name,
            fields: req.fields,
            scope: req.region ? { region: req.region } : {},
            isDefault: req.is_default,
        });
        return toCredentialMessage(credential);
    }

    async setDefaultCredential(req: CredentialRef): Promise<Empty> {
        await this.credentials.setDefaultCredential(requireTenant(req.tenant_id), req.credential_id);
        return {};
    }

    async deleteCredential(req: CredentialRef): Promise<Empty> {
        await this.credentials.deleteCredential(requireTenant(req.tenant_id), req.credential_id);
        return {};
    }

    async reassignCredential(req: ReassignCredentialRequest): Promise<{ moved: number }> {
        const moved = await this.credentials.reassignCredential(
            requireTenant(req.tenant_id),
            req.from_credential_id,
            req.to_credential_id || null,
        );
        return { moved };
    }
}
