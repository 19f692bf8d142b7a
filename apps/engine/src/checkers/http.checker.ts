import { z } from 'zod';
import {
    AuthenticationError,
    Checker,
    ClassifiedError,
    PermissionError,
    SecretMaterial,
    ServiceError,
    ServiceLimitError,
    defineChecker,
} from '@vigil/sdk';

export const HTTP_CATEGORY = 'http';

export interface HttpResponse {
    status: number;
    ok: boolean;
    text(): Promise<string>;
}

export interface HttpRequestInit {
    method: string;
    headers: Record<string, string>;
    body?: string;
    signal: AbortSignal;
}

export type HttpFetch = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

const headersSchema = z.record(z.string()).default({});

const healthCheckConfig = z.object({
    url: z.string().url(),
    method: z.enum(['GET', 'HEAD']).default('GET'),
    expectedStatus: z.array(z.number().int().min(100).max(599)).min(1).optional(),
    headers: headersSchema,
});

const resourceListConfig = z.object({
    url: z.string().url(),
    itemsPath: z.string().optional(),
    idField: z.string().default('id'),
    typeField: z.string().optional(),
    limit: z.number().int().positive().max(10_000).default(1000),
    headers: headersSchema,
});

const customOperationConfig = z.object({
    url: z.string().url(),
    method: z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE']).default('GET'),
    body: z.unknown().optional(),
    headers: headersSchema,
});

/**
 * Translates an HTTP status into the shared taxonomy.
 * 401 → authentication, 403 → permission, 429/503 → limits, anything else → service.
 */
export function classifyHttpStatus(status: number, detail: Record<string, unknown>): ClassifiedError {
    const message = `Remote service responded with HTTP ${status}`;
    if (status === 401) return new AuthenticationError(message, detail);
    if (status === 403) return new PermissionError(message, detail);
    if (status === 429 || status === 503) return new ServiceLimitError(message, detail);
    return new ServiceError(message, detail);
}

/** Bearer token, basic auth or an API key header, whichever fields the credential carries. */
export function authHeaders(secret: SecretMaterial): Record<string, string> {
    const token = secret.optionalField('token');
    if (token) return { authorization: `Bearer ${token}` };

    const username = secret.optionalField('username');
    const password = secret.optionalField('password');
    if (username && password) {
        return { authorization: `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}` };
    }

    const apiKey = secret.optionalField('api_key');
    if (apiKey) return { [secret.optionalField('api_key_header') ?? 'x-api-key']: apiKey };

    throw new AuthenticationError('Credential carries no usable HTTP authentication fields', {
        credentialId: secret.credentialId,
    });
}

async function send(
    fetchFn: HttpFetch,
    url: string,
    init: HttpRequestInit,
): Promise<{ response: HttpResponse; latencyMs: number; body: string }> {
    const startedAt = Date.now();
    let response: HttpResponse;
    try {
        response = await fetchFn(url, init);
    } catch (err) {
        if (init.signal.aborted) {
            throw new ServiceLimitError(`Request to ${url} was aborted after timing out`, { url });
        }
        throw new ServiceError(`Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`, { url });
    }
    const body = await response.text();
    return { response, latencyMs: Date.now() - startedAt, body };
}

function parseJson(url: string, body: string): unknown {
    try {
        return JSON.parse(body);
    } catch {
        throw new ServiceError(`Response from ${url} is not valid JSON`, { url, bodyPreview: body.slice(0, 200) });
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pluck(value: unknown, path: string | undefined): unknown {
    if (!path) return value;
    let current: unknown = value;
    for (const segment of path.split('.')) {
        if (!isRecord(current)) return undefined;
        current = current[segment];
    }
    return current;
}

/** The built-in `http` category: inspection of any authenticated REST service. */
export function createHttpCheckers(fetchFn: HttpFetch = fetch): Checker[] {
    return [
        defineChecker(HTTP_CATEGORY, 'health_check', {
            capability: 'health_check',
            description: 'Calls an endpoint and reports whether it answered with an expected status',
            configSchema: healthCheckConfig,
            async execute(secret, config, ctx) {
                const { response, latencyMs } = await send(fetchFn, config.url, {
                    method: config.method,
                    headers: { ...config.headers, ...authHeaders(secret) },
                    signal: ctx.signal,
                });

                const expected = config.expectedStatus ? config.expectedStatus.includes(response.status) : response.ok;
                if (!expected) {
                    throw classifyHttpStatus(response.status, { url: config.url, expectedStatus: config.expectedStatus });
                }
                return { healthy: true, status: response.status, latencyMs };
            },
        }),

        defineChecker(HTTP_CATEGORY, 'resource_list', {
            capability: 'resource_list',
            description: 'Fetches a JSON collection and lists the resources in it',
            configSchema: resourceListConfig,
            async execute(secret, config, ctx) {
                const { response, body } = await send(fetchFn, config.url, {
                    method: 'GET',
                    headers: { accept: 'application/json', ...config.headers, ...authHeaders(secret) },
                    signal: ctx.signal,
                });
                if (!response.ok) throw classifyHttpStatus(response.status, { url: config.url });

                const items = pluck(parseJson(config.url, body), config.itemsPath);
                if (!Array.isArray(items)) {
                    throw new ServiceError(`No array found at "${config.itemsPath ?? '(root)'}" in response from ${config.url}`, {
                        url: config.url,
                    });
                }

                const resources = items.slice(0, config.limit).map((item, index) => {
                    const attributes: Record<string, unknown> = isRecord(item) ? item : { value: item };
                    const id = attributes[config.idField];
                    const type = config.typeField ? attributes[config.typeField] : undefined;
                    return {
                        id: typeof id === 'string' || typeof id === 'number' ? String(id) : String(index),
                        type: typeof type === 'string' ? type : undefined,
                        attributes,
                    };
                });
                return { resources, truncated: items.length > config.limit, total: items.length };
            },
        }),

        defineChecker(HTTP_CATEGORY, 'custom_operation', {
            capability: 'custom_operation',
            description: 'Issues an arbitrary request and returns the status and decoded body',
            configSchema: customOperationConfig,
            async execute(secret, config, ctx) {
                const hasBody = config.body !== undefined && config.method !== 'GET';
                const { response, body } = await send(fetchFn, config.url, {
                    method: config.method,
                    headers: {
                        ...(hasBody ? { 'content-type': 'application/json' } : {}),
                        ...config.headers,
                        ...authHeaders(secret),
                    },
                    body: hasBody ? JSON.stringify(config.body) : undefined,
                    signal: ctx.signal,
                });
                if (!response.ok) throw classifyHttpStatus(response.status, { url: config.url, method: config.method });

                return { status: response.status, body: body.length > 0 ? parseJson(config.url, body) : null };
            },
        }),
    ];
}
