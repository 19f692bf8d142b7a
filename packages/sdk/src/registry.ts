import { ConfigurationError } from './errors';
import type { SecretMaterial } from './secret';
import type { Capability, Checker, CheckerContext, CheckerOutput, CheckerSpec } from './types';

/**
 * Builds a registry entry from a typed spec. The configuration is parsed
 * with the spec's zod schema on every call, so `execute` only ever sees a
 * well-formed `TConfig`.
 */
export function defineChecker<C extends Capability, TConfig>(
    category: string,
    operation: string,
    spec: CheckerSpec<C, TConfig>,
): Checker {
    const parse = (config: Record<string, unknown>): TConfig => {
        const parsed = spec.configSchema.safeParse(config);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid configuration for ${category}:${operation}`, {
                issues: parsed.error.issues.map((issue) => ({
                    path: issue.path.join('.'),
                    message: issue.message,
                })),
            });
        }
        return parsed.data;
    };

    return {
        category,
        operation,
        capability: spec.capability,
        description: spec.description,
        validateConfig(config: Record<string, unknown>): void {
            parse(config);
        },
        async execute(secret: SecretMaterial, config: Record<string, unknown>, ctx: CheckerContext): Promise<CheckerOutput> {
            const data = await spec.execute(secret, parse(config), ctx);
            return { capability: spec.capability, data };
        },
    };
}

export class CheckerRegistry {
    private checkers = new Map<string, Checker>();
    private static readonly NAME_PATTERN = /^[a-z0-9_-]+$/;
    private static readonly MAX_NAME_LENGTH = 64;

    static key(category: string, operation: string): string {
        return `${category}:${operation}`;
    }

    register(checker: Checker): Checker {
        CheckerRegistry.assertName('Category', checker.category);
        CheckerRegistry.assertName('Operation', checker.operation);

        const key = CheckerRegistry.key(checker.category, checker.operation);
        if (this.checkers.has(key)) {
            throw new Error(`Checker "${key}" is already registered.`);
        }
        this.checkers.set(key, checker);
        return checker;
    }

    /** Registers every operation of a category in one go. */
    registerCategory(category: string, checkers: Checker[]): void {
        for (const checker of checkers) {
            if (checker.category !== category) {
                throw new Error(`Checker "${CheckerRegistry.key(checker.category, checker.operation)}" does not belong to category "${category}"`);
            }
            this.register(checker);
        }
    }

    get(category: string, operation: string): Checker | undefined {
        return this.checkers.get(CheckerRegistry.key(category, operation));
    }

    has(category: string, operation: string): boolean {
        return this.checkers.has(CheckerRegistry.key(category, operation));
    }

    list(): string[] {
        return Array.from(this.checkers.keys());
    }

    categories(): string[] {
        return Array.from(new Set(Array.from(this.checkers.values(), (c) => c.category)));
    }

    private static assertName(label: string, name: string): void {
        if (!name || name.length === 0) {
            throw new Error(`${label} name cannot be empty`);
        }
        if (name.length > CheckerRegistry.MAX_NAME_LENGTH) {
            throw new Error(`${label} name exceeds maximum length of ${CheckerRegistry.MAX_NAME_LENGTH} characters`);
        }
        if (!CheckerRegistry.NAME_PATTERN.test(name)) {
            throw new Error(`${label} name must contain only lowercase alphanumeric characters, dashes, and underscores`);
        }
    }
}

export const globalRegistry = new CheckerRegistry();

export function registerChecker<C extends Capability, TConfig>(
    category: string,
    operation: string,
    spec: CheckerSpec<C, TConfig>,
): Checker {
    return globalRegistry.register(defineChecker(category, operation, spec));
}
