import path from 'path';
import { CheckerRegistry } from '@vigil/sdk';
import { HTTP_CATEGORY, createHttpCheckers } from './http.checker';

const TAG = '[checkers]';

export function registerBuiltinCheckers(registry: CheckerRegistry): void {
    if (registry.categories().includes(HTTP_CATEGORY)) return;
    registry.registerCategory(HTTP_CATEGORY, createHttpCheckers());
}

/**
 * Loads tenant-specific checker modules. Each module registers its checkers
 * on import through `registerChecker` from @vigil/sdk. Paths resolve
 * against the working directory, not this file.
 */
export function loadCheckerModules(modulePaths: string[]): string[] {
    const loaded: string[] = [];
    for (const p of modulePaths) {
        const trimmed = p.trim();
        if (!trimmed) continue;
        const resolved = path.isAbsolute(trimmed) ? trimmed : path.resolve(process.cwd(), trimmed);
        // eslint-disable-next-line @typescript-eslint/no-require-imports
        require(resolved);
        loaded.push(resolved);
        console.log(`${TAG} loaded checkers from: ${resolved}`);
    }
    return loaded;
}
