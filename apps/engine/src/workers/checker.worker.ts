import { CheckerOutput, ScopedSecret, globalRegistry, toClassifiedPayload } from '@vigil/sdk';
import { loadCheckerModules, registerBuiltinCheckers } from '../checkers';
import { CheckerTask, executeChecker } from '../services/checker-runner';

const TAG = '[checker-worker]';

registerBuiltinCheckers(globalRegistry);

const modulePaths = process.env.CHECKER_MODULES?.split(',').filter(Boolean) ?? [];
try {
    loadCheckerModules(modulePaths);
} catch (err) {
    console.error(`${TAG} failed to load checker modules:`, err);
}

module.exports = async function runChecker(task: CheckerTask): Promise<CheckerOutput> {
    const secret = ScopedSecret.fromTransferable(task.secret);
    for (const bytes of Object.values(task.secret.fields)) bytes.fill(0);

    try {
        return await executeChecker(globalRegistry, { ...task, secret });
    } catch (err) {
        // Error prototypes do not survive the thread boundary.
        throw toClassifiedPayload(err);
    } finally {
        secret.release();
    }
};
