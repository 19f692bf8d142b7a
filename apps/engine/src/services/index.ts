export { CredentialVault } from './credential-vault';
export { CredentialService } from './credential.service';
export type { CredentialSummary, RegisterCredentialInput } from './credential.service';
export { TaskService } from './task.service';
export type { CreateTaskDefinitionInput, UpdateTaskDefinitionInput, ExecutionPage, ExecutionResultView } from './task.service';
export { Scheduler } from './scheduler';
export type { TickReport } from './scheduler';
export { Poller } from './poller';
export { ExecutionWorker } from './execution-worker';
export type { ProcessOutcome } from './execution-worker';
export { InlineCheckerRunner, ThreadedCheckerRunner, createCheckerRunner, executeChecker } from './checker-runner';
export type { CheckerRunner, CheckerInvocation } from './checker-runner';
export { Reconciler } from './reconciler';
export type { ReconcileReport } from './reconciler';
export { LeaderElector } from './leaderelector';
export { EventLoopMonitor, createBackpressureCheck } from './event-loop-monitor';
export { RedisNotifier, LogNotifier, notifyInBackground } from './notifier';
export type { Notifier, ExecutionNotification } from './notifier';
