/**
 * @fileoverview Reconciliation controller, resource store and workload management for mcpfleet
 */

// Reconciliation
export * from './controller';

// Persistence
export * from './store';

// Workloads
export * from './workload';

// Scheduling and activity
export { WorkQueue, DEFAULT_WORK_QUEUE_CONFIG } from './queue/work-queue';
export type { WorkHandler, WorkQueueConfig, WorkQueueStats, WorkResult } from './queue/work-queue';
export { ActivityTracker } from './activity/activity-tracker';
export type { ActivitySnapshot } from './activity/activity-tracker';

// Kubernetes helpers
export { isRecord, messageOf, statusCodeOf, toFleetError } from './kube/errors';
