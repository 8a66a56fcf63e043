export type { WorkloadBinding, WorkloadInspection, WorkloadManager } from './types';
export { KubeWorkloadManager, createCoreClient } from './kube-workload-manager';
export type { CoreClient } from './kube-workload-manager';
export {
  CONTAINER_NAME,
  LABELS,
  MANAGER_NAME,
  TERMINATION_GRACE_SECONDS,
  buildPod,
  buildService,
  workloadLabels,
  workloadName
} from './pod-spec';
