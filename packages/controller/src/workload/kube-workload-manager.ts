/**
 * @fileoverview WorkloadManager that runs each server as a Pod plus a Service
 */

import { CoreV1Api, KubeConfig } from '@kubernetes/client-node';
import type { V1Pod, V1Service } from '@kubernetes/client-node';
import { DEFAULT_SSE_PORT } from '@mcpfleet/core';
import type { Server, ServerTemplate, ServerTransport } from '@mcpfleet/core';
import { Logger } from '@mcpfleet/shared';
import { statusCodeOf, toFleetError } from '../kube/errors';
import {
  CONTAINER_NAME,
  LABELS,
  TERMINATION_GRACE_SECONDS,
  buildPod,
  buildService,
  workloadName
} from './pod-spec';
import type { WorkloadBinding, WorkloadInspection, WorkloadManager } from './types';

/**
 * The slice of CoreV1Api the workload manager needs, bound to one namespace.
 * Failures surface as client-node HttpErrors carrying `statusCode`.
 */
export interface CoreClient {
  createPod(pod: V1Pod): Promise<void>;
  readPod(name: string): Promise<V1Pod>;
  deletePod(name: string, gracePeriodSeconds: number): Promise<void>;
  createService(service: V1Service): Promise<void>;
  readService(name: string): Promise<V1Service>;
  deleteService(name: string): Promise<void>;
}

export function createCoreClient(kubeConfig: KubeConfig, namespace: string): CoreClient {
  const api = kubeConfig.makeApiClient(CoreV1Api);
  return {
    async createPod(pod) {
      await api.createNamespacedPod(namespace, pod);
    },
    async readPod(name) {
      const { body } = await api.readNamespacedPod(name, namespace);
      return body;
    },
    async deletePod(name, gracePeriodSeconds) {
      await api.deleteNamespacedPod(name, namespace, undefined, undefined, gracePeriodSeconds);
    },
    async createService(service) {
      await api.createNamespacedService(namespace, service);
    },
    async readService(name) {
      const { body } = await api.readNamespacedService(name, namespace);
      return body;
    },
    async deleteService(name) {
      await api.deleteNamespacedService(name, namespace);
    }
  };
}

/**
 * Container waiting reasons that will not resolve on their own
 */
const FATAL_WAITING_REASONS: ReadonlySet<string> = new Set([
  'CrashLoopBackOff',
  'ErrImagePull',
  'ImagePullBackOff',
  'InvalidImageName',
  'CreateContainerConfigError',
  'CreateContainerError'
]);

export class KubeWorkloadManager implements WorkloadManager {
  constructor(
    private readonly client: CoreClient,
    private readonly namespace: string,
    private readonly logger: Logger
  ) {}

  async ensure(server: Server, template: ServerTemplate): Promise<WorkloadBinding> {
    const name = server.metadata.name;

    await this.createIgnoringConflict('create pod', name, () =>
      this.client.createPod(buildPod(server, template, this.namespace))
    );
    await this.createIgnoringConflict('create service', name, () =>
      this.client.createService(buildService(server, template, this.namespace))
    );

    const inspection = await this.inspect(name);
    return inspection.binding ?? this.binding(name, template.transport, false);
  }

  async teardown(name: string): Promise<void> {
    const objectName = workloadName(name);
    await this.deleteIgnoringAbsent('delete pod', name, () => this.client.deletePod(objectName, TERMINATION_GRACE_SECONDS));
    await this.deleteIgnoringAbsent('delete service', name, () => this.client.deleteService(objectName));
    this.logger.debug('Workload torn down', { component: 'workload', server: name });
  }

  async inspect(name: string): Promise<WorkloadInspection> {
    const pod = await this.readOrNull('read pod', name, () => this.client.readPod(workloadName(name)));

    if (!pod) {
      const service = await this.readOrNull('read service', name, () => this.client.readService(workloadName(name)));
      return service ? { state: 'terminating', message: 'service without pod' } : { state: 'absent' };
    }

    const transport = transportOf(pod);
    if (pod.metadata?.deletionTimestamp) {
      return { state: 'terminating', binding: this.binding(name, transport, false) };
    }

    const phase = pod.status?.phase;
    const containers = pod.status?.containerStatuses ?? [];

    if (phase === 'Failed' || phase === 'Succeeded') {
      return {
        state: 'failed',
        binding: this.binding(name, transport, false),
        message: pod.status?.message ?? `pod ${phase.toLowerCase()}`
      };
    }

    for (const container of containers) {
      const waiting = container.state?.waiting;
      if (waiting?.reason && FATAL_WAITING_REASONS.has(waiting.reason)) {
        return {
          state: 'failed',
          binding: this.binding(name, transport, false),
          message: waiting.message ? `${waiting.reason}: ${waiting.message}` : waiting.reason
        };
      }
    }

    const ready = phase === 'Running' && containers.length > 0 && containers.every(container => container.ready);
    return { state: ready ? 'ready' : 'pending', binding: this.binding(name, transport, ready) };
  }

  private binding(serverName: string, transport: ServerTransport, ready: boolean): WorkloadBinding {
    const podName = workloadName(serverName);
    const endpoint = transport.type === 'sse'
      ? `http://${podName}.${this.namespace}.svc:${transport.port}`
      : `${podName}/${CONTAINER_NAME}`;
    return {
      serverName,
      podName,
      containerName: CONTAINER_NAME,
      namespace: this.namespace,
      transport,
      endpoint,
      ready
    };
  }

  private async createIgnoringConflict(operation: string, name: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      if (statusCodeOf(error) === 409) {
        this.logger.trace('Workload object already exists', { component: 'workload', server: name, operation });
        return;
      }
      throw toFleetError(error, { operation, kind: 'Workload', name });
    }
  }

  private async deleteIgnoringAbsent(operation: string, name: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      if (statusCodeOf(error) === 404) return;
      throw toFleetError(error, { operation, kind: 'Workload', name });
    }
  }

  private async readOrNull<T>(operation: string, name: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      if (statusCodeOf(error) === 404) return null;
      throw toFleetError(error, { operation, kind: 'Workload', name });
    }
  }
}

/**
 * Recover the transport from the pod's labels and declared port
 */
function transportOf(pod: V1Pod): ServerTransport {
  if (pod.metadata?.labels?.[LABELS.transport] !== 'sse') {
    return { type: 'stdio' };
  }
  const port = pod.spec?.containers.find(container => container.name === CONTAINER_NAME)?.ports?.[0]?.containerPort;
  return { type: 'sse', port: port ?? DEFAULT_SSE_PORT };
}
