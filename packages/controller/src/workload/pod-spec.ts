/**
 * @fileoverview Pod and Service manifests for a server workload
 */

import type { V1OwnerReference, V1Pod, V1Service } from '@kubernetes/client-node';
import { API_GROUP, API_VERSION, SERVER_KIND } from '@mcpfleet/core';
import type { Server, ServerTemplate, ServerTransport } from '@mcpfleet/core';

export const CONTAINER_NAME = 'mcp-server';
export const TERMINATION_GRACE_SECONDS = 10;

export const LABELS = {
  managedBy: 'app.kubernetes.io/managed-by',
  server: `${API_GROUP}/server`,
  pool: `${API_GROUP}/pool`,
  transport: `${API_GROUP}/transport`
} as const;

export const MANAGER_NAME = 'mcpfleet';

/**
 * Pod and Service share this name
 */
export function workloadName(serverName: string): string {
  return `mcp-server-${serverName}`;
}

export function workloadLabels(server: Server, transport: ServerTransport): Record<string, string> {
  return {
    [LABELS.managedBy]: MANAGER_NAME,
    [LABELS.server]: server.metadata.name,
    [LABELS.pool]: server.spec.pool,
    [LABELS.transport]: transport.type
  };
}

function ownerReferences(server: Server): V1OwnerReference[] | undefined {
  if (!server.metadata.uid) return undefined;
  return [
    {
      apiVersion: `${API_GROUP}/${API_VERSION}`,
      kind: SERVER_KIND,
      name: server.metadata.name,
      uid: server.metadata.uid,
      controller: true,
      blockOwnerDeletion: true
    }
  ];
}

export function buildPod(server: Server, template: ServerTemplate, namespace: string): V1Pod {
  const name = workloadName(server.metadata.name);
  const transport = template.transport;

  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: {
      name,
      namespace,
      labels: workloadLabels(server, transport),
      ownerReferences: ownerReferences(server)
    },
    spec: {
      restartPolicy: 'Always',
      terminationGracePeriodSeconds: TERMINATION_GRACE_SECONDS,
      shareProcessNamespace: true,
      containers: [
        {
          name: CONTAINER_NAME,
          image: template.image,
          command: template.command ? [...template.command] : undefined,
          args: template.args ? [...template.args] : undefined,
          env: [
            ...(template.env ?? []).map(entry => ({ name: entry.name, value: entry.value })),
            { name: 'MCP_SERVER_NAME', value: server.metadata.name },
            { name: 'MCP_SERVER_UUID', value: server.metadata.uid ?? '' },
            { name: 'MCP_SERVER_POOL', value: server.spec.pool }
          ],
          stdin: true,
          tty: false,
          ports: transport.type === 'sse' ? [{ name: 'mcp', containerPort: transport.port }] : undefined,
          resources: template.resources
            ? { limits: template.resources.limits, requests: template.resources.requests }
            : undefined
        }
      ]
    }
  };
}

/**
 * ClusterIP service for sse servers, headless for stdio ones
 */
export function buildService(server: Server, template: ServerTemplate, namespace: string): V1Service {
  const transport = template.transport;
  return {
    apiVersion: 'v1',
    kind: 'Service',
    metadata: {
      name: workloadName(server.metadata.name),
      namespace,
      labels: workloadLabels(server, transport),
      ownerReferences: ownerReferences(server)
    },
    spec: transport.type === 'sse'
      ? {
          type: 'ClusterIP',
          selector: { [LABELS.server]: server.metadata.name },
          ports: [{ name: 'mcp', port: transport.port, targetPort: transport.port }]
        }
      : {
          clusterIP: 'None',
          selector: { [LABELS.server]: server.metadata.name }
        }
  };
}
