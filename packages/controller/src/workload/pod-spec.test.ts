import { describe, expect, it } from '@jest/globals';
import type { Server, ServerTemplate } from '@mcpfleet/core';
import { customResourceDefinitions } from '../store/crds';
import { buildPod, buildService, workloadLabels } from './pod-spec';

const server: Server = {
  metadata: { name: 'echo', uid: 'uid-1' },
  spec: { pool: 'tools' }
};

const template: ServerTemplate = {
  image: 'example/mcp-echo:1.0',
  args: ['--verbose'],
  env: [{ name: 'LOG_LEVEL', value: 'debug' }],
  transport: { type: 'sse', port: 8080 }
};

describe('buildPod', () => {
  const pod = buildPod(server, template, 'mcp');
  const container = pod.spec?.containers[0];

  it('should name and label the pod after the server', () => {
    expect(pod.metadata?.name).toBe('mcp-server-echo');
    expect(pod.metadata?.labels).toEqual({
      'app.kubernetes.io/managed-by': 'mcpfleet',
      'mcpfleet.dev/server': 'echo',
      'mcpfleet.dev/pool': 'tools',
      'mcpfleet.dev/transport': 'sse'
    });
  });

  it('should be owned by the server resource', () => {
    expect(pod.metadata?.ownerReferences).toEqual([
      {
        apiVersion: 'mcpfleet.dev/v1',
        kind: 'MCPServer',
        name: 'echo',
        uid: 'uid-1',
        controller: true,
        blockOwnerDeletion: true
      }
    ]);
  });

  it('should keep stdin open and inject identity variables', () => {
    expect(container?.stdin).toBe(true);
    expect(container?.tty).toBe(false);
    expect(container?.args).toEqual(['--verbose']);
    expect(container?.env).toEqual([
      { name: 'LOG_LEVEL', value: 'debug' },
      { name: 'MCP_SERVER_NAME', value: 'echo' },
      { name: 'MCP_SERVER_UUID', value: 'uid-1' },
      { name: 'MCP_SERVER_POOL', value: 'tools' }
    ]);
    expect(container?.ports).toEqual([{ name: 'mcp', containerPort: 8080 }]);
  });

  it('should leave ownership out when the server has no uid', () => {
    const orphan = buildPod({ ...server, metadata: { name: 'echo' } }, template, 'mcp');
    expect(orphan.metadata?.ownerReferences).toBeUndefined();
  });
});

describe('buildService', () => {
  it('should expose sse servers on their port', () => {
    const service = buildService(server, template, 'mcp');
    expect(service.spec).toEqual({
      type: 'ClusterIP',
      selector: { 'mcpfleet.dev/server': 'echo' },
      ports: [{ name: 'mcp', port: 8080, targetPort: 8080 }]
    });
  });

  it('should be headless for stdio servers', () => {
    const service = buildService(server, { ...template, transport: { type: 'stdio' } }, 'mcp');
    expect(service.spec?.clusterIP).toBe('None');
    expect(workloadLabels(server, { type: 'stdio' })['mcpfleet.dev/transport']).toBe('stdio');
  });
});

describe('customResourceDefinitions', () => {
  it('should define both kinds with a status subresource', () => {
    const [pool, mcpServer] = customResourceDefinitions();

    expect(pool.metadata.name).toBe('mcppools.mcpfleet.dev');
    expect(pool.spec.names.shortNames).toEqual(['mcpp']);
    expect(mcpServer.metadata.name).toBe('mcpservers.mcpfleet.dev');
    expect(mcpServer.spec.versions[0].subresources).toEqual({ status: {} });
    expect(mcpServer.spec.versions[0].additionalPrinterColumns.map(column => column.name)).toEqual([
      'Pool',
      'Phase',
      'Requests',
      'Age'
    ]);
  });
});
