/**
 * @fileoverview Contract between the controller and the substrate that runs MCP server processes
 */

import type { Server, ServerTemplate, ServerTransport, WorkloadState } from '@mcpfleet/core';

/**
 * Where a running server can be reached
 */
export interface WorkloadBinding {
  readonly serverName: string;
  readonly podName: string;
  readonly containerName: string;
  readonly namespace: string;
  readonly transport: ServerTransport;
  /** `http://<service>:<port>` for sse, `<pod>/<container>` for stdio */
  readonly endpoint: string;
  readonly ready: boolean;
}

export interface WorkloadInspection {
  readonly state: WorkloadState;
  readonly binding?: WorkloadBinding;
  readonly message?: string;
}

export interface WorkloadManager {
  /**
   * Create the workload if missing. Returns the existing binding when it is already there.
   */
  ensure(server: Server, template: ServerTemplate): Promise<WorkloadBinding>;

  /**
   * Remove the workload; absent objects are ignored
   */
  teardown(name: string): Promise<void>;

  inspect(name: string): Promise<WorkloadInspection>;
}
