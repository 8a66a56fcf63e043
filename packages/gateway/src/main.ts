#!/usr/bin/env node
/**
 * @fileoverview Operator bootstrap: controller and gateway in one process
 */

import { KubeConfig } from '@kubernetes/client-node';
import {
  InMemoryResourceStore,
  KubeResourceStore,
  KubeWorkloadManager,
  ServerController,
  createCoreClient,
  createCustomObjectsClient
} from '@mcpfleet/controller';
import type { ResourceStore } from '@mcpfleet/controller';
import { LoggerFactory, loadControllerConfig, loadGatewayConfig } from '@mcpfleet/shared';
import type { ControllerConfigType, GatewayConfigType, Logger } from '@mcpfleet/shared';
import { TransportBridge } from './bridge/transport-bridge';
import { KubeAttachChannelFactory } from './channels/kube-attach';
import { SseChannelFactory } from './channels/sse-upstream';
import { GatewayServer } from './server';

export type StoreKind = 'kubernetes' | 'memory';

export interface OperatorOptions {
  readonly controller: ControllerConfigType;
  readonly gateway: GatewayConfigType;
  /** `memory` keeps pool and server records in process; workloads still run on the cluster */
  readonly store?: StoreKind;
  readonly kubeConfig?: KubeConfig;
  readonly logger?: Logger;
}

export interface Operator {
  readonly controller: ServerController;
  readonly bridge: TransportBridge;
  readonly server: GatewayServer;
  readonly address: string;
  stop(): Promise<void>;
}

/**
 * Wire the store, workloads, controller, bridge and HTTP server, and start them
 */
export async function startOperator(options: OperatorOptions): Promise<Operator> {
  const { controller: controllerConfig, gateway: gatewayConfig } = options;
  const logger = options.logger ?? LoggerFactory.createLogger('mcpfleet-operator', {
    level: controllerConfig.logLevel,
    environment: controllerConfig.environment
  });
  const namespace = controllerConfig.namespace;

  const kubeConfig = options.kubeConfig ?? new KubeConfig();
  if (!options.kubeConfig) {
    kubeConfig.loadFromDefault();
  }

  const store: ResourceStore = options.store === 'memory'
    ? new InMemoryResourceStore(namespace)
    : new KubeResourceStore(createCustomObjectsClient(kubeConfig, namespace), logger);

  const controller = new ServerController({
    store,
    workloads: new KubeWorkloadManager(createCoreClient(kubeConfig, namespace), namespace, logger),
    config: controllerConfig,
    logger
  });

  const bridge = new TransportBridge(
    controller,
    {
      stdio: KubeAttachChannelFactory.fromKubeConfig(kubeConfig, logger),
      sse: new SseChannelFactory(logger)
    },
    gatewayConfig,
    logger
  );
  const server = new GatewayServer({ controller, bridge, config: gatewayConfig, logger });

  await controller.start();
  const address = await server.start();
  logger.info('Operator started', { namespace, store: options.store ?? 'kubernetes', address });

  return {
    controller,
    bridge,
    server,
    address,
    async stop() {
      await server.stop();
      await controller.stop();
      await logger.flush();
    }
  };
}

async function main(): Promise<void> {
  const controllerConfig = loadControllerConfig();
  const gatewayConfig = loadGatewayConfig();
  const logger = LoggerFactory.createLogger('mcpfleet-operator', {
    level: controllerConfig.logLevel,
    environment: controllerConfig.environment
  });

  const operator = await startOperator({ controller: controllerConfig, gateway: gatewayConfig, logger });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    await operator.stop();
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => {
      logger.error(error instanceof Error ? error : new Error(String(error)), 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => {
      logger.error(error instanceof Error ? error : new Error(String(error)), 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('unhandledRejection', reason => {
    logger.error(reason instanceof Error ? reason : new Error(String(reason)), 'Unhandled rejection');
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Failed to start operator:', error);
    process.exit(1);
  });
}
