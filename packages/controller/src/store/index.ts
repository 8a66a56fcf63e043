export type { ResourceStore, WatchEvent, WatchEventType, WatchHandler } from './types';
export { InMemoryResourceStore } from './memory-store';
export { KubeResourceStore, createCustomObjectsClient } from './kube-store';
export type { CustomObjectsClient, KubeResourceStoreOptions } from './kube-store';
export { customResourceDefinitions, poolDefinition, serverDefinition } from './crds';
export type { CustomResourceDefinition, JsonSchema, PrinterColumn } from './crds';
