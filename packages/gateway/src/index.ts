/**
 * @fileoverview SSE transport bridge and HTTP API for mcpfleet
 */

export { TransportBridge, messagePath } from './bridge/transport-bridge';
export type {
  BridgeBackend,
  BridgeConfig,
  ChannelFactories,
  SessionHandle,
  SessionSink
} from './bridge/transport-bridge';
export { encodeComment, encodeEvent, encodeFrame } from './bridge/sse';
export type { SseFrame } from './bridge/sse';

export { BaseChannel } from './channels/types';
export type { ChannelFactory, CloseListener, MessageListener, UpstreamChannel } from './channels/types';
export { KubeAttachChannelFactory, StdioChannel, parseLine } from './channels/kube-attach';
export type { Attacher } from './channels/kube-attach';
export { SseChannel, SseChannelFactory, DEFAULT_SSE_CHANNEL_OPTIONS } from './channels/sse-upstream';
export type { SseChannelOptions, StreamFetch } from './channels/sse-upstream';

export { GatewayServer } from './server';
export type { GatewayServerOptions } from './server';
export { startOperator } from './main';
export type { Operator, OperatorOptions, StoreKind } from './main';
