/**
 * @fileoverview Server-sent events framing
 */

import type { BridgeEvent } from '@mcpfleet/core';

export interface SseFrame {
  readonly event: string;
  readonly data: string;
  readonly id?: string;
}

function dataLines(data: string): string {
  return data
    .split(/\r\n|\r|\n/)
    .map(line => `data: ${line}\n`)
    .join('');
}

export function encodeFrame(frame: SseFrame): string {
  const id = frame.id === undefined ? '' : `id: ${frame.id}\n`;
  return `event: ${frame.event}\n${id}${dataLines(frame.data)}\n`;
}

/**
 * `message` events carry JSON; `endpoint` and `error` carry plain text
 */
export function encodeEvent(event: BridgeEvent): string {
  const data = event.kind === 'message' ? JSON.stringify(event.data) : event.data;
  return encodeFrame({ event: event.kind, data });
}

export function encodeComment(text: string): string {
  return `: ${text}\n\n`;
}
