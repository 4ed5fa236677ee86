/**
 * Home Dashboard - Core Types
 *
 * Wire messages, the data source contract consumed by the refresh engine,
 * and the state a refresh task reports.
 */

import { z } from 'zod';

// ============================================================================
// WIRE MESSAGES (server -> browser)
// ============================================================================

export const WidgetUpdateMessageSchema = z.object({
  type: z.literal('widget_update'),
  integration: z.string().min(1),
  html: z.string()
});

export type WidgetUpdateMessage = z.infer<typeof WidgetUpdateMessageSchema>;

export const RefreshMessageSchema = z.object({
  type: z.literal('refresh')
});

export type RefreshMessage = z.infer<typeof RefreshMessageSchema>;

export const ServerMessageSchema = z.discriminatedUnion('type', [
  WidgetUpdateMessageSchema,
  RefreshMessageSchema
]);

export type ServerMessage = z.infer<typeof ServerMessageSchema>;

/** Inbound keepalive text and its literal reply */
export const PING = 'ping';
export const PONG = 'pong';

// ============================================================================
// DATA SOURCE CONTRACT
// ============================================================================

/**
 * Anything that can produce point-in-time snapshots and, optionally, a lazy
 * sequence of snapshots driven by upstream change notifications.
 *
 * `openUpdateStream` signals "no streaming support" by being absent or by
 * throwing `StreamingNotSupportedError` (synchronously or on the first pull).
 * Any other failure is operational.
 */
export interface DataSource<TData = unknown> {
  readonly id: string;
  readonly displayName: string;
  readonly refreshIntervalSeconds: number;
  snapshot(): Promise<TData>;
  openUpdateStream?(signal: AbortSignal): AsyncIterable<TData>;
}

/**
 * A data source paired with the renderer for its widget
 */
export interface WidgetSource<TData = unknown> extends DataSource<TData> {
  renderWidget(data: TData): string;
  close?(): Promise<void>;
}

/**
 * Receives rendered fragments from refresh drivers
 */
export interface UpdateSink {
  broadcast(sourceId: string, html: string): Promise<void>;
}

// ============================================================================
// REFRESH TASK STATE
// ============================================================================

export type RefreshMode = 'negotiating' | 'streaming' | 'polling';

export type TaskStatus = 'idle' | 'running' | 'ended' | 'failed' | 'cancelled';

export interface RefreshTaskState {
  sourceId: string;
  mode: RefreshMode;
  status: TaskStatus;
  updatesPublished: number;
  lastUpdateAt: string | null;
  lastError: string | null;
}

/**
 * Outcome of probing a source for streaming support
 */
export type StreamProbe<TData> =
  | { kind: 'supported'; first: TData; iterator: AsyncIterator<TData> }
  | { kind: 'unsupported' }
  | { kind: 'error'; cause: unknown };
