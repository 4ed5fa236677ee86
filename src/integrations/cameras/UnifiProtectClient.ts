/**
 * UniFi Protect client
 *
 * Wraps the `unifi-protect` SDK: login, bootstrap (cameras and NVR ports),
 * motion event history, and the realtime events the SDK decodes from the
 * console's update socket.
 */

import { format } from 'node:util';
import { ProtectApi } from 'unifi-protect';
import { z } from 'zod';
import { UpstreamRequestError } from '../../utils/errors.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import type { CameraInfo, MotionEvent } from './models.js';

const ProtectChannelSchema = z
  .object({
    id: z.number().optional(),
    width: z.number(),
    height: z.number(),
    rtspAlias: z.string().nullish(),
    isRtspEnabled: z.boolean().optional()
  })
  .passthrough();

export const ProtectCameraSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.string().nullish(),
    state: z.string().optional(),
    isConnected: z.boolean().optional(),
    isRecording: z.boolean().default(false),
    isMotionDetected: z.boolean().default(false),
    lastMotion: z.number().nullish(),
    firmwareVersion: z.string().nullish(),
    channels: z.array(ProtectChannelSchema).default([])
  })
  .passthrough();

export type ProtectCamera = z.infer<typeof ProtectCameraSchema>;

export const ProtectBootstrapSchema = z
  .object({
    cameras: z.array(ProtectCameraSchema).default([]),
    nvr: z
      .object({
        ports: z.object({ rtsp: z.number().optional() }).passthrough().optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export type ProtectBootstrap = z.infer<typeof ProtectBootstrapSchema>;

export const ProtectEventSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    start: z.number(),
    end: z.number().nullish(),
    score: z.number().nullish(),
    camera: z.string().nullish()
  })
  .passthrough();

export type ProtectEvent = z.infer<typeof ProtectEventSchema>;

/** A realtime packet as emitted by the SDK */
const ProtectPacketSchema = z.object({
  header: z
    .object({
      action: z.string(),
      modelKey: z.string(),
      id: z.string()
    })
    .passthrough(),
  payload: z.unknown()
});

/** What changed, and the changed fields */
export interface ProtectUpdateMessage {
  action: { action: string; modelKey: string; id: string };
  data: unknown;
}

/** Channel index per quality: 0 = high, 1 = medium, 2 = low */
const QUALITY_CHANNEL = { high: 0, medium: 1, low: 2 } as const;

export type StreamQuality = keyof typeof QUALITY_CHANNEL;

/** Medium and low are H.264; high is H.265 and last resort */
const FALLBACK_CHANNELS = [1, 2, 0];

const DEFAULT_RTSP_PORT = 7447;

export interface UpdateHandlers {
  onMessage(message: ProtectUpdateMessage): void;
  onClose?(): void;
}

/** The client calls the cameras integration depends on */
export interface ProtectService {
  connect(): Promise<void>;
  getCameras(): Promise<CameraInfo[]>;
  getCameraRtspUrl(cameraId: string, quality?: StreamQuality): string | null;
  getCameraName(cameraId: string): string | null;
  getRecentMotionEvents(hours?: number, limit?: number): Promise<MotionEvent[]>;
  subscribeUpdates(handlers: UpdateHandlers): () => void;
  close(): Promise<void>;
}

/** The part of the SDK's `ProtectApi` this client drives */
export interface ProtectSdk {
  readonly bootstrap: unknown;
  login(nvrAddress: string, username: string, password: string): Promise<boolean>;
  getBootstrap(): Promise<boolean>;
  retrieve(url: string): Promise<{ ok: boolean; status: number; json(): Promise<unknown> } | null>;
  on(event: 'message', listener: (packet: unknown) => void): unknown;
  off(event: 'message', listener: (packet: unknown) => void): unknown;
  logout(): void;
}

export interface UnifiProtectClientOptions {
  host: string;
  username: string;
  password: string;
  logger?: Logger;
  api?: ProtectSdk;
}

/**
 * Map a Protect camera record to the widget's camera shape
 */
export function toCameraInfo(camera: ProtectCamera): CameraInfo {
  const connected = camera.isConnected ?? camera.state === 'CONNECTED';
  const primary = camera.channels[0];

  return {
    id: camera.id,
    name: camera.name,
    status: connected ? 'online' : 'offline',
    isRecording: camera.isRecording,
    motionDetected: camera.isMotionDetected,
    lastMotion: camera.lastMotion ? new Date(camera.lastMotion).toISOString() : null,
    model: camera.type ?? null,
    firmwareVersion: camera.firmwareVersion ?? null,
    resolution: primary ? `${primary.width}x${primary.height}` : null
  };
}

/**
 * Map a Protect event to a motion event; null when it has no camera
 */
export function toMotionEvent(
  event: ProtectEvent,
  cameraName: (cameraId: string) => string | null
): MotionEvent | null {
  if (!event.camera) {
    return null;
  }
  return {
    cameraId: event.camera,
    cameraName: cameraName(event.camera) ?? event.camera,
    timestamp: new Date(event.start).toISOString(),
    score: event.score ?? null
  };
}

/**
 * Route the SDK's printf-style log calls into a dashboard logger
 */
function sdkLogging(logger: Logger) {
  return {
    debug: (message: string, ...parameters: unknown[]): void => logger.debug(format(message, ...parameters)),
    info: (message: string, ...parameters: unknown[]): void => logger.info(format(message, ...parameters)),
    warn: (message: string, ...parameters: unknown[]): void => logger.warn(format(message, ...parameters)),
    error: (message: string, ...parameters: unknown[]): void => logger.error(format(message, ...parameters))
  };
}

export class UnifiProtectClient implements ProtectService {
  private readonly host: string;
  private readonly username: string;
  private readonly password: string;
  private readonly logger: Logger;
  private readonly api: ProtectSdk;

  private bootstrap: ProtectBootstrap | null = null;
  private subscriptions: Set<UpdateHandlers> = new Set();

  constructor(options: UnifiProtectClientOptions) {
    this.host = options.host;
    this.username = options.username;
    this.password = options.password;
    this.logger = options.logger ?? createLogger('unifi-protect');
    this.api = options.api ?? new ProtectApi(sdkLogging(this.logger.child('sdk')));
  }

  async connect(): Promise<void> {
    if (!(await this.api.login(this.host, this.username, this.password))) {
      throw new UpstreamRequestError(this.url('/api/auth/login'), 'login rejected');
    }
    await this.refreshBootstrap();
    this.logger.info(`Connected to UniFi Protect at ${this.host}`);
  }

  async getCameras(): Promise<CameraInfo[]> {
    this.requireConnection();
    const bootstrap = await this.refreshBootstrap();
    return bootstrap.cameras.map(toCameraInfo);
  }

  /**
   * RTSP URL for a camera's channel. Falls back to medium, low, then high
   * when the requested channel does not exist.
   */
  getCameraRtspUrl(cameraId: string, quality: StreamQuality = 'low'): string | null {
    const bootstrap = this.requireConnection();
    const camera = bootstrap.cameras.find(candidate => candidate.id === cameraId);
    if (!camera) {
      this.logger.warn(`Camera ${cameraId} not found`);
      return null;
    }

    const wanted = QUALITY_CHANNEL[quality];
    const order = camera.channels.length > wanted ? [wanted] : FALLBACK_CHANNELS;

    for (const index of order) {
      const channel = camera.channels[index];
      if (!channel?.rtspAlias) {
        continue;
      }
      if (index !== wanted) {
        this.logger.warn(
          `Channel ${wanted} not available for ${camera.name}, falling back to channel ${index}`
        );
      }
      const rtspPort = bootstrap.nvr?.ports?.rtsp ?? DEFAULT_RTSP_PORT;
      return `rtsp://${this.host}:${rtspPort}/${channel.rtspAlias}`;
    }

    return null;
  }

  getCameraName(cameraId: string): string | null {
    return this.bootstrap?.cameras.find(camera => camera.id === cameraId)?.name ?? null;
  }

  /**
   * Motion events from the last `hours`, newest first. Failures are logged
   * and yield an empty list.
   */
  async getRecentMotionEvents(hours = 24, limit = 50): Promise<MotionEvent[]> {
    this.requireConnection();
    const end = Date.now();
    const start = end - hours * 3600 * 1000;
    const query = new URLSearchParams({
      start: String(start),
      end: String(end),
      types: 'motion',
      orderDirection: 'DESC',
      limit: String(limit)
    });
    const url = this.url(`/proxy/protect/api/events?${query.toString()}`);

    try {
      const response = await this.api.retrieve(url);
      if (!response?.ok) {
        throw new UpstreamRequestError(url, `HTTP ${response?.status ?? 'no response'}`, response?.status);
      }
      const events = z.array(ProtectEventSchema).parse(await response.json());
      return events
        .filter(event => event.type === 'motion' && event.camera)
        .slice(0, limit)
        .map(event => toMotionEvent(event, id => this.getCameraName(id)))
        .filter((event): event is MotionEvent => event !== null);
    } catch (error) {
      this.logger.error('Failed to fetch motion events', error);
      return [];
    }
  }

  /**
   * Forward realtime packets to `handlers`. Returns the unsubscribe function.
   */
  subscribeUpdates(handlers: UpdateHandlers): () => void {
    this.requireConnection();

    const listener = (packet: unknown): void => {
      const parsed = ProtectPacketSchema.safeParse(packet);
      if (!parsed.success) {
        this.logger.debug('Skipping unrecognised update packet');
        return;
      }
      const { action, modelKey, id } = parsed.data.header;
      handlers.onMessage({ action: { action, modelKey, id }, data: parsed.data.payload });
    };

    this.api.on('message', listener);
    this.subscriptions.add(handlers);

    return () => {
      this.subscriptions.delete(handlers);
      this.api.off('message', listener);
    };
  }

  /**
   * Log out and end every open subscription
   */
  async close(): Promise<void> {
    const open = Array.from(this.subscriptions);
    this.subscriptions.clear();
    for (const handlers of open) {
      handlers.onClose?.();
    }
    this.api.logout();
    this.bootstrap = null;
  }

  private requireConnection(): ProtectBootstrap {
    if (!this.bootstrap) {
      throw new Error('Client not connected. Call connect() first.');
    }
    return this.bootstrap;
  }

  private async refreshBootstrap(): Promise<ProtectBootstrap> {
    if (!(await this.api.getBootstrap())) {
      throw new UpstreamRequestError(this.url('/proxy/protect/api/bootstrap'), 'bootstrap unavailable');
    }
    this.bootstrap = ProtectBootstrapSchema.parse(this.api.bootstrap);
    return this.bootstrap;
  }

  private url(path: string): string {
    return `https://${this.host}${path}`;
  }
}
