/**
 * Cameras integration - UniFi Protect camera feeds relayed through go2rtc.
 *
 * Clients are created lazily on first use. The update stream follows the
 * Protect realtime WebSocket and re-renders on camera and event changes.
 */

import { z } from 'zod';
import { sleep } from '../../utils/errors.js';
import { escapeHtml, formatClock } from '../../utils/html.js';
import { BaseIntegration, type IntegrationMeta, type IntegrationOptions } from '../BaseIntegration.js';
import { DEFAULT_GO2RTC_EXTERNAL_URL, DEFAULT_GO2RTC_URL, Go2RtcClient } from './Go2RtcClient.js';
import {
  StreamTypeSchema,
  streamNameFor,
  type CameraView,
  type CamerasData,
  type MotionEvent
} from './models.js';
import {
  ProtectEventSchema,
  UnifiProtectClient,
  toMotionEvent,
  type ProtectService,
  type ProtectUpdateMessage
} from './UnifiProtectClient.js';

export const CamerasConfigSchema = z
  .object({
    host: z.string().url(),
    username: z.string().min(1),
    password: z.string().min(1),
    go2rtc_url: z.string().url().default(DEFAULT_GO2RTC_URL),
    go2rtc_external_url: z.string().url().default(DEFAULT_GO2RTC_EXTERNAL_URL),
    default_stream_type: StreamTypeSchema.default('webrtc')
  })
  .passthrough();

export type CamerasConfig = z.infer<typeof CamerasConfigSchema>;

export type Go2RtcApi = Pick<Go2RtcClient, 'registerStream' | 'getStreamUrl' | 'checkHealth'>;

export interface CamerasIntegrationOptions extends IntegrationOptions {
  protect?: ProtectService;
  go2rtc?: Go2RtcApi;
  healthCheckAttempts?: number;
  healthCheckDelayMs?: number;
  now?: () => Date;
}

const MAX_MOTION_EVENTS = 20;
const INITIAL_EVENT_HOURS = 6;

/**
 * Buffers pushed socket messages until the stream consumer pulls them
 */
class MessageQueue<T> {
  private items: T[] = [];
  private waiter: (() => void) | null = null;
  private ended = false;

  push(item: T): void {
    if (this.ended) {
      return;
    }
    this.items.push(item);
    this.wake();
  }

  end(): void {
    this.ended = true;
    this.wake();
  }

  /** Next item, or null once ended and drained */
  async next(): Promise<T | null> {
    for (;;) {
      const item = this.items.shift();
      if (item !== undefined) {
        return item;
      }
      if (this.ended) {
        return null;
      }
      await new Promise<void>(resolve => {
        this.waiter = () => resolve();
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

export class CamerasIntegration extends BaseIntegration<CamerasConfig, CamerasData> {
  static readonly meta: IntegrationMeta = {
    name: 'unifi_protect',
    displayName: 'Cameras',
    refreshInterval: 30
  };

  private readonly protect: ProtectService;
  private readonly go2rtc: Go2RtcApi;
  private readonly healthCheckAttempts: number;
  private readonly healthCheckDelayMs: number;
  private readonly now: () => Date;

  private initializing: Promise<void> | null = null;
  private recentMotionEvents: MotionEvent[] = [];

  constructor(credentials: Record<string, unknown>, options: CamerasIntegrationOptions = {}) {
    super(CamerasIntegration.meta, CamerasConfigSchema, credentials, {
      ...options,
      secretFields: ['username', 'password']
    });

    const host = new URL(this.config.host);
    this.protect =
      options.protect ??
      new UnifiProtectClient({
        host: host.hostname,
        username: this.config.username,
        password: this.config.password,
        logger: this.logger.child('protect')
      });
    this.go2rtc =
      options.go2rtc ??
      new Go2RtcClient({
        baseUrl: this.config.go2rtc_url,
        externalUrl: this.config.go2rtc_external_url,
        logger: this.logger.child('go2rtc')
      });
    this.healthCheckAttempts = options.healthCheckAttempts ?? 10;
    this.healthCheckDelayMs = options.healthCheckDelayMs ?? 2000;
    this.now = options.now ?? (() => new Date());
  }

  async fetchData(): Promise<CamerasData> {
    await this.ensureInitialized();

    const streamType = this.config.default_stream_type;
    const cameras: CameraView[] = (await this.protect.getCameras()).map(camera => {
      const stream = streamNameFor(camera.name);
      return {
        ...camera,
        webrtcUrl: this.go2rtc.getStreamUrl(stream, 'webrtc'),
        mjpegUrl: this.go2rtc.getStreamUrl(stream, 'mjpeg'),
        hlsUrl: this.go2rtc.getStreamUrl(stream, 'hls')
      };
    });

    if (this.recentMotionEvents.length === 0) {
      this.recentMotionEvents = await this.protect.getRecentMotionEvents(
        INITIAL_EVENT_HOURS,
        MAX_MOTION_EVENTS
      );
    }

    return {
      cameras,
      recentMotionEvents: [...this.recentMotionEvents],
      defaultStreamType: streamType,
      go2rtcExternalUrl: this.config.go2rtc_external_url,
      timestamp: this.now().toISOString()
    };
  }

  override async *openUpdateStream(signal: AbortSignal): AsyncGenerator<CamerasData> {
    await this.ensureInitialized();
    yield await this.fetchData();

    const queue = new MessageQueue<ProtectUpdateMessage>();
    const unsubscribe = this.protect.subscribeUpdates({
      onMessage: message => queue.push(message),
      onClose: () => queue.end()
    });
    const onAbort = (): void => queue.end();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      for (;;) {
        const message = await queue.next();
        if (message === null) {
          return;
        }
        if (this.applyUpdate(message)) {
          yield await this.fetchData();
        }
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      unsubscribe();
    }
  }

  override async close(): Promise<void> {
    await this.protect.close();
    this.initializing = null;
  }

  /**
   * Fold one realtime message into local state. True when the widget
   * should re-render.
   */
  applyUpdate(message: ProtectUpdateMessage): boolean {
    const { action, data } = message;

    if (action.action === 'ping' || action.action === 'heartbeat') {
      return false;
    }

    if (action.modelKey === 'event') {
      if (action.action === 'add') {
        this.recordMotionEvent(data);
      }
      return true;
    }

    return action.modelKey === 'camera';
  }

  private recordMotionEvent(data: unknown): void {
    const parsed = ProtectEventSchema.safeParse(data);
    if (!parsed.success || parsed.data.type !== 'motion') {
      return;
    }

    const event = toMotionEvent(parsed.data, id => this.protect.getCameraName(id));
    if (!event) {
      return;
    }

    this.recentMotionEvents = [event, ...this.recentMotionEvents].slice(0, MAX_MOTION_EVENTS);
    this.logger.info(`Motion event captured: ${event.cameraName} at ${event.timestamp}`);
  }

  private ensureInitialized(): Promise<void> {
    if (!this.initializing) {
      this.initializing = this.initializeClients().catch((error: unknown) => {
        this.initializing = null;
        throw error;
      });
    }
    return this.initializing;
  }

  private async initializeClients(): Promise<void> {
    try {
      await this.protect.connect();
    } catch (error) {
      this.logger.error('Failed to connect to UniFi Protect', error);
      throw error;
    }

    await this.waitForGo2Rtc();
    await this.registerCameraStreams();
  }

  private async waitForGo2Rtc(): Promise<void> {
    for (let attempt = 1; attempt <= this.healthCheckAttempts; attempt++) {
      if (await this.go2rtc.checkHealth()) {
        this.logger.info('go2rtc is ready');
        return;
      }
      this.logger.info(`Waiting for go2rtc... (${attempt}/${this.healthCheckAttempts})`);
      if (attempt < this.healthCheckAttempts) {
        await sleep(this.healthCheckDelayMs);
      }
    }
    this.logger.warn('go2rtc health check failed, continuing anyway');
  }

  /**
   * Registration failures leave go2rtc proxying RTSP directly
   */
  private async registerCameraStreams(): Promise<void> {
    try {
      const cameras = await this.protect.getCameras();
      this.logger.info(`Found ${cameras.length} cameras`);

      let registered = 0;
      for (const camera of cameras) {
        const rtspUrl = this.protect.getCameraRtspUrl(camera.id, 'low');
        if (!rtspUrl) {
          this.logger.warn(`No RTSP URL for camera ${camera.name}`);
          continue;
        }
        if (await this.go2rtc.registerStream(streamNameFor(camera.name), rtspUrl)) {
          registered++;
        }
      }

      if (registered > 0) {
        this.logger.info(`Registered ${registered}/${cameras.length} camera streams`);
      } else {
        this.logger.info('No streams registered with go2rtc (using direct RTSP proxying)');
      }
    } catch (error) {
      this.logger.warn('Stream registration failed, using direct RTSP proxying', error);
    }
  }

  renderWidget(data: CamerasData): string {
    const renderStream = (camera: CameraView): string => {
      switch (data.defaultStreamType) {
        case 'mjpeg':
          return `<img class="camera-stream" src="${escapeHtml(camera.mjpegUrl)}" alt="${escapeHtml(camera.name)}">`;
        case 'hls':
          return `<video class="camera-stream" src="${escapeHtml(camera.hlsUrl)}" autoplay muted playsinline></video>`;
        case 'webrtc':
          return `<video class="camera-stream" data-webrtc-src="${escapeHtml(camera.webrtcUrl)}" autoplay muted playsinline></video>`;
      }
    };

    const cards = data.cameras
      .map(camera => `<div class="camera camera-${camera.status}" data-camera-id="${escapeHtml(camera.id)}">
    ${camera.status === 'online' ? renderStream(camera) : '<div class="camera-offline">Offline</div>'}
    <div class="camera-label">
      <span class="camera-name">${escapeHtml(camera.name)}</span>${camera.isRecording ? '<span class="camera-rec">REC</span>' : ''}${camera.motionDetected ? '<span class="camera-motion">Motion</span>' : ''}
    </div>
  </div>`)
      .join('\n  ');

    const events = data.recentMotionEvents
      .slice(0, 5)
      .map(event => `<li><span class="event-camera">${escapeHtml(event.cameraName)}</span> <time datetime="${escapeHtml(event.timestamp)}">${formatClock(new Date(event.timestamp))}</time></li>`)
      .join('');

    return `<div class="cameras-widget">
  ${cards || '<p class="empty">No cameras</p>'}
  ${events ? `<ul class="motion-events">${events}</ul>` : ''}
</div>`;
  }
}
