/**
 * go2rtc client
 *
 * Registers RTSP sources with the media relay and builds the browser-facing
 * playback URLs for each stream type.
 */

import { createLogger, type Logger } from '../../utils/logger.js';
import type { StreamType } from './models.js';

export const DEFAULT_GO2RTC_URL = 'http://go2rtc:1984';
export const DEFAULT_GO2RTC_EXTERNAL_URL = 'http://localhost:1984';

export interface Go2RtcClientOptions {
  /** Internal URL the server talks to */
  baseUrl?: string;
  /** URL the browser uses for playback */
  externalUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const trimSlash = (url: string): string => url.replace(/\/+$/, '');

export class Go2RtcClient {
  readonly baseUrl: string;
  readonly externalUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: Go2RtcClientOptions = {}) {
    this.baseUrl = trimSlash(options.baseUrl ?? DEFAULT_GO2RTC_URL);
    this.externalUrl = trimSlash(options.externalUrl ?? DEFAULT_GO2RTC_EXTERNAL_URL);
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger('go2rtc');
  }

  /**
   * Register an RTSP source under `name`. Returns false when go2rtc refuses,
   * e.g. because its config is read-only; direct RTSP proxying still works.
   */
  async registerStream(name: string, rtspUrl: string): Promise<boolean> {
    try {
      const response = await this.send('/api/config', {
        method: 'PATCH',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ streams: { [name]: [rtspUrl] } })
      });
      if (!response.ok) {
        this.logger.warn(
          `Could not register stream for ${name} (go2rtc config may be read-only): ${response.status}`
        );
        return false;
      }
      this.logger.info(`Registered stream for camera: ${name}`);
      return true;
    } catch (error) {
      this.logger.warn(`Failed to register stream for ${name}`, error);
      return false;
    }
  }

  /**
   * Playback URL for a stream. With `rtspUrl` go2rtc proxies that source
   * directly instead of a registered stream name.
   */
  getStreamUrl(name: string, type: StreamType, rtspUrl?: string): string {
    const src = encodeURIComponent(rtspUrl ?? name);

    switch (type) {
      case 'webrtc': {
        const wsUrl = this.externalUrl
          .replace(/^https:\/\//, 'wss://')
          .replace(/^http:\/\//, 'ws://');
        return `${wsUrl}/api/ws?src=${src}`;
      }
      case 'mjpeg':
        return `${this.externalUrl}/api/stream.mjpeg?src=${src}`;
      case 'hls':
        return `${this.externalUrl}/api/stream.m3u8?src=${src}`;
    }
  }

  async checkHealth(): Promise<boolean> {
    try {
      const response = await this.send('/api/streams', { method: 'GET' });
      return response.status === 200;
    } catch {
      return false;
    }
  }

  async listStreams(): Promise<Record<string, unknown>> {
    try {
      const response = await this.send('/api/streams', { method: 'GET' });
      if (!response.ok) {
        this.logger.error(`Failed to list streams: HTTP ${response.status}`);
        return {};
      }
      const body: unknown = await response.json();
      if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return {};
      }
      return Object.fromEntries(Object.entries(body));
    } catch (error) {
      this.logger.error('Failed to list streams', error);
      return {};
    }
  }

  /**
   * Restart go2rtc to apply config changes. A dropped connection counts as
   * success since the process goes away mid-response.
   */
  async restart(): Promise<boolean> {
    try {
      const response = await this.send('/api/restart', { method: 'POST' });
      return response.status === 200;
    } catch (error) {
      if (error instanceof TypeError) {
        this.logger.info('go2rtc restart triggered (connection closed)');
        return true;
      }
      this.logger.warn('Failed to restart go2rtc', error);
      return false;
    }
  }

  private send(path: string, init: RequestInit): Promise<Response> {
    return this.fetchImpl(`${this.baseUrl}${path}`, {
      ...init,
      signal: AbortSignal.timeout(this.timeoutMs)
    });
  }
}
