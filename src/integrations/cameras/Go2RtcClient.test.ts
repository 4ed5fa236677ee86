import { describe, it, expect } from 'vitest';
import { Go2RtcClient } from './Go2RtcClient.js';
import { streamNameFor } from './models.js';
import { silentLogger } from '../../utils/logger.js';

interface RecordedRequest {
  url: string;
  method?: string;
  body?: string;
}

function fakeFetch(respond: (request: RecordedRequest) => Response) {
  const requests: RecordedRequest[] = [];
  const impl: typeof fetch = async (input, init) => {
    const request = {
      url: String(input),
      method: init?.method,
      body: typeof init?.body === 'string' ? init.body : undefined
    };
    requests.push(request);
    return respond(request);
  };
  return { impl, requests };
}

const failing: typeof fetch = async () => {
  throw new TypeError('fetch failed');
};

describe('streamNameFor', () => {
  it('should lowercase and replace spaces', () => {
    expect(streamNameFor('Front Door Cam')).toBe('front_door_cam');
  });
});

describe('Go2RtcClient', () => {
  it('should build playback URLs from the external URL', () => {
    const client = new Go2RtcClient({ externalUrl: 'https://cams.example.test/', logger: silentLogger });

    expect(client.getStreamUrl('front_door', 'webrtc')).toBe('wss://cams.example.test/api/ws?src=front_door');
    expect(client.getStreamUrl('front_door', 'mjpeg')).toBe(
      'https://cams.example.test/api/stream.mjpeg?src=front_door'
    );
    expect(client.getStreamUrl('front_door', 'hls')).toBe(
      'https://cams.example.test/api/stream.m3u8?src=front_door'
    );
  });

  it('should encode a direct RTSP source', () => {
    const client = new Go2RtcClient({ logger: silentLogger });

    expect(client.getStreamUrl('ignored', 'webrtc', 'rtsp://nvr:7447/abc')).toBe(
      'ws://localhost:1984/api/ws?src=rtsp%3A%2F%2Fnvr%3A7447%2Fabc'
    );
  });

  it('should register a stream through the config API', async () => {
    const { impl, requests } = fakeFetch(() => new Response(null, { status: 200 }));
    const client = new Go2RtcClient({ fetch: impl, logger: silentLogger });

    expect(await client.registerStream('garage', 'rtsp://nvr:7447/xyz')).toBe(true);
    expect(requests).toEqual([
      {
        url: 'http://go2rtc:1984/api/config',
        method: 'PATCH',
        body: '{"streams":{"garage":["rtsp://nvr:7447/xyz"]}}'
      }
    ]);
  });

  it('should report a refused registration', async () => {
    const { impl } = fakeFetch(() => new Response('read-only', { status: 500 }));
    const client = new Go2RtcClient({ fetch: impl, logger: silentLogger });

    expect(await client.registerStream('garage', 'rtsp://nvr:7447/xyz')).toBe(false);
  });

  it('should report an unreachable relay as unhealthy', async () => {
    const client = new Go2RtcClient({ fetch: failing, logger: silentLogger });

    expect(await client.checkHealth()).toBe(false);
    expect(await client.registerStream('garage', 'rtsp://nvr:7447/xyz')).toBe(false);
  });

  it('should check health against the streams endpoint', async () => {
    const { impl, requests } = fakeFetch(() => new Response('{}', { status: 200 }));
    const client = new Go2RtcClient({ baseUrl: 'http://relay.test:1984', fetch: impl, logger: silentLogger });

    expect(await client.checkHealth()).toBe(true);
    expect(requests[0]).toEqual({ url: 'http://relay.test:1984/api/streams', method: 'GET', body: undefined });
  });

  it('should list streams as an object', async () => {
    const { impl } = fakeFetch(() => new Response('{"garage":{"producers":[]}}', { status: 200 }));
    const client = new Go2RtcClient({ fetch: impl, logger: silentLogger });

    expect(await client.listStreams()).toEqual({ garage: { producers: [] } });
  });

  it('should list no streams for a non-object body or an error status', async () => {
    const array = new Go2RtcClient({ fetch: fakeFetch(() => new Response('[]')).impl, logger: silentLogger });
    const error = new Go2RtcClient({
      fetch: fakeFetch(() => new Response('', { status: 503 })).impl,
      logger: silentLogger
    });

    expect(await array.listStreams()).toEqual({});
    expect(await error.listStreams()).toEqual({});
  });

  it('should treat a dropped connection during restart as success', async () => {
    const client = new Go2RtcClient({ fetch: failing, logger: silentLogger });

    expect(await client.restart()).toBe(true);
  });
});
