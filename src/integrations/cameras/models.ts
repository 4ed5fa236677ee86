/**
 * Camera and motion event shapes shared by the Protect client, the go2rtc
 * client and the cameras widget.
 */

import { z } from 'zod';

export const StreamTypeSchema = z.enum(['webrtc', 'mjpeg', 'hls']);

export type StreamType = z.infer<typeof StreamTypeSchema>;

export const CameraStatusSchema = z.enum(['online', 'offline', 'unknown']);

export type CameraStatus = z.infer<typeof CameraStatusSchema>;

export interface CameraInfo {
  id: string;
  name: string;
  status: CameraStatus;
  isRecording: boolean;
  motionDetected: boolean;
  lastMotion: string | null;
  model: string | null;
  firmwareVersion: string | null;
  resolution: string | null;
}

export interface MotionEvent {
  cameraId: string;
  cameraName: string;
  timestamp: string;
  /** 0-100 */
  score: number | null;
}

export interface CameraView extends CameraInfo {
  webrtcUrl: string;
  mjpegUrl: string;
  hlsUrl: string;
}

export interface CamerasData {
  cameras: CameraView[];
  recentMotionEvents: MotionEvent[];
  defaultStreamType: StreamType;
  go2rtcExternalUrl: string;
  timestamp: string;
}

/**
 * Stream name go2rtc knows a camera by: lowercase, spaces to underscores
 */
export function streamNameFor(cameraName: string): string {
  return cameraName.toLowerCase().replace(/ /g, '_');
}
