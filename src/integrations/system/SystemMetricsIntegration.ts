/**
 * System metrics integration
 *
 * Local probe of the host the dashboard runs on: CPU usage between samples,
 * load averages, memory and uptime.
 */

import * as os from 'os';
import { z } from 'zod';
import { escapeHtml } from '../../utils/html.js';
import { BaseIntegration, type IntegrationMeta, type IntegrationOptions } from '../BaseIntegration.js';

export const SystemMetricsConfigSchema = z
  .object({
    label: z.string().optional(),
    warn_percent: z.number().min(0).max(100).default(80)
  })
  .passthrough();

export type SystemMetricsConfig = z.infer<typeof SystemMetricsConfigSchema>;

/** The slice of the os module the probe reads */
export type SystemProbe = Pick<typeof os, 'cpus' | 'loadavg' | 'totalmem' | 'freemem' | 'uptime' | 'hostname'>;

export interface SystemMetrics {
  hostname: string;
  uptimeSeconds: number;
  cpu: {
    cores: number;
    model: string;
    usagePercent: number;
  };
  load: [number, number, number];
  memory: {
    totalBytes: number;
    usedBytes: number;
    usagePercent: number;
  };
  warnPercent: number;
  timestamp: string;
}

interface CpuSample {
  idle: number;
  total: number;
}

function sampleCpu(cpus: os.CpuInfo[]): CpuSample {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * 93784 -> "1d 2h 3m"
 */
export function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  if (days > 0) {
    return `${days}d ${hours}h ${minutes}m`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m`;
}

function formatGiB(bytes: number): string {
  return (bytes / 1024 ** 3).toFixed(1);
}

export interface SystemMetricsOptions extends IntegrationOptions {
  probe?: SystemProbe;
}

export class SystemMetricsIntegration extends BaseIntegration<SystemMetricsConfig, SystemMetrics> {
  static readonly meta: IntegrationMeta = {
    name: 'system',
    displayName: 'System',
    refreshInterval: 5
  };

  private readonly probe: SystemProbe;
  private previousSample: CpuSample | null = null;

  constructor(credentials: Record<string, unknown> = {}, options: SystemMetricsOptions = {}) {
    super(SystemMetricsIntegration.meta, SystemMetricsConfigSchema, credentials, options);
    this.probe = options.probe ?? os;
  }

  async fetchData(): Promise<SystemMetrics> {
    const cpus = this.probe.cpus();
    const sample = sampleCpu(cpus);
    // First call reports the average since boot
    const base = this.previousSample ?? { idle: 0, total: 0 };
    this.previousSample = sample;

    const totalDelta = sample.total - base.total;
    const idleDelta = sample.idle - base.idle;
    const cpuPercent = totalDelta > 0 ? ((totalDelta - idleDelta) / totalDelta) * 100 : 0;

    const totalMem = this.probe.totalmem();
    const usedMem = totalMem - this.probe.freemem();
    const [load1 = 0, load5 = 0, load15 = 0] = this.probe.loadavg();

    return {
      hostname: this.config.label ?? this.probe.hostname(),
      uptimeSeconds: Math.floor(this.probe.uptime()),
      cpu: {
        cores: cpus.length,
        model: cpus[0]?.model.trim() ?? 'unknown',
        usagePercent: round1(cpuPercent)
      },
      load: [round1(load1), round1(load5), round1(load15)],
      memory: {
        totalBytes: totalMem,
        usedBytes: usedMem,
        usagePercent: totalMem > 0 ? round1((usedMem / totalMem) * 100) : 0
      },
      warnPercent: this.config.warn_percent,
      timestamp: new Date().toISOString()
    };
  }

  renderWidget(data: SystemMetrics): string {
    const bar = (label: string, percent: number, detail: string): string => {
      const level = percent >= data.warnPercent ? 'warn' : 'ok';
      return `<div class="metric metric-${level}">
    <div class="metric-header"><span>${escapeHtml(label)}</span><span>${percent}%</span></div>
    <div class="metric-bar"><div class="metric-fill" style="width: ${Math.min(100, percent)}%"></div></div>
    <div class="metric-detail">${escapeHtml(detail)}</div>
  </div>`;
    };

    return `<div class="system-widget">
  <div class="system-host">${escapeHtml(data.hostname)} &middot; up ${escapeHtml(formatUptime(data.uptimeSeconds))}</div>
  ${bar('CPU', data.cpu.usagePercent, `${data.cpu.cores} cores · load ${data.load.join(' / ')}`)}
  ${bar('Memory', data.memory.usagePercent, `${formatGiB(data.memory.usedBytes)} / ${formatGiB(data.memory.totalBytes)} GiB`)}
</div>`;
  }
}
