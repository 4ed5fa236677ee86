/**
 * Example integration - demonstrates the integration pattern.
 *
 * Needs no external API: shows the current time, a configurable message and
 * a few random stats. Copy this when writing a new integration.
 */

import { z } from 'zod';
import { escapeHtml } from '../../utils/html.js';
import { BaseIntegration, type IntegrationMeta, type IntegrationOptions } from '../BaseIntegration.js';

export const ExampleConfigSchema = z
  .object({
    message: z.string().default('Welcome to Dashboard')
  })
  .passthrough();

export type ExampleConfig = z.infer<typeof ExampleConfigSchema>;

export interface ExampleStat {
  label: string;
  value: number;
  unit: string;
}

export interface ExampleData {
  currentTime: string;
  currentDate: string;
  message: string;
  stats: ExampleStat[];
}

export interface ExampleIntegrationOptions extends IntegrationOptions {
  now?: () => Date;
  random?: () => number;
}

export class ExampleIntegration extends BaseIntegration<ExampleConfig, ExampleData> {
  static readonly meta: IntegrationMeta = {
    name: 'example',
    displayName: 'Example Widget',
    refreshInterval: 5
  };

  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(credentials: Record<string, unknown> = {}, options: ExampleIntegrationOptions = {}) {
    super(ExampleIntegration.meta, ExampleConfigSchema, credentials, options);
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  async fetchData(): Promise<ExampleData> {
    const now = this.now();
    return {
      currentTime: now.toLocaleTimeString('en-GB', { hour12: false }),
      currentDate: now.toLocaleDateString('en-US', {
        weekday: 'long',
        year: 'numeric',
        month: 'long',
        day: '2-digit'
      }),
      message: this.config.message,
      stats: [
        { label: 'CPU', value: this.randomInt(10, 90), unit: '%' },
        { label: 'Memory', value: this.randomInt(30, 80), unit: '%' },
        { label: 'Temp', value: this.randomInt(40, 70), unit: '°C' }
      ]
    };
  }

  renderWidget(data: ExampleData): string {
    const stats = data.stats
      .map(
        stat => `<div class="stat"><span class="stat-label">${escapeHtml(stat.label)}</span>` +
          `<span class="stat-value">${stat.value}${escapeHtml(stat.unit)}</span></div>`
      )
      .join('');

    return `<div class="example-widget">
  <div class="clock">${escapeHtml(data.currentTime)}</div>
  <div class="date">${escapeHtml(data.currentDate)}</div>
  <p class="message">${escapeHtml(data.message)}</p>
  <div class="stats">${stats}</div>
</div>`;
  }

  /** Inclusive range */
  private randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }
}
