/**
 * Dashboard configuration file schemas (config.toml / credentials.toml)
 */

import { z } from 'zod';

export const WidgetPositionSchema = z
  .object({
    row: z.number().int().nonnegative().optional(),
    col: z.number().int().nonnegative().optional(),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional()
  })
  .passthrough();

export type WidgetPosition = z.infer<typeof WidgetPositionSchema>;

export const WidgetConfigSchema = z
  .object({
    integration: z.string().min(1).optional(),
    enabled: z.boolean().default(true),
    position: WidgetPositionSchema.default({})
  })
  .passthrough();

export type WidgetConfig = z.infer<typeof WidgetConfigSchema>;

export const LayoutConfigSchema = z
  .object({
    columns: z.number().int().positive().default(3),
    widgets: z.array(WidgetConfigSchema).default([])
  })
  .passthrough();

export type LayoutConfig = z.infer<typeof LayoutConfigSchema>;

export const DashboardSettingsSchema = z
  .object({
    title: z.string().default('Home Dashboard'),
    theme: z.string().default('industrial'),
    refresh_interval: z.number().int().positive().default(30)
  })
  .passthrough();

export type DashboardSettings = z.infer<typeof DashboardSettingsSchema>;

export const AppConfigSchema = z
  .object({
    dashboard: DashboardSettingsSchema.default({}),
    layout: LayoutConfigSchema.default({})
  })
  .passthrough();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const CredentialsSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export type Credentials = z.infer<typeof CredentialsSchema>;

/**
 * Flatten zod issues into "path: message" strings
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
