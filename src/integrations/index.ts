export { BaseIntegration } from './BaseIntegration.js';
export type { IntegrationMeta, IntegrationOptions } from './BaseIntegration.js';
export { discoverIntegrations, loadIntegration, loadAllIntegrations } from './registry.js';
export type { Integration, IntegrationFactory, IntegrationRegistry } from './registry.js';
export { ExampleIntegration } from './example/ExampleIntegration.js';
export { SystemMetricsIntegration } from './system/SystemMetricsIntegration.js';
export { TodoistIntegration } from './todoist/TodoistIntegration.js';
export { TodoistClient } from './todoist/TodoistClient.js';
export { CamerasIntegration } from './cameras/CamerasIntegration.js';
export { Go2RtcClient } from './cameras/Go2RtcClient.js';
export { UnifiProtectClient } from './cameras/UnifiProtectClient.js';
