/**
 * Supervisor module exports
 */

export { ConnectionRegistry, type Session } from './ConnectionRegistry.js';
export { WidgetSupervisor, type WidgetSupervisorOptions } from './WidgetSupervisor.js';
