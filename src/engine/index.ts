/**
 * Home Dashboard - Engine Exports
 */

export { RefreshDriver, probeUpdateStream, type RefreshDriverOptions } from './RefreshDriver.js';
export { Broadcaster, type BroadcasterOptions } from './Broadcaster.js';
