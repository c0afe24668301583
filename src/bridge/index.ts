// Types
export type { MessageBridgeOptions, BridgeResult } from './types.js';

// Classes
export { MessageBridge } from './message-bridge.js';

export { filterContent } from './filter.js';
