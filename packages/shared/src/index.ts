// Types
export * from './types.js';

// Result helpers
export * from './result.js';

// Configuration
export { loadConfig, ConfigError, DEFAULT_CONFIG_PATH, type LoadConfigOptions } from './config.js';

// Medium client
export { MediumClient, imageContentType, type MediumClientOptions } from './medium-client.js';
