export { loadGatewayConfig, resolveMigrationPercent } from './gateway-config.js';
export type { GatewayConfig } from './gateway-config.js';
export { loadEventsConfig } from './events-config.js';
export type { EventsConfig } from './events-config.js';
export type { Env, LoadedConfig } from './env.js';
