export { default as eventRoutes } from './event-routes.js';
export { default as gatewayRoutes, HEALTH_BODY } from './gateway-routes.js';
export type { GatewayRoutesOptions } from './gateway-routes.js';
export { buildEventsApp } from './events-app.js';
export type { EventsAppOptions } from './events-app.js';
export { buildGatewayApp } from './gateway-app.js';
export type { GatewayAppOptions } from './gateway-app.js';
