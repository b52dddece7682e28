export { decodeEvent, ZERO_TIMESTAMP } from './event-schema.js';
export type { DecodeResult, DecodeIssue } from './event-schema.js';
export { resolveOrigin, createRouter, routingPath } from './routing.js';
export type { Router } from './routing.js';
export { mathRandom, seededRandom } from './random.js';
export { buildUpstreamUrl } from './upstream-url.js';
