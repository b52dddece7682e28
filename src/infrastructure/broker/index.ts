export { default as brokerPlugin } from './broker-plugin.js';
export type { BrokerPluginOptions } from './broker-plugin.js';
export { createBrokerConnection, parseBrokerAddresses } from './connection.js';
export type { BrokerConnection, BrokerAddress } from './connection.js';
export { StreamPublisher } from './stream-publisher.js';
export { StreamTopicReader } from './stream-reader.js';
