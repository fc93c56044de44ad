export * from './standards';
export * from './logging/json-log';
export * from './messaging/contracts';
export * from './messaging/decoding';
export * from './messaging/ids';
export * from './messaging/retry-schedule';
export * from './messaging/topology';
export * from './messaging/rabbitmq-consumer';
export * from './messaging/rabbitmq-publisher-connection';
export * from './messaging/rabbitmq-queue-consumer';
