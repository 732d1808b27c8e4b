export * from './EventBuffer';
export * from './EventSerializer';
export * from './HECBatch';
export * from './ErrorReporter';
export * from './MetadataCache';
export * from './hostName';
export * from './options';
export * from './dispatcher';
export * from './HECClient';
