export * from './LogLevel';
export * from './LogEntry';
export * from './Formatter';
export * from './Transport';
export * from './ILogger';
export * from './Metadata';
export * from './EventRecord';
export * from './EventFormatter';
export * from './Layout';
