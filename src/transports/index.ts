export * from './ConsoleTransport';
export * from './HECTransport';
