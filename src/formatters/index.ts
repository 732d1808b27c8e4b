export * from './TextFormatter';
export * from './MessageTemplate';
export * from './LayoutRenderer';
