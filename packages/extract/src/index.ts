export * from './captures';
export * from './deserializer';
export * from './errors';
export * from './path';
export * from './percent';
export * from './rejection';
export * from './shapes';
