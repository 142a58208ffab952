// Domain exports
export * from './domain/entities/index.ts';
export * from './domain/value-objects/index.ts';

// Application ports
export * from './application/ports/index.ts';

// Infrastructure
export * from './infrastructure/index.ts';
