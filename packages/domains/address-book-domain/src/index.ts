export * from './commands/index.js';
export * from './entities/index.js';
export * from './repositories/index.js';
export * from './services/index.js';
export * from './value-objects/index.js';
