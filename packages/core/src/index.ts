export * from './codec-types.js';
export * from './codec-errors.js';
export * from './codec-interfaces.js';

// Dictionaries and their persistence
export * from './dictionary.js';
export * from './dictionary-set.js';

// Stages and the pure pipeline
export * from './segments.js';
export * from './token-stage.js';
export * from './zero-run-stage.js';
export * from './pipeline.js';

// Facade, configuration and training
export * from './statistics.js';
export * from './codec-factory.js';
export * from './calldata-compressor.js';
export * from './training.js';
export * from './calldata.js';
