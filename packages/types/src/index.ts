// Zod schemas and inferred record types
export * from './schemas/index.js';

// Normalizers, reference-token grammar, constants
export * from './utils/index.js';

export * from './errors.js';
export * from './logger.js';
