// Types
export * from './types/transaction-event.js';

// Schemas
export * from './schemas/transaction-row.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/decimal-utils.js';
export * from './utils/zod-utils.js';
