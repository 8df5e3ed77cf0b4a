// Types
export * from './types/slot.js';
export * from './types/account.js';
export * from './types/forum.js';

// Schemas
export * from './schemas/slot.schema.js';
export * from './schemas/account.schema.js';
export * from './schemas/forum.schema.js';

// Utils
export * from './utils/dates.js';
export * from './utils/slots.js';
