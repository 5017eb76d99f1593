// Types
export * from './types/api.js';
export * from './types/event.js';
export * from './types/site.js';

// Errors
export * from './errors.js';

// Utils
export * from './utils/classify.js';
export * from './utils/format.js';
