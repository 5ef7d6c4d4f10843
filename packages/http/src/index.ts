// Request execution pipeline and benchmark engine
export * from './client.js';

export * from './executor.js';

export * from './middleware.js';

export * from './models.js';

export * from './types.js';

export { createHttpEffects } from './effects.js';

// Export pure functional core functions
export * from './core/http-utils.js';
export * from './core/rate-limit.js';
export * from './core/statistics.js';
export * from './core/types.js';
