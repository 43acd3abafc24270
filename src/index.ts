// Types
export * from './types/index.js';

// Core components
export * from './core/index.js';

// Evaluation
export * from './evaluation/index.js';

// Utils
export * from './utils/index.js';

// Validation
export * from './validation/index.js';

// Debugging
export * from './debugging/index.js';

// YAML loading
export * from './dsl/index.js';

// Advisory facade nad vestavěnou knihovnou pravidel
export * from './advisory/index.js';
