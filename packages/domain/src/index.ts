export * from './artifacts.js';
export * from './classifier.js';
export * from './collaborators.js';
export * from './consistency.js';
export * from './coordinator.js';
export * from './diff.js';
export * from './errors.js';
export * from './java-fixers.js';
export * from './openapi-fixers.js';
export * from './pool.js';
export * from './publisher.js';
export * from './review-commands.js';
export * from './review.js';
export * from './strategies.js';
export * from './taxonomy.js';
export * from './types.js';
export * from './validation.js';
export * from './violations.js';
