/**
 * Validation layer: Zod schemas plus helpers that raise ConfigurationErrors
 *
 * @license MIT
 */

export * from './schemas.js';
export * from './runtime-validator.js';
