/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up by one of these symbols. Symbols
 * cannot collide with a stray string key and stay out of JSON output.
 * Grouped by layer so a new registration has an obvious home.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  DatabasePools: Symbol.for('DatabasePools'),

  // Services
  ResponseBuilder: Symbol.for('ResponseBuilder'),
  UserService: Symbol.for('UserService'),
  HealthService: Symbol.for('HealthService'),
} as const;
