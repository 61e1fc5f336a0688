/**
 * @qos-policy/core
 *
 * Shared error and logging primitives for the QoS policy packages.
 */

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';
