/**
 * SIP Pipeline - Data Models
 *
 * Barrel export for all model interfaces.
 */

// OAIS object graph
export * from './sip.js';

// Descriptive metadata
export * from './dublin-core.js';

// Fixity assertions and results
export * from './fixity.js';
