/**
 * Circuit Tutor - Data Models
 *
 * Barrel export for all model interfaces.
 */

// Document and page index models
export * from './document.js';

// Query models
export * from './query.js';

// Response envelope
export * from './envelope.js';
