/**
 * Types module - exports all type definitions
 *
 * @module types
 * @version 1.0.0
 */

// Sources, corpus, synthesis, plans and stored records
export * from './research.js';

// Error codes for configuration and tool-layer failures
export * from './errors.js';
