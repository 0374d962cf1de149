/**
 * @archconf/types - Type definitions for the archive configuration converter
 */

// Record model
export * from './records.js';

// Output channels
export * from './channels.js';

// Logging
export * from './logging.js';
