/**
 * Main components export file
 */

// Shared interfaces and utilities
export * from './shared';

// Template composition
export * from './template';
export * from './parameter-binding';
export * from './environment';
