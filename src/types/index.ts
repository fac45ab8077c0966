/**
 * Core type definitions for the compose security audit.
 * Provides the Result type for expected failures and the Finding model.
 */

export * from './core';
export * from './finding';
