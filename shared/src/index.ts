/**
 * @gantry/shared - Shared types and utilities for the runner dispatcher
 *
 * This package provides:
 * - Type definitions for runners, jobs, bandit state and configuration
 * - NATS subject patterns and client utilities
 * - A leveled console logger
 */

// Re-export all types
export * from './types/index.js';

// Re-export NATS utilities
export * from './nats/index.js';

// Logging
export * from './logging.js';
