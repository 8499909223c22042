/**
 * HRRR Inventory — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types
export * from './types';
export * from './enums';
export * from './errors';

// Forecast hours & cycles
export * from './forecast-hours';
export * from './cycle';

// Templates
export * from './expander';
export * from './registry';
export * from './cycle-run';

// Requests & identifiers
export * from './region';
export * from './ids';

// Digests
export * from './canonical';
export * from './hash';
export * from './digest';

export * from './config';
