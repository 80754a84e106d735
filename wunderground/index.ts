/**
 * Wunderground Client: Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Domain and wire types
export * from './types';
export * from './schema';
export * from './units';

// Errors
export * from './errors';

// Transport
export * from './http';

// Pipeline steps
export * from './credentials';
export * from './fetcher';
export * from './convert';
export * from './observe';
