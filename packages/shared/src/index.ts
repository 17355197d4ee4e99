/**
 * Shared types for the labelpath verifier and its tools
 * @packageDocumentation
 */

export * from './types/network';
export * from './types/simulation';
export * from './types/graph';
