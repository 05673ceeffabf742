/**
 * Shared enums, data types and reason codes for the sealing and L1 submission pipeline.
 * Only items exported here are part of the package surface.
 */
export * from './enums';
export * from './reasons';
export * from './types';
