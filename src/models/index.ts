/**
 * Models layer exports for Overdrive session structures.
 */

export * from './enums';
export * from './notifications';
