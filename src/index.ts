/**
 * Engine-agnostic game development primitives: control state tracking,
 * grid math, easing, weighted picking and hashing.
 */

export * from './controls/index';
export * from './grids/index';
export * from './input/index';
export * from './util/index';
export { LIBRARY_DEFAULTS, LOG_LEVEL_ENV_KEY, resolveLogLevel, type LibraryDefaults } from './config/library';
