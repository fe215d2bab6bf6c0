/**
 * Infrastructure exports
 */

// Interfaces
export * from './interfaces';

// Real implementations
export { NodeFileSystem } from './fs-adapter';
