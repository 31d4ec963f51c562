/**
 * @file index.ts
 * @description Entry point for the shared TabBridge module, exporting protocol types, data models,
 * the logger and the error taxonomy.
 * @module TabBridge/Shared
 */

export * from './data-models';
export * from './protocol-types';
export * from './logger';
export * from './error-types';
