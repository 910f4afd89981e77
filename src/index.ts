/**
 * specrun public API.
 * Run structured Given/When/Then specifications against a real browser.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './browser/index.js';
export * from './config/index.js';
export * from './tasks/index.js';
export * from './report/index.js';
