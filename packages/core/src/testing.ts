/**
 * Test-only helpers. Kept out of the main entry point because they import vitest.
 */
export { createMockLogger } from './logger/test-utils.js';
