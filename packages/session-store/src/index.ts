/**
 * @fileoverview Public API for @price-sentinel/session-store.
 */

export { FileSessionStore, sessionFilePath } from './file-session-store.js';
export { sessionFileSchema, toSessionFile, fromSessionFile } from './schema.js';
export type { FileSessionStoreOptions } from './file-session-store.js';
export type { SessionFile } from './schema.js';
export type { SessionStore } from './types.js';
