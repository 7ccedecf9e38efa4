/**
 * Document Store API
 */

export * from './types.js';
export { DocumentStoreImpl, createDocumentStore } from './document-store.js';
