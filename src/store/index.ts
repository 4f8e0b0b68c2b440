export { articleIdentity, createFileSeenStore, serializeSeenSet, type SeenStore } from './seen-store.js';
export { SeenStoreError } from './errors.js';
