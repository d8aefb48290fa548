export { InMemorySessionStore } from './store.js';
export type { SessionStore } from './store.js';
