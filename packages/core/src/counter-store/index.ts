export { InMemoryCounterStore } from "./in-memory.js";
export type { InMemoryCounterStoreOptions } from "./in-memory.js";
export type { CounterStore, StoreOperation } from "./store.js";
