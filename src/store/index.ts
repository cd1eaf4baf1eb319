export { MemoryItemStore } from "./memory.js";
export { canTransition } from "./lifecycle.js";
export type { ItemStore } from "./types.js";
