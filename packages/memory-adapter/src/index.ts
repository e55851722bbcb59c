export { type MemoryAdapterOptions, memoryAdapter } from "./adapter.js";
