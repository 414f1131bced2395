export {
  createMemoryObjectStore,
  type MemoryObject,
  type MemoryObjectStore,
  type MemoryObjectStoreOptions,
  type StoreCall,
} from "./memory-store.js";
