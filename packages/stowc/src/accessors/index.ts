export {
  createAccessor,
  type Accessor,
  type AccessorOptions,
  type Cell,
  type StorageMapAccessor,
} from "./accessor.js";
export {
  DEFAULT_STORAGE_MAP_PREFIX,
  MemoryStore,
  cellStoreKey,
  mapEntryStoreKey,
  type KeyValueStore,
} from "./store.js";
export {
  Error as StorageError,
  ErrorCode as StorageErrorCode,
  ErrorMessages as StorageErrorMessages,
} from "./errors.js";
