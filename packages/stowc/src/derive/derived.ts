import type { Accessor, KeyValueStore } from "#accessors";
import type { Hint, Storable } from "#hints";
import type { StorageKey } from "#keys";

/**
 * Everything derived for one storable type
 */
export interface Derived extends Storable {
  /** Key the type is laid out at when it is the root of storage */
  key: StorageKey;
  /** Hints at `key` */
  hints: Hint[];
  accessor(store: KeyValueStore, key?: StorageKey): Accessor;
}
