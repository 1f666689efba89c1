/**
 * Whether a type's value is encoded inline into its parent's bytes or owns
 * storage cells of its own
 */
export enum Packedness {
  Packed = "packed",
  NonPacked = "non-packed",
}
