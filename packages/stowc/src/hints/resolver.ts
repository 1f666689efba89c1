/**
 * Storable hint resolution
 *
 * Decides, field by field, whether a composite's field is encoded inline
 * into the composite's own cell or placed in a cell of its own, and which
 * key that cell has.
 */

import { labelledFields } from "#classifier";
import { Frame, LayoutError, ErrorCode, ErrorMessages } from "#checker";
import {
  FieldPath,
  allocate,
  formatKey,
  type StorageKey,
} from "#keys";
import { Packedness, Type, Types, type Lookup } from "#types";
import { Result } from "#result";

export type Strategy = Strategy.Inline | Strategy.Cell;

export namespace Strategy {
  export interface Inline {
    kind: "inline";
    /** Ordinal among the inline fields of the same encoding */
    position: number;
    /** Static byte offset, when every preceding inline field is fixed-size */
    offset?: number;
  }

  export interface Cell {
    kind: "cell";
    key: StorageKey;
    manual: boolean;
  }

  export const isInline = (strategy: Strategy): strategy is Inline =>
    strategy.kind === "inline";

  export const isCell = (strategy: Strategy): strategy is Cell =>
    strategy.kind === "cell";
}

export interface Hint {
  field: Type.Field;
  /** `field`, or `Variant.field` for enum fields */
  label: string;
  variant?: Type.Variant;
  path: FieldPath;
  packedness: Packedness;
  strategy: Strategy;
}

export interface ResolveOptions {
  /** Packedness of an already classified field type */
  packedness: (type: Type) => Packedness;
  lookup: Lookup;
}

/**
 * Resolves the hints of every field of a composite stored at `parentKey`,
 * in declaration order (variant by variant for enums).
 *
 * Every cell of the composite shares one key scope with the composite's own
 * cell; a repeated key is a `ManualKeyCollision`.
 */
export function resolveHints(
  type: Type.Composite,
  parentKey: StorageKey,
  options: ResolveOptions,
): Result<Hint[], LayoutError> {
  const hints: Hint[] = [];
  const owners = new Map<StorageKey, string>([
    [parentKey, `${type.name} (own cell)`],
  ]);
  const errors: LayoutError[] = [];

  const layouts = new Map<Type.Variant | undefined, InlineLayout>();

  for (const { label, variant, field } of labelledFields(type)) {
    const packedness = options.packedness(field.type);
    const path = variant
      ? FieldPath.variant(type.name, variant.name, variant.discriminant, field.name)
      : FieldPath.struct(type.name, field.name);

    if (packedness === Packedness.Packed && field.key === undefined) {
      let layout = layouts.get(variant);
      if (!layout) {
        layout = new InlineLayout(variant ? 1 : 0);
        layouts.set(variant, layout);
      }
      hints.push({
        field,
        label,
        variant,
        path,
        packedness,
        strategy: layout.next(Types.fixedSize(field.type, options.lookup)),
      });
      continue;
    }

    const key = allocate(parentKey, path, field.key);
    const owner = owners.get(key);
    if (owner !== undefined) {
      errors.push(
        new LayoutError(
          ErrorCode.MANUAL_KEY_COLLISION,
          ErrorMessages.KEY_COLLISION(formatKey(key), owner, label),
          [Frame.field(type.name, label), Frame.declaration(type.name)],
        ),
      );
      continue;
    }
    owners.set(key, label);

    hints.push({
      field,
      label,
      variant,
      path,
      packedness,
      strategy: { kind: "cell", key, manual: field.key !== undefined },
    });
  }

  if (errors.length > 0) {
    return Result.err(errors);
  }
  return Result.ok(hints);
}

/**
 * Inline fields of a struct, or of one variant of an enum
 */
export function inlineFields(
  hints: readonly Hint[],
  variant?: Type.Variant,
): Type.Field[] {
  return hints
    .filter(
      (hint) =>
        Strategy.isInline(hint.strategy) && hint.variant?.name === variant?.name,
    )
    .map((hint) => hint.field);
}

/**
 * Hints of the fields that own cells
 */
export function cellHints(
  hints: readonly Hint[],
): (Hint & { strategy: Strategy.Cell })[] {
  return hints.filter(
    (hint): hint is Hint & { strategy: Strategy.Cell } =>
      Strategy.isCell(hint.strategy),
  );
}

class InlineLayout {
  private position = 0;
  private offset: number | undefined;

  constructor(start: number) {
    this.offset = start;
  }

  next(size: number | undefined): Strategy.Inline {
    const strategy: Strategy.Inline = {
      kind: "inline",
      position: this.position++,
      ...(this.offset !== undefined ? { offset: this.offset } : {}),
    };
    this.offset =
      this.offset !== undefined && size !== undefined
        ? this.offset + size
        : undefined;
    return strategy;
  }
}
