/**
 * Type factories and utilities for the stowc type system
 */

import { Type } from "./definitions.js";

/**
 * Resolves a reference to the composite it names
 */
export type Lookup = (name: string) => Type.Composite | undefined;

const elementaryByName: ReadonlyMap<string, Type.Elementary> = new Map([
  ["u8", Type.Elementary.u8],
  ["u16", Type.Elementary.u16],
  ["u32", Type.Elementary.u32],
  ["u64", Type.Elementary.u64],
  ["u128", Type.Elementary.u128],
  ["i8", Type.Elementary.i8],
  ["i16", Type.Elementary.i16],
  ["i32", Type.Elementary.i32],
  ["i64", Type.Elementary.i64],
  ["i128", Type.Elementary.i128],
  ["bool", Type.Elementary.bool],
  ["str", Type.Elementary.str],
]);

export const Types = {
  elementary(name: string): Type.Elementary | undefined {
    return elementaryByName.get(name);
  },

  isElementaryName(name: string): boolean {
    return elementaryByName.has(name);
  },

  array(elementType: Type, size?: number): Type.Array {
    return new Type.Array(elementType, size);
  },

  vec(elementType: Type): Type.Array {
    return new Type.Array(elementType);
  },

  map(keyType: Type, valueType: Type): Type.Mapping {
    return new Type.Mapping(keyType, valueType);
  },

  option(innerType: Type): Type.Option {
    return new Type.Option(innerType);
  },

  tuple(elementTypes: Type[]): Type.Tuple {
    return new Type.Tuple(elementTypes);
  },

  lazy(valueType: Type): Type.Lazy {
    return new Type.Lazy(valueType);
  },

  storageMap(keyType: Type, valueType: Type): Type.StorageMap {
    return new Type.StorageMap(keyType, valueType);
  },

  ref(name: string): Type.Reference {
    return new Type.Reference(name);
  },

  /**
   * Container types hold elements that are not individually named fields
   */
  isContainer(type: Type): boolean {
    return (
      Type.isArray(type) ||
      Type.isMapping(type) ||
      Type.isOption(type) ||
      Type.isTuple(type) ||
      Type.isStorageContainer(type)
    );
  },

  /**
   * Direct constituents of a container type, keys before values
   */
  elementsOf(type: Type): Type[] {
    if (Type.isArray(type)) {
      return [type.elementType];
    }
    if (Type.isMapping(type) || Type.isStorageMap(type)) {
      return [type.keyType, type.valueType];
    }
    if (Type.isOption(type)) {
      return [type.innerType];
    }
    if (Type.isTuple(type)) {
      return type.elementTypes;
    }
    if (Type.isLazy(type)) {
      return [type.valueType];
    }
    return [];
  },

  /**
   * All fields of a composite; enum variants in declaration order
   */
  fieldsOf(type: Type.Composite): Type.Field[] {
    if (Type.isStruct(type)) {
      return type.fields;
    }
    return type.variants.flatMap((variant) => variant.fields);
  },

  /**
   * Names of all user types referenced by a type, in order of appearance
   */
  references(type: Type): string[] {
    if (Type.isReference(type)) {
      return [type.name];
    }
    if (Type.isComposite(type)) {
      return unique(
        Types.fieldsOf(type).flatMap((field) => Types.references(field.type)),
      );
    }
    return unique(
      Types.elementsOf(type).flatMap((element) => Types.references(element)),
    );
  },

  /**
   * Size in bytes of a type's encoding when it does not depend on the value
   */
  fixedSize(type: Type, lookup: Lookup): number | undefined {
    if (Type.isElementary(type)) {
      if (Type.Elementary.isBool(type)) {
        return 1;
      }
      if (Type.Elementary.isNumeric(type)) {
        return (type.bits ?? 0) / 8;
      }
      return undefined;
    }

    if (Type.isArray(type)) {
      if (type.size === undefined) {
        return undefined;
      }
      const elementSize = Types.fixedSize(type.elementType, lookup);
      return elementSize === undefined ? undefined : elementSize * type.size;
    }

    if (Type.isTuple(type)) {
      return sumSizes(type.elementTypes, lookup);
    }

    if (Type.isReference(type)) {
      const target = lookup(type.name);
      return target ? Types.fixedSize(target, lookup) : undefined;
    }

    if (Type.isStruct(type)) {
      return sumSizes(
        type.fields.map((field) => field.type),
        lookup,
      );
    }

    if (Type.isEnum(type)) {
      // one discriminant byte plus a payload of the same size in every variant
      const sizes = type.variants.map((variant) =>
        sumSizes(
          variant.fields.map((field) => field.type),
          lookup,
        ),
      );
      const [first] = sizes;
      if (first === undefined || sizes.some((size) => size !== first)) {
        return undefined;
      }
      return 1 + first;
    }

    return undefined;
  },
};

function sumSizes(types: Type[], lookup: Lookup): number | undefined {
  let total = 0;
  for (const type of types) {
    const size = Types.fixedSize(type, lookup);
    if (size === undefined) {
      return undefined;
    }
    total += size;
  }
  return total;
}

function unique(names: string[]): string[] {
  return [...new Set(names)];
}
