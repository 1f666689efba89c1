/**
 * Codec generation: builds the encoder and decoder of a resolved type out of
 * the primitives. Composites encode only their inline fields; the caller
 * decides which fields those are.
 */

import { u8aCmp, stringToU8a } from "@polkadot/util";

import { Type } from "#types";

import { Error as CodecError, ErrorCode } from "./errors.js";
import {
  Input,
  Output,
  decodeBool,
  decodeInteger,
  decodeLength,
  decodeStr,
  encodeBool,
  encodeCompact,
  encodeInteger,
  encodeStr,
} from "./primitives.js";
import { Value } from "./value.js";

export interface Codec {
  /** Rendering of the type this codec handles */
  readonly name: string;
  encodeTo(value: Value, output: Output): void;
  decodeFrom(input: Input): Value;
  encode(value: Value): Uint8Array;
  /** Decodes exactly one value; trailing bytes are an error */
  decode(bytes: Uint8Array): Value;
  defaultValue(): Value;
  /** Total order used to sort map keys */
  compare(left: Value, right: Value): number;
}

/**
 * Finds the codec of a user type by name
 */
export type CodecResolver = (name: string) => Codec;

type CodecParts = Pick<
  Codec,
  "encodeTo" | "decodeFrom" | "defaultValue" | "compare"
>;

function makeCodec(name: string, parts: CodecParts): Codec {
  return {
    name,
    ...parts,
    encode(value) {
      const output = new Output();
      parts.encodeTo(value, output);
      return output.finish();
    },
    decode(bytes) {
      const input = new Input(bytes);
      const value = parts.decodeFrom(input);
      input.finish();
      return value;
    },
  };
}

/**
 * Codec of any inline type. Storage containers never encode inline.
 */
export function typeCodec(type: Type, resolve: CodecResolver): Codec {
  if (Type.isElementary(type)) {
    return elementaryCodec(type);
  }
  if (Type.isArray(type)) {
    return type.size === undefined
      ? vecCodec(type, typeCodec(type.elementType, resolve))
      : arrayCodec(type, type.size, typeCodec(type.elementType, resolve));
  }
  if (Type.isMapping(type)) {
    return mapCodec(
      type,
      typeCodec(type.keyType, resolve),
      typeCodec(type.valueType, resolve),
    );
  }
  if (Type.isOption(type)) {
    const inner = type.innerType;
    if (Type.isElementary(inner) && Type.Elementary.isBool(inner)) {
      return optionBoolCodec(type);
    }
    return optionCodec(type, typeCodec(type.innerType, resolve));
  }
  if (Type.isTuple(type)) {
    return tupleCodec(
      type,
      type.elementTypes.map((element) => typeCodec(element, resolve)),
    );
  }
  if (Type.isReference(type)) {
    return referenceCodec(type.name, resolve);
  }
  if (Type.isStruct(type)) {
    return structCodec(type, type.fields, resolve);
  }
  if (Type.isEnum(type)) {
    return enumCodec(type, (variant) => variant.fields, resolve);
  }
  throw new CodecError(
    ErrorCode.NOT_INLINE,
    `\`${type.toString()}\` owns storage cells and has no inline encoding`,
  );
}

/**
 * Codec of a struct's inline fields, in declaration order
 */
export function structCodec(
  type: Type.Struct,
  inline: readonly Type.Field[],
  resolve: CodecResolver,
): Codec {
  const fields = inline.map((field) => ({
    name: field.name,
    codec: typeCodec(field.type, resolve),
  }));

  return makeCodec(type.name, {
    encodeTo(value, output) {
      const record = expectFields(value, type.name);
      for (const { name, codec } of fields) {
        codec.encodeTo(fieldOf(record, name, type.name), output);
      }
    },
    decodeFrom(input) {
      const record: Value.Fields = {};
      for (const { name, codec } of fields) {
        record[name] = codec.decodeFrom(input);
      }
      return record;
    },
    defaultValue() {
      const record: Value.Fields = {};
      for (const { name, codec } of fields) {
        record[name] = codec.defaultValue();
      }
      return record;
    },
    compare(left, right) {
      const l = expectFields(left, type.name);
      const r = expectFields(right, type.name);
      for (const { name, codec } of fields) {
        const order = codec.compare(
          fieldOf(l, name, type.name),
          fieldOf(r, name, type.name),
        );
        if (order !== 0) {
          return order;
        }
      }
      return 0;
    },
  });
}

/**
 * Largest discriminant of the one-byte variant index
 */
export const MAX_DISCRIMINANT = 0xff;

/**
 * Codec of an enum: one discriminant byte, then the inline fields of the
 * selected variant
 */
export function enumCodec(
  type: Type.Enum,
  inline: (variant: Type.Variant) => readonly Type.Field[],
  resolve: CodecResolver,
): Codec {
  const variants = type.variants.map((variant) => ({
    variant,
    fields: inline(variant).map((field) => ({
      name: field.name,
      codec: typeCodec(field.type, resolve),
    })),
  }));

  const select = (value: Value) => {
    if (!Value.isVariant(value)) {
      throw new CodecError(
        ErrorCode.INVALID_VALUE,
        `Expected a variant of \`${type.name}\`, got ${Value.format(value)}`,
      );
    }
    const entry = variants.find(({ variant }) => variant.name === value.variant);
    if (!entry) {
      throw new CodecError(
        ErrorCode.INVALID_VALUE,
        `\`${type.name}\` has no variant \`${value.variant}\``,
      );
    }
    return { entry, fields: value.fields };
  };

  return makeCodec(type.name, {
    encodeTo(value, output) {
      const { entry, fields } = select(value);
      const { discriminant } = entry.variant;
      if (discriminant > MAX_DISCRIMINANT) {
        throw new CodecError(
          ErrorCode.INVALID_VALUE,
          `Discriminant ${discriminant} of \`${type.name}::${entry.variant.name}\` does not fit in one byte`,
        );
      }
      output.push(new Uint8Array([discriminant]));
      for (const { name, codec } of entry.fields) {
        codec.encodeTo(fieldOf(fields, name, entry.variant.name), output);
      }
    },
    decodeFrom(input) {
      const discriminant = input.readByte();
      const entry = variants.find(
        ({ variant }) => variant.discriminant === discriminant,
      );
      if (!entry) {
        throw new CodecError(
          ErrorCode.INVALID_ENCODING,
          `Invalid discriminant ${discriminant} for \`${type.name}\``,
        );
      }
      const fields: Value.Fields = {};
      for (const { name, codec } of entry.fields) {
        fields[name] = codec.decodeFrom(input);
      }
      return Value.variant(entry.variant.name, fields);
    },
    defaultValue() {
      const [first] = variants;
      if (!first) {
        throw new CodecError(
          ErrorCode.INVALID_VALUE,
          `\`${type.name}\` has no variants and no default value`,
        );
      }
      const fields: Value.Fields = {};
      for (const { name, codec } of first.fields) {
        fields[name] = codec.defaultValue();
      }
      return Value.variant(first.variant.name, fields);
    },
    compare(left, right) {
      const l = select(left);
      const r = select(right);
      if (l.entry !== r.entry) {
        return l.entry.variant.discriminant - r.entry.variant.discriminant;
      }
      for (const { name, codec } of l.entry.fields) {
        const order = codec.compare(
          fieldOf(l.fields, name, l.entry.variant.name),
          fieldOf(r.fields, name, r.entry.variant.name),
        );
        if (order !== 0) {
          return order;
        }
      }
      return 0;
    },
  });
}

function elementaryCodec(type: Type.Elementary): Codec {
  const name = type.toString();

  if (Type.Elementary.isBool(type)) {
    return makeCodec(name, {
      encodeTo(value, output) {
        if (typeof value !== "boolean") {
          throw invalid(name, value);
        }
        encodeBool(output, value);
      },
      decodeFrom: decodeBool,
      defaultValue: () => false,
      compare: (left, right) => Number(left === true) - Number(right === true),
    });
  }

  if (Type.Elementary.isStr(type)) {
    return makeCodec(name, {
      encodeTo(value, output) {
        if (typeof value !== "string") {
          throw invalid(name, value);
        }
        encodeStr(output, value);
      },
      decodeFrom: decodeStr,
      defaultValue: () => "",
      compare: (left, right) =>
        u8aCmp(stringToU8a(String(left)), stringToU8a(String(right))),
    });
  }

  const format = {
    bits: type.bits ?? 0,
    signed: Type.Elementary.isInt(type),
  };
  return makeCodec(name, {
    encodeTo(value, output) {
      if (!Value.isInteger(value)) {
        throw invalid(name, value);
      }
      encodeInteger(output, value, format);
    },
    decodeFrom: (input) => decodeInteger(input, format),
    defaultValue: () => (Type.Elementary.isWide(type) ? 0n : 0),
    compare(left, right) {
      if (!Value.isInteger(left) || !Value.isInteger(right)) {
        throw invalid(name, Value.isInteger(left) ? right : left);
      }
      const l = BigInt(left);
      const r = BigInt(right);
      return l < r ? -1 : l > r ? 1 : 0;
    },
  });
}

function arrayCodec(type: Type.Array, size: number, element: Codec): Codec {
  const name = type.toString();
  return makeCodec(name, {
    encodeTo(value, output) {
      const list = expectList(value, name);
      if (list.length !== size) {
        throw new CodecError(
          ErrorCode.INVALID_VALUE,
          `\`${name}\` needs exactly ${size} elements, got ${list.length}`,
        );
      }
      for (const item of list) {
        element.encodeTo(item, output);
      }
    },
    decodeFrom(input) {
      return Array.from({ length: size }, () => element.decodeFrom(input));
    },
    defaultValue: () => Array.from({ length: size }, () => element.defaultValue()),
    compare: (left, right) =>
      compareLists(expectList(left, name), expectList(right, name), [element]),
  });
}

function vecCodec(type: Type.Array, element: Codec): Codec {
  const name = type.toString();
  return makeCodec(name, {
    encodeTo(value, output) {
      const list = expectList(value, name);
      encodeCompact(output, list.length);
      for (const item of list) {
        element.encodeTo(item, output);
      }
    },
    decodeFrom(input) {
      const length = decodeLength(input);
      return Array.from({ length }, () => element.decodeFrom(input));
    },
    defaultValue: () => [],
    compare: (left, right) =>
      compareLists(expectList(left, name), expectList(right, name), [element]),
  });
}

function tupleCodec(type: Type.Tuple, elements: Codec[]): Codec {
  const name = type.toString();
  return makeCodec(name, {
    encodeTo(value, output) {
      const list = expectList(value, name);
      if (list.length !== elements.length) {
        throw new CodecError(
          ErrorCode.INVALID_VALUE,
          `\`${name}\` needs exactly ${elements.length} elements, got ${list.length}`,
        );
      }
      elements.forEach((codec, i) => codec.encodeTo(list[i], output));
    },
    decodeFrom: (input) => elements.map((codec) => codec.decodeFrom(input)),
    defaultValue: () => elements.map((codec) => codec.defaultValue()),
    compare: (left, right) =>
      compareLists(expectList(left, name), expectList(right, name), elements),
  });
}

function optionCodec(type: Type.Option, inner: Codec): Codec {
  const name = type.toString();
  return makeCodec(name, {
    encodeTo(value, output) {
      if (value === null) {
        output.push(new Uint8Array([0]));
        return;
      }
      if (!Value.isSome(value)) {
        throw invalid(name, value);
      }
      output.push(new Uint8Array([1]));
      inner.encodeTo(value.some, output);
    },
    decodeFrom(input) {
      const tag = input.readByte();
      if (tag === 0) {
        return null;
      }
      if (tag !== 1) {
        throw new CodecError(
          ErrorCode.INVALID_ENCODING,
          `Invalid option tag ${tag} for \`${name}\``,
        );
      }
      return Value.some(inner.decodeFrom(input));
    },
    defaultValue: () => null,
    compare(left, right) {
      if (left === null || right === null) {
        return Number(left !== null) - Number(right !== null);
      }
      if (!Value.isSome(left) || !Value.isSome(right)) {
        throw invalid(name, Value.isSome(left) ? right : left);
      }
      return inner.compare(left.some, right.some);
    },
  });
}

/**
 * `option<bool>` takes a single byte: 0 for none, 1 for true, 2 for false
 */
function optionBoolCodec(type: Type.Option): Codec {
  const name = type.toString();
  return makeCodec(name, {
    encodeTo(value, output) {
      if (value === null) {
        output.push(new Uint8Array([0]));
        return;
      }
      if (!Value.isSome(value) || typeof value.some !== "boolean") {
        throw invalid(name, value);
      }
      output.push(new Uint8Array([value.some ? 1 : 2]));
    },
    decodeFrom(input) {
      const tag = input.readByte();
      switch (tag) {
        case 0:
          return null;
        case 1:
          return Value.some(true);
        case 2:
          return Value.some(false);
        default:
          throw new CodecError(
            ErrorCode.INVALID_ENCODING,
            `Invalid option tag ${tag} for \`${name}\``,
          );
      }
    },
    defaultValue: () => null,
    compare(left, right) {
      if (left === null || right === null) {
        return Number(left !== null) - Number(right !== null);
      }
      if (!Value.isSome(left) || !Value.isSome(right)) {
        throw invalid(name, Value.isSome(left) ? right : left);
      }
      return Number(left.some === true) - Number(right.some === true);
    },
  });
}

/**
 * Entries are written in ascending key order
 */
function mapCodec(type: Type.Mapping, key: Codec, entry: Codec): Codec {
  const name = type.toString();

  const sorted = (value: Value): [Value, Value][] => {
    if (!Value.isEntries(value)) {
      throw invalid(name, value);
    }
    const entries = [...value.entries()].sort(([a], [b]) => key.compare(a, b));
    for (let i = 1; i < entries.length; i++) {
      if (key.compare(entries[i - 1][0], entries[i][0]) === 0) {
        throw new CodecError(
          ErrorCode.INVALID_VALUE,
          `\`${name}\` has duplicate key ${Value.format(entries[i][0])}`,
        );
      }
    }
    return entries;
  };

  return makeCodec(name, {
    encodeTo(value, output) {
      const entries = sorted(value);
      encodeCompact(output, entries.length);
      for (const [k, v] of entries) {
        key.encodeTo(k, output);
        entry.encodeTo(v, output);
      }
    },
    decodeFrom(input) {
      const length = decodeLength(input);
      const entries = new Map<Value, Value>();
      for (let i = 0; i < length; i++) {
        const k = key.decodeFrom(input);
        entries.set(k, entry.decodeFrom(input));
      }
      return entries;
    },
    defaultValue: () => new Map<Value, Value>(),
    compare(left, right) {
      const l = sorted(left).flat();
      const r = sorted(right).flat();
      return compareLists(l, r, [key, entry]);
    },
  });
}

/**
 * Defers to the registered codec of a user type, looked up on first use
 */
function referenceCodec(name: string, resolve: CodecResolver): Codec {
  let target: Codec | undefined;
  const codec = () => (target ??= resolve(name));

  return makeCodec(name, {
    encodeTo: (value, output) => codec().encodeTo(value, output),
    decodeFrom: (input) => codec().decodeFrom(input),
    defaultValue: () => codec().defaultValue(),
    compare: (left, right) => codec().compare(left, right),
  });
}

/**
 * Lexicographic order; `codecs` cycles over the elements
 */
function compareLists(left: Value[], right: Value[], codecs: Codec[]): number {
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const order = codecs[i % codecs.length].compare(left[i], right[i]);
    if (order !== 0) {
      return order;
    }
  }
  return left.length - right.length;
}

function expectList(value: Value, name: string): Value[] {
  if (!Value.isList(value)) {
    throw invalid(name, value);
  }
  return value;
}

function expectFields(value: Value, name: string): Value.Fields {
  if (!Value.isObject(value) || Value.isVariant(value)) {
    throw invalid(name, value);
  }
  return value;
}

function fieldOf(fields: Value.Fields, name: string, owner: string): Value {
  if (!(name in fields)) {
    throw new CodecError(
      ErrorCode.INVALID_VALUE,
      `Missing field \`${name}\` of \`${owner}\``,
    );
  }
  return fields[name];
}

function invalid(name: string, value: Value): CodecError {
  return new CodecError(
    ErrorCode.INVALID_VALUE,
    `Expected a value of \`${name}\`, got ${Value.format(value)}`,
  );
}
