/**
 * Runtime representation of storable values.
 *
 * Integers up to 32 bits are numbers and wider ones bigints; `[T; N]`,
 * `vec<T>` and tuples are arrays; `map<K, V>` is a `Map`; `option<T>` is
 * `null` or `{ some }`; structs are plain objects keyed by field name
 * (positions for tuple structs); enums are `{ variant, fields }`.
 */

export type Value =
  | number
  | bigint
  | boolean
  | string
  | null
  | Value[]
  | Value.Entries
  | Value.Some
  | Value.Variant
  | Value.Fields;

export namespace Value {
  export type Entries = Map<Value, Value>;

  export type Some = {
    some: Value;
  };

  export interface Fields {
    [field: string]: Value;
  }

  export type Variant = {
    variant: string;
    fields: Fields;
  };

  export const some = (value: Value): Some => ({ some: value });

  export const variant = (name: string, fields: Fields = {}): Variant => ({
    variant: name,
    fields,
  });

  export const isInteger = (value: Value): value is number | bigint =>
    typeof value === "bigint" ||
    (typeof value === "number" && Number.isInteger(value));

  export const isList = (value: Value): value is Value[] =>
    Array.isArray(value);

  export const isEntries = (value: Value): value is Entries =>
    value instanceof Map;

  export const isObject = (value: Value): value is Some | Variant | Fields =>
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Map);

  export const isSome = (value: Value): value is Some =>
    isObject(value) && "some" in value && Object.keys(value).length === 1;

  export const isVariant = (value: Value): value is Variant => {
    if (!isObject(value)) {
      return false;
    }
    const record: Readonly<Record<string, unknown>> = value;
    const fields = record.fields;
    return (
      typeof record.variant === "string" &&
      typeof fields === "object" &&
      fields !== null &&
      !Array.isArray(fields) &&
      !(fields instanceof Map)
    );
  };

  /**
   * Structural equality; maps compare entry by entry in iteration order
   */
  export function equals(left: Value, right: Value): boolean {
    if (isInteger(left) && isInteger(right)) {
      return BigInt(left) === BigInt(right);
    }
    if (isList(left) || isList(right)) {
      return (
        isList(left) &&
        isList(right) &&
        left.length === right.length &&
        left.every((element, i) => equals(element, right[i]))
      );
    }
    if (isEntries(left) || isEntries(right)) {
      if (!isEntries(left) || !isEntries(right) || left.size !== right.size) {
        return false;
      }
      const rightEntries = [...right.entries()];
      return [...left.entries()].every(
        ([key, value], i) =>
          equals(key, rightEntries[i][0]) && equals(value, rightEntries[i][1]),
      );
    }
    if (isObject(left) && isObject(right)) {
      const leftFields: Fields = { ...left };
      const rightFields: Fields = { ...right };
      const names = Object.keys(leftFields);
      return (
        names.length === Object.keys(rightFields).length &&
        names.every(
          (name) =>
            name in rightFields && equals(leftFields[name], rightFields[name]),
        )
      );
    }
    return left === right;
  }

  /**
   * Human-readable rendering used by diagnostics and the CLI
   */
  export function format(value: Value): string {
    if (value === null) {
      return "None";
    }
    if (typeof value === "string") {
      return JSON.stringify(value);
    }
    if (typeof value !== "object") {
      return String(value);
    }
    if (isList(value)) {
      return `[${value.map(format).join(", ")}]`;
    }
    if (isEntries(value)) {
      const entries = [...value.entries()].map(
        ([key, entry]) => `${format(key)}: ${format(entry)}`,
      );
      return `{${entries.join(", ")}}`;
    }
    if (isSome(value)) {
      return `Some(${format(value.some)})`;
    }
    if (isVariant(value)) {
      const fields = formatFields(value.fields);
      return fields ? `${value.variant} ${fields}` : value.variant;
    }
    return formatFields(value) || "{}";
  }

  function formatFields(fields: Fields): string {
    const names = Object.keys(fields);
    if (names.length === 0) {
      return "";
    }
    return `{ ${names.map((name) => `${name}: ${format(fields[name])}`).join(", ")} }`;
  }
}
