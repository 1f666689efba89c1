import { MAX_DISCRIMINANT } from "#codec";
import { Descriptor, type Program, TypeExpression } from "#descriptor";
import { Type, Types, type Declarations } from "#types";
import { Result } from "#result";

import {
  Error as LayoutError,
  ErrorCode,
  ErrorMessages,
  Frame,
} from "./errors.js";

/**
 * Names that look like scalars but have no codec
 */
const unsupported: ReadonlyMap<string, string> = new Map([
  ["f32", "floating point numbers are not encodable"],
  ["f64", "floating point numbers are not encodable"],
  ["usize", "platform-sized integers have no fixed width"],
  ["isize", "platform-sized integers have no fixed width"],
  ["char", "characters must be stored as `str` or `u32`"],
]);

const generics: ReadonlyMap<string, number> = new Map([
  ["vec", 1],
  ["option", 1],
  ["map", 2],
  ["lazy", 1],
  ["storage_map", 2],
]);

/**
 * Resolves every declared type of a program into its `Type`, checking that
 * each field's type is one the codec can handle.
 *
 * Every failing declaration is reported, and so is every declaration that
 * refers to one, through its own field and declaration frames. Declarations
 * that resolve are not returned unless the whole program resolves.
 */
export function checkProgram(
  program: Program,
): Result<Declarations, LayoutError> {
  const names = new Set<string>();
  const duplicates: LayoutError[] = [];

  // First pass: collect declared names so fields may refer to any of them
  for (const descriptor of program.types) {
    if (names.has(descriptor.name)) {
      duplicates.push(
        new LayoutError(
          ErrorCode.DUPLICATE_DECLARATION,
          ErrorMessages.DUPLICATE_TYPE(descriptor.name),
          [Frame.declaration(descriptor.name)],
          descriptor.loc ?? undefined,
        ),
      );
      continue;
    }
    names.add(descriptor.name);
  }

  // Second pass: resolve field types
  const declarations = new Map<string, Type.Composite>();
  const failures = new Map<string, LayoutError[]>();
  for (const descriptor of program.types) {
    if (declarations.has(descriptor.name) || failures.has(descriptor.name)) {
      continue;
    }

    const result = Descriptor.isStruct(descriptor)
      ? checkStruct(descriptor, names)
      : checkEnum(descriptor, names);

    if (!result.success) {
      failures.set(descriptor.name, Result.errors(result));
      continue;
    }
    declarations.set(descriptor.name, result.value);
  }

  // Third pass: declarations that use a failing one fail with it
  let changed = failures.size > 0;
  while (changed) {
    changed = false;
    for (const [name, type] of declarations) {
      const errors = dependencyErrors(type, failures);
      if (errors.length > 0) {
        declarations.delete(name);
        failures.set(name, errors);
        changed = true;
      }
    }
  }

  const errors = [
    ...duplicates,
    ...[...names].flatMap((name) => failures.get(name) ?? []),
  ];
  if (errors.length > 0) {
    return Result.err(errors);
  }
  return Result.ok(declarations);
}

/**
 * Errors of the failing declarations a composite refers to, seen through
 * the fields (and containers) that refer to them
 */
function dependencyErrors(
  type: Type.Composite,
  failures: ReadonlyMap<string, LayoutError[]>,
): LayoutError[] {
  const fields = Type.isStruct(type)
    ? type.fields.map((field) => ({ label: field.name, field }))
    : type.variants.flatMap((variant) =>
        variant.fields.map((field) => ({
          label: `${variant.name}.${field.name}`,
          field,
        })),
      );

  return fields.flatMap(({ label, field }) =>
    referencedFailures(field.type, failures).map((error) =>
      error.within(Frame.field(type.name, label), Frame.declaration(type.name)),
    ),
  );
}

function referencedFailures(
  type: Type,
  failures: ReadonlyMap<string, LayoutError[]>,
): LayoutError[] {
  if (Type.isReference(type)) {
    return failures.get(type.name) ?? [];
  }
  const container = type.toString();
  return Types.elementsOf(type).flatMap((element) =>
    referencedFailures(element, failures).map((error) =>
      error.within(Frame.container(container, element.toString())),
    ),
  );
}

function checkStruct(
  descriptor: Descriptor.Struct,
  names: ReadonlySet<string>,
): Result<Type.Struct, LayoutError> {
  const result = checkFields(descriptor.name, descriptor.fields, names);
  if (!result.success) {
    return result;
  }
  return Result.ok(
    new Type.Struct(descriptor.name, result.value, descriptor.tuple),
  );
}

function checkEnum(
  descriptor: Descriptor.Enum,
  names: ReadonlySet<string>,
): Result<Type.Enum, LayoutError> {
  const errors: LayoutError[] = [];
  const variants: Type.Variant[] = [];
  const seen = new Set<string>();

  const count = descriptor.variants.length;
  if (count > MAX_DISCRIMINANT + 1) {
    return Result.err(
      new LayoutError(
        ErrorCode.MISSING_CODEC_SUPPORT,
        ErrorMessages.TOO_MANY_VARIANTS(descriptor.name, count),
        [Frame.declaration(descriptor.name)],
        descriptor.loc ?? undefined,
      ),
    );
  }

  for (const variant of descriptor.variants) {
    if (seen.has(variant.name)) {
      errors.push(
        new LayoutError(
          ErrorCode.DUPLICATE_DECLARATION,
          ErrorMessages.DUPLICATE_FIELD(descriptor.name, variant.name),
          [Frame.declaration(descriptor.name)],
          variant.loc ?? undefined,
        ),
      );
      continue;
    }
    seen.add(variant.name);

    const result = checkFields(
      descriptor.name,
      variant.fields,
      names,
      variant.name,
    );
    if (!result.success) {
      errors.push(...Result.errors(result));
      continue;
    }

    variants.push({
      name: variant.name,
      discriminant: variant.discriminant,
      fields: result.value,
      tuple: variant.tuple,
    });
  }

  if (errors.length > 0) {
    return Result.err(errors);
  }
  return Result.ok(new Type.Enum(descriptor.name, variants));
}

function checkFields(
  owner: string,
  descriptors: readonly Descriptor.Field[],
  names: ReadonlySet<string>,
  variant?: string,
): Result<Type.Field[], LayoutError> {
  const errors: LayoutError[] = [];
  const fields: Type.Field[] = [];
  const seen = new Set<string>();

  descriptors.forEach((descriptor, index) => {
    const label = variant ? `${variant}.${descriptor.name}` : descriptor.name;

    if (seen.has(descriptor.name)) {
      errors.push(
        new LayoutError(
          ErrorCode.DUPLICATE_DECLARATION,
          ErrorMessages.DUPLICATE_FIELD(owner, label),
          [Frame.declaration(owner)],
          descriptor.loc ?? undefined,
        ),
      );
      return;
    }
    seen.add(descriptor.name);

    const result = resolveType(descriptor.type, names);
    if (!result.success) {
      errors.push(
        ...Result.errors(result).map((error) =>
          withLocation(
            error.within(Frame.field(owner, label), Frame.declaration(owner)),
            descriptor,
          ),
        ),
      );
      return;
    }

    fields.push({
      name: descriptor.name,
      index,
      type: result.value,
      ...(descriptor.key !== undefined ? { key: descriptor.key } : {}),
    });
  });

  if (errors.length > 0) {
    return Result.err(errors);
  }
  return Result.ok(fields);
}

/**
 * Resolves a parsed type expression to a Type
 */
export function resolveType(
  expression: TypeExpression,
  names: ReadonlySet<string>,
): Result<Type, LayoutError> {
  switch (expression.kind) {
    case "named": {
      const elementary = Types.elementary(expression.name);
      if (elementary) {
        return Result.ok(elementary);
      }
      if (names.has(expression.name)) {
        return Result.ok(Types.ref(expression.name));
      }
      return Result.err(missingCodec(expression, names));
    }

    case "generic": {
      const arity = generics.get(expression.name);
      if (arity === undefined) {
        return Result.err(missingCodec(expression, names));
      }
      if (arity !== expression.args.length) {
        return Result.err(
          new LayoutError(
            ErrorCode.MISSING_CODEC_SUPPORT,
            ErrorMessages.WRONG_ARITY(
              expression.name,
              arity,
              expression.args.length,
            ),
          ),
        );
      }

      const args = resolveAll(expression.args, names);
      if (!args.success) {
        return args;
      }
      const [first, second] = args.value;

      switch (expression.name) {
        case "vec":
          return Result.ok(Types.vec(first));
        case "option":
          return Result.ok(Types.option(first));
        case "map":
          return Result.ok(Types.map(first, second));
        case "lazy":
          return Result.ok(Types.lazy(first));
        default:
          return Result.ok(Types.storageMap(first, second));
      }
    }

    case "array": {
      const element = resolveType(expression.element, names);
      return Result.map(element, (type) => Types.array(type, expression.size));
    }

    case "tuple": {
      const elements = resolveAll(expression.elements, names);
      return Result.map(elements, (types) => Types.tuple(types));
    }
  }
}

function resolveAll(
  expressions: TypeExpression[],
  names: ReadonlySet<string>,
): Result<Type[], LayoutError> {
  const types: Type[] = [];
  for (const expression of expressions) {
    const result = resolveType(expression, names);
    if (!result.success) {
      return result;
    }
    types.push(result.value);
  }
  return Result.ok(types);
}

function missingCodec(
  expression: TypeExpression,
  names: ReadonlySet<string>,
): LayoutError {
  const name = TypeExpression.format(expression);
  const baseName =
    expression.kind === "named" || expression.kind === "generic"
      ? expression.name
      : name;
  const reason = unsupported.get(baseName);

  if (reason) {
    return new LayoutError(
      ErrorCode.MISSING_CODEC_SUPPORT,
      ErrorMessages.UNSUPPORTED_TYPE(name, reason),
    );
  }
  if (
    expression.kind === "generic" &&
    (names.has(expression.name) || Types.isElementaryName(expression.name))
  ) {
    return new LayoutError(
      ErrorCode.MISSING_CODEC_SUPPORT,
      ErrorMessages.UNSUPPORTED_TYPE(
        name,
        `\`${expression.name}\` does not take type arguments`,
      ),
    );
  }
  return new LayoutError(
    ErrorCode.MISSING_CODEC_SUPPORT,
    ErrorMessages.UNKNOWN_TYPE(name),
  );
}

function withLocation(
  error: LayoutError,
  field: Descriptor.Field,
): LayoutError {
  if (error.location || !field.loc) {
    return error;
  }
  return new LayoutError(error.rule, error.message, error.frames, field.loc);
}
