import { Frame, LayoutError, ErrorCode, ErrorMessages } from "#checker";
import { checkCollection } from "#collections";
import { Packedness, Type, Types, type Lookup } from "#types";
import { Result } from "#result";
import { logger } from "#debug";

/**
 * Packedness of a user type referenced by name
 */
export type ReferenceClassifier = (
  name: string,
) => Result<Packedness, LayoutError>;

/**
 * Decides, from structure alone, whether a type is packed.
 *
 * Successful results are cached by the type's rendering. References are
 * classified through the `references` callback, so the owner decides how
 * (and in what order) referenced declarations are visited.
 */
export class Classifier {
  private readonly cache = new Map<string, Packedness>();
  private readonly stack: string[] = [];

  constructor(private readonly references: ReferenceClassifier) {}

  /**
   * Classifier over a fixed set of declarations, visiting references
   * depth-first
   */
  static over(lookup: Lookup): Classifier {
    const classifier: Classifier = new Classifier((name) => {
      const target = lookup(name);
      if (!target) {
        return Result.err(
          new LayoutError(
            ErrorCode.MISSING_CODEC_SUPPORT,
            ErrorMessages.UNKNOWN_TYPE(name),
          ),
        );
      }
      return classifier.classify(target);
    });
    return classifier;
  }

  classify(type: Type): Result<Packedness, LayoutError> {
    const id = type.toString();
    const cached = this.cache.get(id);
    if (cached !== undefined) {
      return Result.ok(cached);
    }

    const result = this.compute(type);
    if (result.success) {
      logger.classify("%s is %s", id, result.value);
      this.cache.set(id, result.value);
    }
    return result;
  }

  /**
   * Names of the composites currently being classified, outermost first
   */
  get classifying(): readonly string[] {
    return this.stack;
  }

  private compute(type: Type): Result<Packedness, LayoutError> {
    if (Type.isElementary(type)) {
      return Result.ok(Packedness.Packed);
    }
    if (Type.isReference(type)) {
      return this.references(type.name);
    }
    if (Type.isComposite(type)) {
      return this.composite(type);
    }
    if (Types.isContainer(type)) {
      return checkCollection(type, (element) => this.classify(element));
    }
    return Result.err(
      new LayoutError(
        ErrorCode.MISSING_CODEC_SUPPORT,
        ErrorMessages.UNKNOWN_TYPE(type.toString()),
      ),
    );
  }

  private composite(type: Type.Composite): Result<Packedness, LayoutError> {
    const start = this.stack.indexOf(type.name);
    if (start !== -1) {
      return Result.err(
        infiniteLayout(type.name, [...this.stack.slice(start), type.name]),
      );
    }

    this.stack.push(type.name);
    try {
      return this.fields(type);
    } finally {
      this.stack.pop();
    }
  }

  private fields(type: Type.Composite): Result<Packedness, LayoutError> {
    const errors: LayoutError[] = [];
    let packedness = Packedness.Packed;

    for (const { label, field } of labelledFields(type)) {
      const result = this.classify(field.type);
      if (!result.success) {
        errors.push(
          ...Result.errors(result).map((error) =>
            error.within(
              Frame.field(type.name, label),
              Frame.declaration(type.name),
            ),
          ),
        );
        continue;
      }

      if (result.value === Packedness.NonPacked || field.key !== undefined) {
        packedness = Packedness.NonPacked;
      }
    }

    if (errors.length > 0) {
      return Result.err(errors);
    }
    return Result.ok(packedness);
  }
}

/**
 * A cycle through the named declarations; `cycle` starts and ends with
 * `name`
 */
export function infiniteLayout(name: string, cycle: string[]): LayoutError {
  return new LayoutError(
    ErrorCode.INFINITE_LAYOUT,
    ErrorMessages.INFINITE_LAYOUT(name, cycle),
  );
}

/**
 * Fields of a composite with the label diagnostics use for them:
 * `field` for structs, `Variant.field` for enums
 */
export function labelledFields(
  type: Type.Composite,
): { label: string; variant?: Type.Variant; field: Type.Field }[] {
  if (Type.isStruct(type)) {
    return type.fields.map((field) => ({ label: field.name, field }));
  }
  return type.variants.flatMap((variant) =>
    variant.fields.map((field) => ({
      label: `${variant.name}.${field.name}`,
      variant,
      field,
    })),
  );
}
