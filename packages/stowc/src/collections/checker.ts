import { Frame, LayoutError, ErrorCode, ErrorMessages } from "#checker";
import { Packedness, Type, Types } from "#types";
import { Result } from "#result";

export type Classify = (type: Type) => Result<Packedness, LayoutError>;

/**
 * Checks that every element, key and value type of a container is packed.
 *
 * Elements are classified through `classify`, so containers nested in
 * containers are checked on the way. Failures inside an element are seen
 * through a container frame. Returns the container's own packedness:
 * inline containers are packed, storage containers never are.
 */
export function checkCollection(
  container: Type,
  classify: Classify,
): Result<Packedness, LayoutError> {
  const name = container.toString();
  const errors: LayoutError[] = [];

  for (const element of Types.elementsOf(container)) {
    const result = classify(element);

    if (!result.success) {
      errors.push(
        ...Result.errors(result).map((error) =>
          error.within(Frame.container(name, element.toString())),
        ),
      );
      continue;
    }

    if (result.value === Packedness.NonPacked) {
      errors.push(
        new LayoutError(
          ErrorCode.ILLEGAL_CONTAINER_NESTING,
          ErrorMessages.ILLEGAL_NESTING(name, element.toString()),
        ),
      );
    }
  }

  if (errors.length > 0) {
    return Result.err(errors);
  }
  return Result.ok(
    Type.isStorageContainer(container)
      ? Packedness.NonPacked
      : Packedness.Packed,
  );
}
