import type { StowError } from "#errors";
import type { Result } from "#result";
import { logger } from "#debug";

import {
  targetSequences,
  type CompileInput,
  type Target,
  type TargetOutput,
} from "./sequences/index.js";

export interface CompileOptions<T extends Target = Target>
  extends CompileInput {
  to: T;
}

const runners: {
  [T in Target]: (
    input: CompileInput,
  ) => Promise<Result<TargetOutput<T>, StowError>>;
} = {
  descriptors: (input) => targetSequences.descriptors.execute(input),
  types: (input) => targetSequences.types.execute(input),
  derive: (input) => targetSequences.derive.execute(input),
  layout: (input) => targetSequences.layout.execute(input),
};

/**
 * Runs every pass up to the requested target
 */
export async function compile<T extends Target>(
  options: CompileOptions<T>,
): Promise<Result<TargetOutput<T>, StowError>> {
  const { to, ...input } = options;
  logger.compile(
    "compiling %s to %s",
    input.sourcePath ?? "<source>",
    to,
  );
  return runners[to](input);
}
